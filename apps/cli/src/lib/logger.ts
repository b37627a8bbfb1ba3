/**
 * Structured logging utility for restart-meter
 *
 * Diagnostic output only, written to stderr: the restart report itself goes
 * to stdout through the plain printers in core/io/cli-logger.ts.
 */

import chalk from 'chalk';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export type LogContext = Record<string, unknown>;

const LEVELS: readonly LogLevel[] = LogLevelSchema.options;

/**
 * Read a log level from an environment value, falling back to `info`
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value?.toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

export class Logger {
  private readonly logLevel: LogLevel;
  private readonly context: LogContext;

  constructor(logLevel: LogLevel = 'info', context: LogContext = {}) {
    this.logLevel = logLevel;
    this.context = context;
  }

  /**
   * Format log message with timestamp and level
   */
  private formatMessage(level: LogLevel, message: string, context: LogContext): string {
    const timestamp = new Date().toISOString();
    const colorFn = this.getLevelColor(level);

    const contextStr = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return colorFn(`[${timestamp}] ${level.toUpperCase()} ${message}${contextStr}`);
  }

  private getLevelColor(level: LogLevel): (text: string) => string {
    switch (level) {
      case 'debug': return chalk.gray;
      case 'info': return chalk.blue;
      case 'warn': return chalk.yellow;
      case 'error': return chalk.red;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog('debug')) {
      console.error(this.formatMessage('debug', message, { ...this.context, ...context }));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      console.error(this.formatMessage('info', message, { ...this.context, ...context }));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, { ...this.context, ...context }));
    }
  }

  error(message: string, context?: LogContext): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, { ...this.context, ...context }));
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(this.logLevel, { ...this.context, ...additionalContext });
  }
}

// Default logger instance
export const logger = new Logger(resolveLogLevel(process.env.LOG_LEVEL));
