/**
 * Log Watcher - follows a service's systemd journal in real time
 *
 * Each watcher owns one `journalctl -f` process. It is opened per restart
 * cycle and closed as soon as the caller has what it needs.
 */

import { spawn, type ChildProcess } from 'child_process';
import { createInterface } from 'readline';
import { z } from 'zod';
import type { RestartConfig } from '../core/restart-config.js';
import { LogSourceError } from '../core/restart-errors.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { waitForExit } from '../lib/process-exit.js';

export interface LogEntry {
  /** Microseconds since the Unix epoch */
  timestamp: number;
  /** Absent when the journal field is missing or not text */
  message?: string;
}

/**
 * A single-use stream of log entries with an explicit end of life
 */
export interface LogStream extends AsyncIterable<LogEntry> {
  close(): void;
}

// journalctl -o json always carries __REALTIME_TIMESTAMP; MESSAGE can be a
// string, an array of bytes for binary payloads, or absent
const JournalRecordSchema = z.object({
  __REALTIME_TIMESTAMP: z.string().regex(/^\d+$/),
  MESSAGE: z.unknown().optional(),
});

/**
 * Parse one line of `journalctl -o json` output.
 * Returns undefined for anything that is not a usable journal record.
 */
export function parseJournalLine(line: string): LogEntry | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }

  const record = JournalRecordSchema.safeParse(raw);
  if (!record.success) {
    return undefined;
  }

  const timestamp = Number(record.data.__REALTIME_TIMESTAMP);
  if (!Number.isSafeInteger(timestamp)) {
    return undefined;
  }

  const { MESSAGE } = record.data;
  return typeof MESSAGE === 'string' ? { timestamp, message: MESSAGE } : { timestamp };
}

export function buildJournalArgs(config: RestartConfig): string[] {
  return [
    '-u', config.serviceName,
    '-o', 'json',
    '-n', String(config.tailLines),
    '--output-fields=MESSAGE',
    '-f',
  ];
}

export class JournalWatcher implements LogStream {
  private child?: ChildProcess;
  private readonly logger: Logger;

  constructor(
    private readonly config: RestartConfig,
    logger: Logger = defaultLogger
  ) {
    this.logger = logger.child({ component: 'log-watcher', service: config.serviceName });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<LogEntry, void, undefined> {
    if (this.child) {
      throw new LogSourceError('Journal watcher can only be iterated once', this.config.serviceName);
    }

    const args = buildJournalArgs(this.config);
    this.logger.debug(`Following journal: ${this.config.journalCommand} ${args.join(' ')}`);

    const child = spawn(this.config.journalCommand, args, {
      stdio: ['ignore', 'pipe', 'inherit'],
    });
    this.child = child;
    const exited = waitForExit(child);

    if (!child.stdout) {
      this.close();
      throw new LogSourceError('Journal process has no output stream', this.config.serviceName);
    }

    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });

    try {
      for await (const line of lines) {
        if (line.trim() === '') continue;

        const entry = parseJournalLine(line);
        if (!entry) {
          this.logger.debug('Skipping unparseable journal line', { line });
          continue;
        }
        yield entry;
      }

      const exit = await exited;
      if (exit.error) {
        throw new LogSourceError(
          `Could not follow the journal of \`${this.config.serviceName}\``,
          this.config.serviceName,
          exit.error
        );
      }
      throw new LogSourceError(
        `Journal for \`${this.config.serviceName}\` ended (${exit.signal ? `signal ${exit.signal}` : `code ${exit.code}`}) before the service reported ready`,
        this.config.serviceName
      );
    } finally {
      lines.close();
      this.close();
    }
  }

  /**
   * Stop the journal process. Safe to call more than once.
   */
  close(): void {
    const child = this.child;
    if (child && child.exitCode === null && child.signalCode === null && !child.killed) {
      this.logger.debug('Stopping journal process', { pid: child.pid });
      child.kill('SIGTERM');
    }
  }
}
