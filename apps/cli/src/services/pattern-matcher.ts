/**
 * Pattern Matcher - turns a stream of log entries into one restart duration
 */

import type { RestartConfig } from '../core/restart-config.js';
import { LogSourceError } from '../core/restart-errors.js';
import type { LogEntry } from './log-watcher.js';

export interface RestartPatterns {
  start: RegExp;
  ready: RegExp;
}

/**
 * Anchor each pattern at the start of the message; a pattern that should
 * match anywhere begins with `.*`.
 */
export function compileRestartPatterns(
  config: Pick<RestartConfig, 'startPattern' | 'readyPattern'>
): RestartPatterns {
  return {
    start: new RegExp(`^(?:${config.startPattern})`),
    ready: new RegExp(`^(?:${config.readyPattern})`),
  };
}

/**
 * Wait for a start marker followed by a ready marker and return the time
 * between them in microseconds. A later start marker replaces an earlier one.
 *
 * Does not time out: resolves, or rejects when the stream ends first.
 */
export async function awaitRestartDuration(
  entries: AsyncIterable<LogEntry>,
  patterns: RestartPatterns,
  serviceName?: string
): Promise<number> {
  let startedAt: number | undefined;

  for await (const entry of entries) {
    const { message } = entry;
    if (message === undefined) continue;

    if (patterns.start.test(message)) {
      startedAt = entry.timestamp;
    } else if (startedAt !== undefined && patterns.ready.test(message)) {
      return entry.timestamp - startedAt;
    }
  }

  const source = serviceName ? `Log of \`${serviceName}\`` : 'Log stream';
  throw new LogSourceError(`${source} ended before the service reported ready`, serviceName);
}
