/**
 * Restart Runner - drives the restart/measure cycles of one session
 *
 * Cycles are strictly sequential: the journal cannot tell two overlapping
 * restarts of the same unit apart.
 */

import { formatDuration } from '../lib/duration.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { ProgressIndicator, type ProgressHandle } from '../lib/progress-indicator.js';
import type { RestartMeasurement } from '../lib/restart-stats.js';
import type { LogStream } from '../services/log-watcher.js';
import { awaitRestartDuration, type RestartPatterns } from '../services/pattern-matcher.js';
import type { ServiceController } from '../services/service-controller.js';

export interface RestartRunnerDeps {
  controller: ServiceController;
  /** Called once per cycle, after the restart; must return a fresh stream */
  openLogStream: () => LogStream;
  patterns: RestartPatterns;
  /** Named in the error raised when a log stream ends early */
  serviceName?: string;
  startProgress?: (label: string) => ProgressHandle;
  logger?: Logger;
}

export class RestartRunner {
  private readonly startProgress: (label: string) => ProgressHandle;
  private readonly logger: Logger;

  constructor(private readonly deps: RestartRunnerDeps) {
    this.startProgress = deps.startProgress ?? (label => ProgressIndicator.start(label));
    this.logger = (deps.logger ?? defaultLogger).child({ component: 'restart-runner' });
  }

  async run(count: number): Promise<RestartMeasurement[]> {
    if (!Number.isSafeInteger(count) || count < 1) {
      throw new RangeError(`Restart count must be a positive integer, got ${count}`);
    }

    const measurements: RestartMeasurement[] = [];

    for (let attempt = 1; attempt <= count; attempt++) {
      const measurement = await this.measureOnce(attempt);
      measurements.push(measurement);
    }

    return measurements;
  }

  private async measureOnce(attempt: number): Promise<RestartMeasurement> {
    const progress = this.startProgress(`Restart #${attempt}:`);

    try {
      await this.deps.controller.restart();
      this.logger.debug('Restart issued, waiting for ready marker', { attempt });

      const stream = this.deps.openLogStream();
      let durationUs: number;
      try {
        durationUs = await awaitRestartDuration(stream, this.deps.patterns, this.deps.serviceName);
      } finally {
        stream.close();
      }

      const measurement: RestartMeasurement = { attempt, durationUs };
      progress.stop(formatDuration(durationUs));
      this.logger.debug('Restart measured', { attempt, durationUs });
      return measurement;
    } catch (error) {
      progress.clear();
      throw error;
    }
  }
}
