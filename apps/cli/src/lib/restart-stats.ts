/**
 * Restart Statistics - aggregate values over one session's measurements
 */

import { divideRounded } from './duration.js';

export interface RestartMeasurement {
  /** 1-based position of the restart within the session */
  readonly attempt: number;
  readonly durationUs: number;
}

export interface RestartSummary {
  count: number;
  totalUs: number;
  minUs: number;
  maxUs: number;
  averageUs: number;
}

export function summarizeRestarts(durations: readonly number[]): RestartSummary {
  if (durations.length === 0) {
    throw new RangeError('Cannot summarize an empty set of restarts');
  }

  let totalUs = 0;
  let minUs = Number.POSITIVE_INFINITY;
  let maxUs = Number.NEGATIVE_INFINITY;

  for (const duration of durations) {
    totalUs += duration;
    minUs = Math.min(minUs, duration);
    maxUs = Math.max(maxUs, duration);
  }

  return {
    count: durations.length,
    totalUs,
    minUs,
    maxUs,
    averageUs: divideRounded(totalUs, durations.length),
  };
}
