import { describe, it, expect } from 'vitest';
import { summarizeRestarts } from '../lib/restart-stats.js';
import { formatRestartSummary, getSummarySeparator } from '../lib/restart-report.js';

describe('summarizeRestarts', () => {
  const durations = [18_444_228, 17_258_119, 16_693_717];

  it('computes count, total, min, max and average', () => {
    expect(summarizeRestarts(durations)).toEqual({
      count: 3,
      totalUs: 52_396_064,
      minUs: 16_693_717,
      maxUs: 18_444_228,
      averageUs: 17_465_355,
    });
  });

  it('keeps the average between min and max', () => {
    const samples = [[1], [1, 2], [7, 7, 8], [100, 3, 250_000, 42]];
    for (const sample of samples) {
      const summary = summarizeRestarts(sample);
      expect(summary.totalUs).toBe(sample.reduce((a, b) => a + b, 0));
      expect(summary.minUs).toBeLessThanOrEqual(summary.averageUs);
      expect(summary.averageUs).toBeLessThanOrEqual(summary.maxUs);
    }
  });

  it('treats a single restart as its own min, max and average', () => {
    expect(summarizeRestarts([5_000_001])).toEqual({
      count: 1,
      totalUs: 5_000_001,
      minUs: 5_000_001,
      maxUs: 5_000_001,
      averageUs: 5_000_001,
    });
  });

  it('refuses an empty session', () => {
    expect(() => summarizeRestarts([])).toThrow(RangeError);
  });
});

describe('formatRestartSummary', () => {
  it('renders the separator, totals and spread', () => {
    const summary = summarizeRestarts([18_444_228, 17_258_119, 16_693_717]);

    expect(formatRestartSummary(summary)).toEqual([
      getSummarySeparator(),
      'Restarts: 3, Total time: 0:00:52.396064',
      'min: 0:00:16.693717, max: 0:00:18.444228, avg: 0:00:17.465355',
    ]);
  });

  it('separates the summary with a 40-character rule', () => {
    expect(getSummarySeparator()).toBe('________________________________________');
  });
});
