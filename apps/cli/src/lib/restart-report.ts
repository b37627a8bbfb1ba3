import { formatDuration } from './duration.js';
import type { RestartSummary } from './restart-stats.js';

/**
 * Separator printed between the per-restart lines and the summary
 */
export function getSummarySeparator(): string {
  return '_'.repeat(40);
}

export function formatRestartSummary(summary: RestartSummary): string[] {
  return [
    getSummarySeparator(),
    `Restarts: ${summary.count}, Total time: ${formatDuration(summary.totalUs)}`,
    `min: ${formatDuration(summary.minUs)}, max: ${formatDuration(summary.maxUs)}, avg: ${formatDuration(summary.averageUs)}`,
  ];
}
