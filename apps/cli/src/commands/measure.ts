/**
 * Measure Command - restart the service N times and report how long each
 * restart took to become ready
 */

import { z } from 'zod';
import { CommandBuilder } from '../core/command-definition.js';
import { printLine } from '../core/io/cli-logger.js';
import { loadRestartConfig, type RestartConfig } from '../core/restart-config.js';
import { RestartRunner, type RestartRunnerDeps } from '../core/restart-runner.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { formatRestartSummary } from '../lib/restart-report.js';
import { summarizeRestarts, type RestartMeasurement, type RestartSummary } from '../lib/restart-stats.js';
import { JournalWatcher } from '../services/log-watcher.js';
import { compileRestartPatterns } from '../services/pattern-matcher.js';
import { SystemdController } from '../services/service-controller.js';

// =====================================================================
// SCHEMA DEFINITIONS
// =====================================================================

export const MeasureOptionsSchema = z.object({
  numbers: z.number().int().positive().default(1),
  help: z.boolean().default(false),
});

export type MeasureOptions = z.output<typeof MeasureOptionsSchema>;

export interface RestartRun {
  measurements: RestartMeasurement[];
  summary: RestartSummary;
}

// =====================================================================
// IMPLEMENTATION
// =====================================================================

export interface MeasureDependencies {
  config?: RestartConfig;
  logger?: Logger;
  /** Replaces any of the runner's collaborators, mainly for tests */
  runner?: Partial<RestartRunnerDeps>;
  print?: (line: string) => void;
}

/**
 * Wire the systemd-backed collaborators for a config
 */
export function createRestartRunner(
  config: RestartConfig,
  logger: Logger,
  overrides: Partial<RestartRunnerDeps> = {}
): RestartRunner {
  return new RestartRunner({
    controller: new SystemdController(config, logger),
    openLogStream: () => new JournalWatcher(config, logger),
    patterns: compileRestartPatterns(config),
    serviceName: config.serviceName,
    logger,
    ...overrides,
  });
}

export async function runMeasurement(
  options: Pick<MeasureOptions, 'numbers'>,
  deps: MeasureDependencies = {}
): Promise<RestartRun> {
  const config = deps.config ?? loadRestartConfig();
  const logger = (deps.logger ?? defaultLogger).child({ service: config.serviceName });
  const print = deps.print ?? printLine;

  logger.debug('Measuring restarts', { count: options.numbers });

  const runner = createRestartRunner(config, logger, deps.runner);
  const measurements = await runner.run(options.numbers);
  const summary = summarizeRestarts(measurements.map(m => m.durationUs));

  for (const line of formatRestartSummary(summary)) {
    print(line);
  }

  return { measurements, summary };
}

// =====================================================================
// COMMAND DEFINITION
// =====================================================================

export const measureCommand = new CommandBuilder()
  .name('restart-meter')
  .description('Restart a systemd service and measure the time from its start to its first block')
  .schema(MeasureOptionsSchema)
  .args({
    args: {
      '--numbers': {
        type: 'number',
        description: 'numbers of restarts',
        default: 1,
      },
      '--help': {
        type: 'boolean',
        description: 'show this help',
        default: false,
      },
    },
    aliases: {
      '-n': '--numbers',
      '-h': '--help',
    },
  })
  .examples(
    'sudo restart-meter',
    'sudo restart-meter -n 3'
  )
  .handler(options => runMeasurement(options))
  .build();
