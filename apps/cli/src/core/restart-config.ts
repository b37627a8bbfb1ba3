/**
 * Restart Configuration
 *
 * The service under test and the two log markers that bracket a restart.
 * Built once at startup and handed to every component explicitly.
 */

import { z } from 'zod';
import { ConfigurationError } from './configuration-error.js';

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const PatternSchema = z
  .string()
  .min(1)
  .refine(isValidPattern, { message: 'Not a valid regular expression' });

export const RestartConfigSchema = z.object({
  /** systemd unit to restart and whose journal is followed */
  serviceName: z.string().min(1),
  /** Message marking that the service process has started */
  startPattern: PatternSchema,
  /** Message marking the first unit of work after a start */
  readyPattern: PatternSchema,
  supervisorCommand: z.string().min(1).default('systemctl'),
  journalCommand: z.string().min(1).default('journalctl'),
  /** Journal lines replayed before following, so a start logged just before the watcher attaches is not missed */
  tailLines: z.number().int().nonnegative().default(2),
});

export type RestartConfigInput = z.input<typeof RestartConfigSchema>;
export type RestartConfig = z.output<typeof RestartConfigSchema>;

/**
 * Agoric node daemon: started by systemd, ready once the block manager
 * begins its first block.
 */
export const AGORIC_NODE_DEFAULTS: RestartConfigInput = {
  serviceName: 'ag-chain-cosmos.service',
  startPattern: '.*Started Agoric Cosmos daemon.$',
  readyPattern: '.*block-manager: block \\d+ begin$',
};

/**
 * Merge overrides onto the defaults and validate the result
 */
export function loadRestartConfig(overrides: Partial<RestartConfigInput> = {}): RestartConfig {
  const result = RestartConfigSchema.safeParse({ ...AGORIC_NODE_DEFAULTS, ...overrides });

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigurationError(
      `Invalid restart configuration:\n${issues}`,
      'Check the service name and marker patterns',
      result.error
    );
  }

  return result.data;
}
