/**
 * Service Controller - restarts the service through the process supervisor
 */

import { spawn } from 'child_process';
import type { RestartConfig } from '../core/restart-config.js';
import { SupervisorError } from '../core/restart-errors.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { waitForExit } from '../lib/process-exit.js';

export interface ServiceController {
  /**
   * Resolve once the supervisor reports the restart done.
   * Rejects with SupervisorError on a non-zero status.
   */
  restart(): Promise<void>;
}

export class SystemdController implements ServiceController {
  private readonly logger: Logger;

  constructor(
    private readonly config: RestartConfig,
    logger: Logger = defaultLogger
  ) {
    this.logger = logger.child({ component: 'service-controller', service: config.serviceName });
  }

  async restart(): Promise<void> {
    const { supervisorCommand, serviceName } = this.config;
    this.logger.debug(`Running ${supervisorCommand} restart ${serviceName}`);

    const child = spawn(supervisorCommand, ['restart', serviceName], { stdio: 'inherit' });
    const exit = await waitForExit(child);

    if (exit.error) {
      throw exit.error;
    }
    if (exit.code !== 0) {
      throw new SupervisorError(serviceName, exit.code, exit.signal);
    }
  }
}
