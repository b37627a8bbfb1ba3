/**
 * Fatal errors raised while measuring restarts.
 *
 * Neither is retried: the entry point prints the message and exits with status 1.
 */

/**
 * The process supervisor reported a failed restart
 */
export class SupervisorError extends Error {
  constructor(
    public readonly serviceName: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null = null
  ) {
    super(
      signal
        ? `service \`${serviceName}\` was terminated by ${signal}`
        : `service \`${serviceName}\` exited with code ${exitCode}`
    );
    this.name = 'SupervisorError';
  }
}

/**
 * The log source stopped (or never started) before the ready marker was seen
 */
export class LogSourceError extends Error {
  constructor(
    message: string,
    public readonly serviceName?: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'LogSourceError';
  }

  override toString(): string {
    let output = this.message;
    if (this.cause) {
      output += `\n   Cause: ${this.cause.message}`;
    }
    return output;
  }
}
