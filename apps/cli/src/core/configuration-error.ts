/**
 * Configuration Error Class
 *
 * Raised when the restart configuration fails validation.
 */

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public suggestion?: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }

  /**
   * Format the error nicely for CLI output
   */
  override toString(): string {
    let output = this.message;
    if (this.suggestion) {
      output += `\n   💡 Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}
