/**
 * Configuration Error Class
 *
 * Raised when runbox.json or an environment file is missing, malformed,
 * or fails schema validation. Carries the environment name and a hint the
 * CLI prints underneath the message.
 */

export class ConfigurationError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public environment?: string,
    public suggestion?: string,
    cause?: Error
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.cause = cause;
  }

  /**
   * Format the error for CLI output
   */
  override toString(): string {
    let output = `❌ ${this.message}`;
    if (this.environment) {
      output += `\n   Environment: ${this.environment}`;
    }
    if (this.suggestion) {
      output += `\n   💡 Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}
