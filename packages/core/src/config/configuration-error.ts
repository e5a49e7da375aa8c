/**
 * Configuration Error Class
 *
 * Raised when the configuration file is missing, cannot be parsed, or fails
 * validation. Carries the offending file and a suggestion for the CLI to print.
 */

export class ConfigurationError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public configPath?: string,
    public suggestion?: string,
    cause?: Error
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.cause = cause;
  }

  /**
   * Format the error nicely for CLI output
   */
  override toString(): string {
    let output = `❌ ${this.message}`;
    if (this.configPath) {
      output += `\n   Config file: ${this.configPath}`;
    }
    if (this.suggestion) {
      output += `\n   💡 Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}
