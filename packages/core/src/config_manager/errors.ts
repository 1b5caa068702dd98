/**
 * Thrown when a configuration file exists but cannot be used: unreadable,
 * not valid YAML, or not matching the config schema.
 */
export class ConfigValidationError extends Error {
  public readonly source: string;
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.source = source;
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}
