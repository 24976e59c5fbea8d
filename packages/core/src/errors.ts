/**
 * Raised for missing secrets or unusable settings. The runner treats this as
 * the only fatal error class: it prints the message and exits immediately.
 */
export class ConfigError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.missing = missing;
  }
}
