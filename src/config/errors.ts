/**
 * Configuration Errors
 */

/**
 * Invalid startup configuration. Raised before any file is watched.
 */
export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION';

  constructor(
    message: string,
    public readonly field?: string,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
