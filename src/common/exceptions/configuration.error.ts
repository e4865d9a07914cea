/**
 * Invalid deployment settings. Raised while loading configuration, before any
 * trades are processed, and is fatal to the process.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
