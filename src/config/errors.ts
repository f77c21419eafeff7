/**
 * Raised for configuration sources, options or values that cannot be
 * loaded or written.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}
