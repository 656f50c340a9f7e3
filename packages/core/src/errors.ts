/**
 * Error classes for the caching layer
 */

/**
 * Thrown when a cache or adapter is constructed with invalid options.
 * Never raised on the calculation path.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly option?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}
