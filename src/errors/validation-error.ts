/**
 * Error thrown when a configuration value or a persisted record is malformed
 */

export class ValidationError extends Error {
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[], cause?: Error) {
    super(validationErrors.length > 0 ? `${message}: ${validationErrors.join('; ')}` : message, { cause });
    this.name = 'ValidationError';
    this.validationErrors = validationErrors;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }
}
