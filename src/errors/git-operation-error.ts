/**
 * Error thrown when a git command fails
 */

export class GitOperationError extends Error {
  public readonly operation: string;

  constructor(message: string, operation: string, cause?: Error) {
    super(cause ? `${message}: ${cause.message}` : message, { cause });
    this.name = 'GitOperationError';
    this.operation = operation;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GitOperationError);
    }
  }
}
