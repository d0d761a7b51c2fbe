/**
 * Error thrown when a response body does not have the expected shape
 */

export class UnexpectedResponseError extends Error {
  public readonly context: string;
  public readonly issues: string[];

  constructor(context: string, issues: string[]) {
    super(`Unexpected response from ${context}: ${issues.join('; ')}`);
    this.name = 'UnexpectedResponseError';
    this.context = context;
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnexpectedResponseError);
    }
  }
}
