/**
 * Error thrown when a work item id does not match the expected pattern
 */

export class InvalidIdentifierError extends Error {
  public readonly identifier: string;
  public readonly expectedPattern: string;

  constructor(identifier: string, expectedPattern: string) {
    super(`Invalid story id: ${identifier} (expected ${expectedPattern})`);
    this.name = 'InvalidIdentifierError';
    this.identifier = identifier;
    this.expectedPattern = expectedPattern;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidIdentifierError);
    }
  }
}
