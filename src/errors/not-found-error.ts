/**
 * Error thrown when a story file or an autopilot state file is missing
 */

export type MissingResource = 'story' | 'state';

export class NotFoundError extends Error {
  public readonly resource: MissingResource;
  public readonly location: string;

  constructor(message: string, resource: MissingResource, location: string) {
    super(message);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.location = location;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NotFoundError);
    }
  }
}
