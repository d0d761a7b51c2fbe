/**
 * Error thrown when an HTTP request fails before a response arrives
 */

export class NetworkError extends Error {
  public readonly url: string;

  constructor(url: string, cause?: Error) {
    super(`Network error for ${url}: ${cause ? cause.message : 'request failed'}`, { cause });
    this.name = 'NetworkError';
    this.url = url;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NetworkError);
    }
  }
}
