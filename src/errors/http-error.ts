/**
 * Error thrown for non-2xx HTTP responses
 */

export const BODY_EXCERPT_LIMIT = 1200;

export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodyExcerpt: string;

  constructor(status: number, statusText: string, url: string, body: string) {
    const bodyExcerpt = body.slice(0, BODY_EXCERPT_LIMIT);
    const reason = statusText ? ` ${statusText}` : '';
    super(`HTTP ${status}${reason} for ${url}: ${bodyExcerpt}`);
    this.name = 'HttpError';
    this.status = status;
    this.statusText = statusText;
    this.url = url;
    this.bodyExcerpt = bodyExcerpt;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}
