/**
 * Error thrown when provider integration is required but settings are missing
 */

export class MissingCredentialsError extends Error {
  public readonly provider: string;
  public readonly missing: string[];

  constructor(provider: string, missing: string[]) {
    super(`${provider} integration requires ${missing.join(', ')}.`);
    this.name = 'MissingCredentialsError';
    this.provider = provider;
    this.missing = missing;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MissingCredentialsError);
    }
  }
}
