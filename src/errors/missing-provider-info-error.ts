/**
 * Error thrown when recorded state lacks what `evidence` needs to reach the PR
 */

export class MissingProviderInfoError extends Error {
  public readonly provider: string;
  public readonly missing: string[];

  constructor(provider: string, missing: string[]) {
    super(
      `Missing ${provider} provider info (${missing.join('/')}). Re-run start with integration enabled.`
    );
    this.name = 'MissingProviderInfoError';
    this.provider = provider;
    this.missing = missing;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MissingProviderInfoError);
    }
  }
}
