/**
 * Error thrown for a provider name other than github or azuredevops
 */

export class UnknownProviderError extends Error {
  public readonly provider: string;

  constructor(provider: string) {
    super(`Unknown provider: ${provider}`);
    this.name = 'UnknownProviderError';
    this.provider = provider;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnknownProviderError);
    }
  }
}
