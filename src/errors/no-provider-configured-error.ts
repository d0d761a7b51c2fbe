/**
 * Error thrown by `evidence` when `start` never linked a provider
 */

export class NoProviderConfiguredError extends Error {
  public readonly storyId: string;

  constructor(storyId: string) {
    super(
      `No provider integration recorded in state for ${storyId}. Re-run start with integration enabled.`
    );
    this.name = 'NoProviderConfiguredError';
    this.storyId = storyId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NoProviderConfiguredError);
    }
  }
}
