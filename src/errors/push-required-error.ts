/**
 * Error thrown when a pull request would be opened for a branch that was not pushed
 */

export class PushRequiredError extends Error {
  public readonly provider: string;
  public readonly branch: string;

  constructor(provider: string, branch: string) {
    super(`${provider} PR creation requires pushing the branch ${branch}. Re-run with --push.`);
    this.name = 'PushRequiredError';
    this.provider = provider;
    this.branch = branch;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PushRequiredError);
    }
  }
}
