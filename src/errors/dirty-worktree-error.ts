/**
 * Error thrown when the working tree has uncommitted changes
 */

export class DirtyWorktreeError extends Error {
  public readonly changedPaths: string[];

  constructor(changedPaths: string[]) {
    super('Working tree is not clean. Commit/stash changes, or re-run with --allow-untracked.');
    this.name = 'DirtyWorktreeError';
    this.changedPaths = changedPaths;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DirtyWorktreeError);
    }
  }
}
