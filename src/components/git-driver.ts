/**
 * Git Driver - thin wrapper over the git commands the autopilot issues
 */

import simpleGit, { type SimpleGit } from 'simple-git';
import { DirtyWorktreeError, GitOperationError } from '../errors';
import { logger } from '../utils/logger';

export interface GitDriverConfig {
  readonly repoPath: string;
  readonly remote?: string;
}

export class GitDriver {
  private readonly git: SimpleGit;
  private readonly remote: string;

  constructor(config: GitDriverConfig) {
    this.git = simpleGit(config.repoPath);
    this.remote = config.remote ?? 'origin';
  }

  async getRepoRoot(): Promise<string> {
    return this.run('rev-parse', async () => {
      const root = await this.git.revparse(['--show-toplevel']);
      return root.trim();
    });
  }

  /**
   * URL of the configured remote, or null when there is none
   */
  async getRemoteUrl(): Promise<string | null> {
    try {
      const url = await this.git.remote(['get-url', this.remote]);
      const trimmed = typeof url === 'string' ? url.trim() : '';
      return trimmed || null;
    } catch (error) {
      logger.debug('No remote URL available', {
        remote: this.remote,
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }

  /**
   * Paths with pending changes; untracked paths are left out when allowed
   */
  async listChanges(allowUntracked: boolean): Promise<string[]> {
    const status = await this.run('status', () => this.git.status());
    const untracked = new Set(status.not_added);

    return status.files
      .map((file) => file.path)
      .filter((filePath) => !(allowUntracked && untracked.has(filePath)));
  }

  /**
   * @throws {DirtyWorktreeError} If anything besides tolerated untracked files changed
   */
  async requireCleanWorktree(allowUntracked: boolean): Promise<void> {
    const changes = await this.listChanges(allowUntracked);
    if (changes.length > 0) {
      logger.warn('Working tree is not clean', { changes });
      throw new DirtyWorktreeError(changes);
    }
  }

  async fetchBranch(branch: string): Promise<void> {
    logger.info('Fetching branch', { remote: this.remote, branch });
    await this.run('fetch', () => this.git.fetch(this.remote, branch));
  }

  async checkout(branch: string): Promise<void> {
    logger.info('Checking out branch', { branch });
    await this.run('checkout', () => this.git.checkout(branch));
  }

  async pullFastForward(): Promise<void> {
    logger.info('Fast-forwarding current branch');
    await this.run('pull', () => this.git.pull(undefined, undefined, ['--ff-only']));
  }

  /**
   * Creates the branch from HEAD and checks it out (`checkout -b`)
   */
  async createBranch(branch: string): Promise<void> {
    logger.info('Creating branch', { branch });
    await this.run('checkout -b', () => this.git.checkoutLocalBranch(branch));
  }

  async commitFiles(message: string, files: string[]): Promise<void> {
    logger.info('Committing changes', { message, fileCount: files.length });
    await this.run('add', () => this.git.add(files));
    await this.run('commit', () => this.git.commit(message));
  }

  /**
   * Pushes a branch and records it as upstream (`push -u`)
   */
  async pushBranch(branch: string): Promise<void> {
    logger.info('Pushing branch', { remote: this.remote, branch });
    await this.run('push', () => this.git.push(this.remote, branch, ['--set-upstream']));
  }

  /**
   * Pushes the current branch to its upstream
   */
  async pushCurrent(): Promise<void> {
    logger.info('Pushing current branch');
    await this.run('push', () => this.git.push());
  }

  private async run<T>(operation: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw new GitOperationError(
        `git ${operation} failed`,
        operation,
        error instanceof Error ? error : undefined
      );
    }
  }
}
