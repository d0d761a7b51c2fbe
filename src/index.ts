/**
 * Main entry point for story-autopilot
 *
 * Orchestrates the two commands:
 * - start: locate story → branch → review pack → state → provider issue/PR → state
 * - evidence: load state → local validations → post evidence comment
 */

import * as path from 'path';
import { ConfigLoader, type Environment } from './components/config-loader';
import { GitDriver } from './components/git-driver';
import { GitHubClient, type GitHubClientConfig } from './components/github-client';
import { AzureDevOpsClient, type AzureDevOpsClientConfig } from './components/azure-devops-client';
import {
  EVIDENCE_MARKER,
  ReviewPackWriter,
  composeEvidenceSummary,
  composePullRequestBody,
  markEvidence
} from './components/review-pack';
import { StateStore } from './components/state-store';
import { StoryLocator, assertStoryId, toPosix } from './components/story-locator';
import { ValidationRunner } from './components/validation-runner';
import { logger } from './utils/logger';
import { sanitizeForLogging } from './utils/sanitize';
import { slugify, formatUtcTimestamp } from './utils/text';
import {
  MissingCredentialsError,
  MissingProviderInfoError,
  NoProviderConfiguredError,
  PushRequiredError
} from './errors';
import type {
  AutopilotStage,
  AutopilotState,
  AzureDevOpsReference,
  CommentUpsertResult,
  EvidenceOptions,
  EvidenceResult,
  EvidenceStep,
  FailurePolicy,
  GitHubReference,
  ProviderReference,
  StartOptions,
  StartResult,
  StartStep,
  StepOutcome,
  StepRecord,
  WorkItem
} from './types';

export * from './types';
export * from './errors';
export * from './utils';

export type GitOperations = Pick<
  GitDriver,
  | 'getRemoteUrl'
  | 'requireCleanWorktree'
  | 'fetchBranch'
  | 'checkout'
  | 'pullFastForward'
  | 'createBranch'
  | 'commitFiles'
  | 'pushBranch'
  | 'pushCurrent'
>;

export type GitHubOperations = Pick<GitHubClient, 'findOrCreateIssue' | 'createPullRequest' | 'upsertComment'>;

export type AzureDevOpsOperations = Pick<
  AzureDevOpsClient,
  | 'findWorkItem'
  | 'createWorkItem'
  | 'createPullRequest'
  | 'linkWorkItemToPullRequest'
  | 'postPullRequestThread'
  | 'workItemUrl'
>;

export type ValidationOperations = Pick<ValidationRunner, 'runAll'>;

export interface AutopilotDependencies {
  /** Repository root; story, review pack and state paths are resolved from it */
  readonly repoRoot: string;
  readonly env: Environment;
  readonly git?: GitOperations;
  readonly validationRunner?: ValidationOperations;
  readonly createGitHubClient?: (config: GitHubClientConfig) => GitHubOperations;
  readonly createAzureDevOpsClient?: (config: AzureDevOpsClientConfig) => AzureDevOpsOperations;
  readonly now?: () => Date;
}

interface PostedEvidence {
  readonly pullRequest: number;
  readonly comment: CommentUpsertResult;
}

/**
 * Branch name for a work item: `feature/<id>-<slug(title)>`
 */
export function branchNameFor(workItem: Pick<WorkItem, 'id' | 'title'>): string {
  return `feature/${workItem.id}-${slugify(workItem.title)}`;
}

/**
 * Runs the start and evidence sequences against one repository
 */
export class Autopilot {
  readonly repoRoot: string;
  private readonly config: ConfigLoader;
  private readonly git: GitOperations;
  private readonly locator: StoryLocator;
  private readonly reviewPacks: ReviewPackWriter;
  private readonly states: StateStore;
  private readonly validationRunner: ValidationOperations;
  private readonly createGitHubClient: (config: GitHubClientConfig) => GitHubOperations;
  private readonly createAzureDevOpsClient: (config: AzureDevOpsClientConfig) => AzureDevOpsOperations;
  private readonly now: () => Date;

  constructor(dependencies: AutopilotDependencies) {
    this.repoRoot = dependencies.repoRoot;
    this.config = new ConfigLoader(dependencies.env);
    this.git = dependencies.git ?? new GitDriver({ repoPath: dependencies.repoRoot });
    this.locator = new StoryLocator(dependencies.repoRoot);
    this.reviewPacks = new ReviewPackWriter(dependencies.repoRoot);
    this.states = new StateStore(dependencies.repoRoot);
    this.validationRunner = dependencies.validationRunner ?? new ValidationRunner(dependencies.repoRoot);
    this.createGitHubClient = dependencies.createGitHubClient ?? ((config) => new GitHubClient(config));
    this.createAzureDevOpsClient =
      dependencies.createAzureDevOpsClient ?? ((config) => new AzureDevOpsClient(config));
    this.now = dependencies.now ?? (() => new Date());
  }

  /**
   * Autopilot rooted at the top level of the repository containing `cwd`
   */
  static async forWorkingDirectory(cwd: string, env: Environment): Promise<Autopilot> {
    const git = new GitDriver({ repoPath: cwd });
    const repoRoot = await git.getRepoRoot();
    return new Autopilot({ repoRoot, env, git: new GitDriver({ repoPath: repoRoot }) });
  }

  /**
   * Prepares a work item: branch, review pack, state and (when configured)
   * the tracker issue or work item plus a pull request
   */
  async start(options: StartOptions): Promise<StartResult> {
    const steps: StepRecord<StartStep>[] = [];
    const commit = options.commit || options.push;
    const baseBranch = this.config.baseBranch(options.baseBranch);
    let stage: AutopilotStage = 'Uninitialized';

    logger.info('Starting autopilot', {
      storyId: options.storyId,
      provider: options.provider,
      baseBranch,
      dryRun: options.dryRun
    });

    const workItem = await this.fatal(steps, 'locate-story', () =>
      this.locator.locate(options.storyId, options.storiesDir)
    );
    const branch = branchNameFor(workItem);

    if (!options.dryRun) {
      await this.fatal(steps, 'check-worktree', () => this.git.requireCleanWorktree(options.allowUntracked));
      await this.bestEffort(steps, 'fetch-base', () => this.git.fetchBranch(baseBranch));
      await this.fatal(steps, 'checkout-base', () => this.git.checkout(baseBranch));
      await this.bestEffort(steps, 'pull-base', () => this.git.pullFastForward());
      await this.fatal(steps, 'create-branch', () => this.git.createBranch(branch));
      stage = 'BranchCreated';
    }

    const createdAt = this.now();
    const reviewPackPath = await this.fatal(steps, 'write-review-pack', () =>
      this.reviewPacks.write(workItem, createdAt)
    );
    stage = 'ReviewPackWritten';

    const baseState: AutopilotState = {
      storyId: workItem.id,
      storyTitle: workItem.title,
      storyFile: workItem.relativePath,
      branch,
      baseBranch,
      createdAt: formatUtcTimestamp(createdAt),
      stage: 'StatePersisted'
    };
    const statePath = await this.fatal(steps, 'persist-state', () => this.states.save(baseState));
    stage = 'StatePersisted';

    const artifacts = [this.relative(reviewPackPath), this.relative(statePath)];
    if (commit && !options.dryRun) {
      await this.fatal(steps, 'commit-artifacts', () =>
        this.git.commitFiles(`${workItem.id}: start autopilot`, artifacts)
      );
      if (options.push) {
        await this.fatal(steps, 'push-branch', () => this.git.pushBranch(branch));
      }
    }

    const originUrl = await this.git.getRemoteUrl();
    const provider = this.config.resolveProviderKind(options.provider, originUrl);

    const reference = await this.fatal(steps, 'provider-integration', (): Promise<ProviderReference | undefined> =>
      provider === 'github'
        ? this.integrateGitHub(options, workItem, branch, baseBranch, reviewPackPath, originUrl)
        : this.integrateAzureDevOps(options, workItem, branch, baseBranch, reviewPackPath, originUrl)
    );

    if (reference) {
      const linked: AutopilotState = { ...baseState, stage: 'ProviderLinked', provider: reference };
      await this.fatal(steps, 'persist-provider-state', () => this.states.save(linked));
      stage = 'ProviderLinked';

      if (commit && !options.dryRun) {
        const committed = await this.bestEffort(steps, 'commit-provider-state', () =>
          this.git.commitFiles(`${workItem.id}: link work item and PR`, [this.relative(statePath)])
        );
        if (options.push && committed.ok) {
          await this.bestEffort(steps, 'push-provider-state', () => this.git.pushCurrent());
        }
      }
    }

    logger.info('Autopilot start finished', {
      storyId: workItem.id,
      branch,
      stage,
      provider: reference?.kind ?? null
    });

    return {
      workItem,
      branch,
      baseBranch,
      reviewPackPath,
      statePath,
      provider,
      ...(reference && { reference }),
      stage,
      dryRun: options.dryRun,
      steps
    };
  }

  /**
   * Optionally runs the local validations, then posts the evidence summary to
   * the pull request recorded in state
   */
  async evidence(options: EvidenceOptions): Promise<EvidenceResult> {
    const steps: StepRecord<EvidenceStep>[] = [];
    assertStoryId(options.storyId);

    const state = await this.fatal(steps, 'load-state', () => this.states.load(options.storyId));

    if (options.runLocal) {
      await this.bestEffort(steps, 'run-validations', () =>
        this.validationRunner.runAll({
          storiesDir: options.storiesDir,
          testsRoot: options.testsRoot,
          fullVerify: options.fullVerify
        })
      );
    }

    const summary = composeEvidenceSummary(state.storyId, state.storyTitle, this.now());
    const body = markEvidence(summary);
    const provider = state.provider;

    if (!provider) {
      throw new NoProviderConfiguredError(state.storyId);
    }

    const posted = await this.fatal(steps, 'post-evidence', (): Promise<PostedEvidence> =>
      provider.kind === 'github'
        ? this.postGitHubEvidence(provider, options, summary)
        : this.postAzureDevOpsEvidence(provider, options, body)
    );

    return {
      storyId: state.storyId,
      provider: provider.kind,
      pullRequest: posted.pullRequest,
      comment: posted.comment,
      body,
      dryRun: options.dryRun,
      steps
    };
  }

  private async integrateGitHub(
    options: StartOptions,
    workItem: WorkItem,
    branch: string,
    baseBranch: string,
    reviewPackPath: string,
    originUrl: string | null
  ): Promise<GitHubReference | undefined> {
    const resolution = this.config.resolveGitHub(options.credentials, originUrl);
    if (resolution.status === 'missing') {
      return this.skipIntegration('GitHub', resolution.missing, options.requireIntegration);
    }
    if (!options.push && !options.dryRun) {
      throw new PushRequiredError('GitHub', branch);
    }

    const { settings } = resolution;
    const client = this.createGitHubClient({ ...settings, dryRun: options.dryRun });

    const issue = await client.findOrCreateIssue(workItem);
    const body = composePullRequestBody({
      workItem,
      reviewPackPath: this.relative(reviewPackPath),
      ...(issue.number !== 0 && { workItemRef: `#${issue.number}` })
    });
    const pr = await client.createPullRequest({
      head: branch,
      base: baseBranch,
      title: `${workItem.id}: ${workItem.title}`,
      body,
      draft: options.draft
    });

    return { kind: 'github', apiUrl: settings.apiUrl, repo: settings.repo, issue, pr };
  }

  private async integrateAzureDevOps(
    options: StartOptions,
    workItem: WorkItem,
    branch: string,
    baseBranch: string,
    reviewPackPath: string,
    originUrl: string | null
  ): Promise<AzureDevOpsReference | undefined> {
    const resolution = this.config.resolveAzureDevOps(options.credentials, originUrl);
    if (resolution.status === 'missing') {
      return this.skipIntegration('Azure DevOps', resolution.missing, options.requireIntegration);
    }
    if (!options.push && !options.dryRun) {
      throw new PushRequiredError('Azure DevOps', branch);
    }

    const { settings } = resolution;
    const client = this.createAzureDevOpsClient({
      pat: settings.pat,
      orgUrl: settings.orgUrl,
      project: settings.project,
      repo: settings.repo,
      dryRun: options.dryRun
    });

    const workItemId =
      (await client.findWorkItem(workItem.id)) ?? (await client.createWorkItem(workItem, settings.workItemType));
    const description = composePullRequestBody({
      workItem,
      reviewPackPath: this.relative(reviewPackPath),
      workItemRef: `WorkItem ${workItemId}`
    });
    const pr = await client.createPullRequest({
      sourceBranch: branch,
      targetBranch: baseBranch,
      title: `${workItem.id}: ${workItem.title}`,
      description,
      isDraft: options.draft
    });
    await client.linkWorkItemToPullRequest(workItemId, pr.id);

    return {
      kind: 'azuredevops',
      orgUrl: settings.orgUrl,
      project: settings.project,
      repo: settings.repo,
      workItemType: settings.workItemType,
      workItem: { id: workItemId, url: client.workItemUrl(workItemId) },
      pr
    };
  }

  /**
   * @throws {MissingCredentialsError} When integration is required
   */
  private skipIntegration(provider: string, missing: string[], required: boolean): undefined {
    if (required) {
      throw new MissingCredentialsError(provider, missing);
    }
    logger.info(`${provider} integration skipped: settings incomplete`, { missing });
    return undefined;
  }

  private async postGitHubEvidence(
    reference: GitHubReference,
    options: EvidenceOptions,
    summary: string
  ): Promise<PostedEvidence> {
    const token = this.config.githubToken(options.credentials.githubToken);
    const prNumber = reference.pr.number;

    const missing: string[] = [];
    if (!reference.repo) {
      missing.push('repo');
    }
    if (prNumber === 0) {
      missing.push('pr');
    }
    if (!token) {
      missing.push('token');
    }
    if (!token || missing.length > 0) {
      throw new MissingProviderInfoError('GitHub', missing);
    }

    const client = this.createGitHubClient({
      token,
      repo: reference.repo,
      apiUrl: this.config.githubApiUrl(reference.apiUrl),
      dryRun: options.dryRun
    });
    const comment = await client.upsertComment(prNumber, EVIDENCE_MARKER, summary);

    return { pullRequest: prNumber, comment };
  }

  private async postAzureDevOpsEvidence(
    reference: AzureDevOpsReference,
    options: EvidenceOptions,
    body: string
  ): Promise<PostedEvidence> {
    const { pat, orgUrl, project, repo } = this.config.azureConnection(reference, options.credentials.azurePat);
    const pullRequestId = reference.pr.id;

    const missing: string[] = [];
    if (!orgUrl) {
      missing.push('orgUrl');
    }
    if (!project) {
      missing.push('project');
    }
    if (!repo) {
      missing.push('repo');
    }
    if (pullRequestId === 0) {
      missing.push('prId');
    }
    if (!pat) {
      missing.push('pat');
    }
    if (!pat || !orgUrl || !project || !repo || missing.length > 0) {
      throw new MissingProviderInfoError('Azure DevOps', missing);
    }

    const client = this.createAzureDevOpsClient({ pat, orgUrl, project, repo, dryRun: options.dryRun });
    const posted = await client.postPullRequestThread(pullRequestId, body);

    return {
      pullRequest: pullRequestId,
      comment: { action: posted ? 'created' : 'skipped', commentId: null }
    };
  }

  private relative(absolutePath: string): string {
    return toPosix(path.relative(this.repoRoot, absolutePath));
  }

  private async fatal<TStep extends string, T>(
    steps: StepRecord<TStep>[],
    name: TStep,
    action: () => Promise<T>
  ): Promise<T> {
    const outcome = await this.runStep(steps, name, 'fatal', action);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  private bestEffort<TStep extends string, T>(
    steps: StepRecord<TStep>[],
    name: TStep,
    action: () => Promise<T>
  ): Promise<StepOutcome<T>> {
    return this.runStep(steps, name, 'best-effort', action);
  }

  /**
   * Runs one step and records its outcome; a fatal failure is returned for
   * the caller to rethrow, a best-effort failure is logged and swallowed
   */
  private async runStep<TStep extends string, T>(
    steps: StepRecord<TStep>[],
    name: TStep,
    policy: FailurePolicy,
    action: () => Promise<T>
  ): Promise<StepOutcome<T>> {
    const stepStartTime = Date.now();

    try {
      const value = await action();
      steps.push({ name, policy, success: true, duration: Date.now() - stepStartTime });
      return { ok: true, value };
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      const sanitizedError = sanitizeForLogging(error);

      steps.push({ name, policy, success: false, duration: Date.now() - stepStartTime, error: sanitizedError });

      if (policy === 'best-effort') {
        logger.warn(`Step ${name} failed, continuing`, { step: name, error: sanitizedError });
      } else {
        logger.error(`Step ${name} failed`, { step: name, error: sanitizedError });
      }

      return { ok: false, error };
    }
  }
}

