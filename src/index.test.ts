/**
 * Unit tests for the Autopilot orchestration class
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Autopilot, branchNameFor } from './index';
import type { AutopilotDependencies } from './index';
import { StateStore } from './components/state-store';
import {
  EVIDENCE_MARKER,
  composeEvidenceSummary,
  composePullRequestBody,
  markEvidence,
  renderReviewPack
} from './components/review-pack';
import {
  DirtyWorktreeError,
  InvalidIdentifierError,
  MissingCredentialsError,
  MissingProviderInfoError,
  NoProviderConfiguredError,
  NotFoundError,
  PushRequiredError
} from './errors';
import type {
  AutopilotState,
  AzureDevOpsReference,
  EvidenceOptions,
  GitHubReference,
  StartOptions
} from './types';

vi.mock('./utils/logger');

const GITHUB_REMOTE = 'git@github.com:acme/widgets.git';
const AZURE_REMOTE = 'https://dev.azure.com/acme/Platform/_git/widgets';
const NOW = new Date(Date.UTC(2026, 2, 1, 9, 30, 5));
const STORY = '# ACF-5: Refunds\n\nAs a customer I can request a refund.\n';

const startOptions: StartOptions = {
  storyId: 'ACF-5',
  storiesDir: 'artifacts/stories',
  provider: 'auto',
  draft: true,
  dryRun: false,
  allowUntracked: false,
  commit: false,
  push: false,
  requireIntegration: false,
  credentials: {}
};

const evidenceOptions: EvidenceOptions = {
  storyId: 'ACF-5',
  storiesDir: 'artifacts/stories',
  testsRoot: '.',
  runLocal: false,
  fullVerify: false,
  dryRun: false,
  credentials: {}
};

const baseState: AutopilotState = {
  storyId: 'ACF-5',
  storyTitle: 'Refunds',
  storyFile: 'artifacts/stories/ACF-5.md',
  branch: 'feature/ACF-5-refunds',
  baseBranch: 'main',
  createdAt: '2026-03-01T09:30:05Z',
  stage: 'StatePersisted'
};

const githubReference: GitHubReference = {
  kind: 'github',
  apiUrl: 'https://api.github.com',
  repo: 'acme/widgets',
  issue: { number: 12, htmlUrl: 'https://github.com/acme/widgets/issues/12', title: 'ACF-5: Refunds' },
  pr: { number: 34, htmlUrl: 'https://github.com/acme/widgets/pull/34', title: 'ACF-5: Refunds' }
};

const azureReference: AzureDevOpsReference = {
  kind: 'azuredevops',
  orgUrl: 'https://dev.azure.com/acme',
  project: 'Platform',
  repo: 'widgets',
  workItemType: 'User Story',
  workItem: { id: 101, url: 'https://dev.azure.com/acme/Platform/_workitems/edit/101' },
  pr: { id: 42, url: 'https://dev.azure.com/acme/Platform/_apis/git/repositories/widgets/pullRequests/42', title: 'ACF-5: Refunds' }
};

function createGit(remote: string | null = GITHUB_REMOTE) {
  return {
    getRemoteUrl: vi.fn().mockResolvedValue(remote),
    requireCleanWorktree: vi.fn().mockResolvedValue(undefined),
    fetchBranch: vi.fn().mockResolvedValue(undefined),
    checkout: vi.fn().mockResolvedValue(undefined),
    pullFastForward: vi.fn().mockResolvedValue(undefined),
    createBranch: vi.fn().mockResolvedValue(undefined),
    commitFiles: vi.fn().mockResolvedValue(undefined),
    pushBranch: vi.fn().mockResolvedValue(undefined),
    pushCurrent: vi.fn().mockResolvedValue(undefined)
  };
}

function createGitHub() {
  return {
    findOrCreateIssue: vi.fn().mockResolvedValue(githubReference.issue),
    createPullRequest: vi.fn().mockResolvedValue(githubReference.pr),
    upsertComment: vi.fn().mockResolvedValue({ action: 'created', commentId: 7 })
  };
}

function createAzure() {
  return {
    findWorkItem: vi.fn().mockResolvedValue(null),
    createWorkItem: vi.fn().mockResolvedValue(101),
    createPullRequest: vi.fn().mockResolvedValue(azureReference.pr),
    linkWorkItemToPullRequest: vi.fn().mockResolvedValue(true),
    postPullRequestThread: vi.fn().mockResolvedValue(true),
    workItemUrl: vi.fn((id: number) => `https://dev.azure.com/acme/Platform/_workitems/edit/${id}`)
  };
}

describe('branchNameFor', () => {
  it('should prefix the id and slug the title', () => {
    expect(branchNameFor({ id: 'ACF-5', title: 'Refunds & Returns!' })).toBe('feature/ACF-5-refunds-returns');
  });
});

describe('Autopilot', () => {
  let repoRoot: string;
  let git: ReturnType<typeof createGit>;
  let github: ReturnType<typeof createGitHub>;
  let azure: ReturnType<typeof createAzure>;
  let validationRunner: { runAll: ReturnType<typeof vi.fn> };
  let createGitHubClient: ReturnType<typeof vi.fn>;
  let createAzureDevOpsClient: ReturnType<typeof vi.fn>;

  function createAutopilot(overrides: Partial<AutopilotDependencies> = {}): Autopilot {
    return new Autopilot({
      repoRoot,
      env: {},
      git,
      validationRunner,
      createGitHubClient,
      createAzureDevOpsClient,
      now: () => NOW,
      ...overrides
    });
  }

  async function exists(relativePath: string): Promise<boolean> {
    return fs
      .stat(path.join(repoRoot, relativePath))
      .then(() => true)
      .catch(() => false);
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    repoRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'autopilot-'));
    await fs.mkdir(path.join(repoRoot, 'artifacts', 'stories'), { recursive: true });
    await fs.writeFile(path.join(repoRoot, 'artifacts', 'stories', 'ACF-5.md'), STORY);

    git = createGit();
    github = createGitHub();
    azure = createAzure();
    validationRunner = { runAll: vi.fn().mockResolvedValue([]) };
    createGitHubClient = vi.fn(() => github);
    createAzureDevOpsClient = vi.fn(() => azure);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  describe('start', () => {
    it('should write the artifacts without touching git in dry-run mode', async () => {
      const autopilot = createAutopilot();

      const result = await autopilot.start({ ...startOptions, dryRun: true, commit: true, push: true });

      expect(result.branch).toBe('feature/ACF-5-refunds');
      expect(result.baseBranch).toBe('main');
      expect(result.stage).toBe('StatePersisted');
      expect(result.reference).toBeUndefined();
      expect(result.steps.map((step) => step.name)).toEqual([
        'locate-story',
        'write-review-pack',
        'persist-state',
        'provider-integration'
      ]);

      expect(await fs.readFile(result.reviewPackPath, 'utf-8')).toBe(renderReviewPack(result.workItem, NOW));
      expect(JSON.parse(await fs.readFile(result.statePath, 'utf-8'))).toEqual(baseState);

      expect(git.requireCleanWorktree).not.toHaveBeenCalled();
      expect(git.checkout).not.toHaveBeenCalled();
      expect(git.createBranch).not.toHaveBeenCalled();
      expect(git.commitFiles).not.toHaveBeenCalled();
      expect(git.pushBranch).not.toHaveBeenCalled();
      expect(createGitHubClient).not.toHaveBeenCalled();
    });

    it('should record placeholder references in dry-run mode with credentials', async () => {
      const fetchStub = vi.fn();
      vi.stubGlobal('fetch', fetchStub);
      const autopilot = createAutopilot({ env: { GITHUB_TOKEN: 'test-secret' }, createGitHubClient: undefined });

      const result = await autopilot.start({ ...startOptions, dryRun: true });

      expect(fetchStub).not.toHaveBeenCalled();

      const placeholder = { number: 0, htmlUrl: '(dry-run)', title: 'ACF-5: Refunds' };
      expect(result.stage).toBe('ProviderLinked');
      expect(result.reference).toEqual({
        kind: 'github',
        apiUrl: 'https://api.github.com',
        repo: 'acme/widgets',
        issue: placeholder,
        pr: placeholder
      });
      await expect(new StateStore(repoRoot).load('ACF-5')).resolves.toMatchObject({
        stage: 'ProviderLinked',
        provider: { kind: 'github', pr: placeholder }
      });
    });

    it('should reject a malformed id before any side effect', async () => {
      const autopilot = createAutopilot();

      await expect(autopilot.start({ ...startOptions, storyId: 'acf-5' })).rejects.toThrow(InvalidIdentifierError);

      expect(git.requireCleanWorktree).not.toHaveBeenCalled();
      expect(await exists('artifacts/review-pack')).toBe(false);
      expect(await exists('artifacts/autopilot')).toBe(false);
    });

    it('should fail with NotFoundError when the story is missing', async () => {
      await expect(createAutopilot().start({ ...startOptions, storyId: 'ACF-9' })).rejects.toThrow(NotFoundError);
    });

    it('should stop on a dirty worktree before creating the branch', async () => {
      git.requireCleanWorktree.mockRejectedValue(new DirtyWorktreeError(['src/app.ts']));

      await expect(createAutopilot().start(startOptions)).rejects.toThrow(DirtyWorktreeError);

      expect(git.createBranch).not.toHaveBeenCalled();
      expect(await exists('artifacts/review-pack/ACF-5.md')).toBe(false);
    });

    it('should pass allow-untracked through to the worktree check', async () => {
      await createAutopilot().start({ ...startOptions, allowUntracked: true });

      expect(git.requireCleanWorktree).toHaveBeenCalledWith(true);
    });

    it('should continue when fetching or pulling the base branch fails', async () => {
      git.fetchBranch.mockRejectedValue(new Error('could not resolve host'));
      git.pullFastForward.mockRejectedValue(new Error('not possible to fast-forward'));

      const result = await createAutopilot().start(startOptions);

      expect(result.stage).toBe('StatePersisted');
      expect(result.steps.find((step) => step.name === 'fetch-base')).toMatchObject({
        policy: 'best-effort',
        success: false,
        error: 'could not resolve host'
      });
      expect(result.steps.find((step) => step.name === 'pull-base')).toMatchObject({ success: false });
      expect(git.createBranch).toHaveBeenCalledWith('feature/ACF-5-refunds');
    });

    it('should use the configured base branch', async () => {
      const autopilot = createAutopilot({ env: { AUTOPILOT_BASE_BRANCH: 'develop' } });

      const result = await autopilot.start(startOptions);

      expect(result.baseBranch).toBe('develop');
      expect(git.fetchBranch).toHaveBeenCalledWith('develop');
      expect(git.checkout).toHaveBeenCalledWith('develop');
    });

    it('should skip integration quietly when credentials are missing', async () => {
      const result = await createAutopilot().start(startOptions);

      expect(result.provider).toBe('github');
      expect(result.reference).toBeUndefined();
      expect(result.stage).toBe('StatePersisted');
      expect(createGitHubClient).not.toHaveBeenCalled();
    });

    it('should fail when integration is required but credentials are missing', async () => {
      const error = await createAutopilot()
        .start({ ...startOptions, requireIntegration: true })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(MissingCredentialsError);
      expect(error).toMatchObject({ message: 'GitHub integration requires GITHUB_TOKEN (or GH_TOKEN).' });
    });

    it('should require a push before opening a pull request', async () => {
      const autopilot = createAutopilot({ env: { GITHUB_TOKEN: 'test-secret' } });

      const error = await autopilot.start({ ...startOptions, commit: true }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(PushRequiredError);
      expect(error).toMatchObject({
        message: 'GitHub PR creation requires pushing the branch feature/ACF-5-refunds. Re-run with --push.'
      });
      expect(createGitHubClient).not.toHaveBeenCalled();
      expect(git.commitFiles).toHaveBeenCalledTimes(1);
      await expect(new StateStore(repoRoot).load('ACF-5')).resolves.toEqual(baseState);
    });

    it('should create the issue and pull request and record them', async () => {
      const autopilot = createAutopilot({ env: { GITHUB_TOKEN: 'test-secret' } });

      const result = await autopilot.start({ ...startOptions, push: true });

      expect(git.commitFiles).toHaveBeenNthCalledWith(1, 'ACF-5: start autopilot', [
        'artifacts/review-pack/ACF-5.md',
        'artifacts/autopilot/ACF-5.json'
      ]);
      expect(git.pushBranch).toHaveBeenCalledWith('feature/ACF-5-refunds');
      expect(createGitHubClient).toHaveBeenCalledWith({
        token: 'test-secret',
        repo: 'acme/widgets',
        apiUrl: 'https://api.github.com',
        dryRun: false
      });
      expect(github.findOrCreateIssue).toHaveBeenCalledWith(result.workItem);
      expect(github.createPullRequest).toHaveBeenCalledWith({
        head: 'feature/ACF-5-refunds',
        base: 'main',
        title: 'ACF-5: Refunds',
        body: composePullRequestBody({
          workItem: result.workItem,
          reviewPackPath: 'artifacts/review-pack/ACF-5.md',
          workItemRef: '#12'
        }),
        draft: true
      });
      expect(git.commitFiles).toHaveBeenNthCalledWith(2, 'ACF-5: link work item and PR', [
        'artifacts/autopilot/ACF-5.json'
      ]);
      expect(git.pushCurrent).toHaveBeenCalledTimes(1);

      expect(result.stage).toBe('ProviderLinked');
      expect(result.reference).toEqual(githubReference);
      await expect(new StateStore(repoRoot).load('ACF-5')).resolves.toEqual({
        ...baseState,
        stage: 'ProviderLinked',
        provider: githubReference
      });
    });

    it('should keep going when committing the linked state fails', async () => {
      git.commitFiles.mockResolvedValueOnce(undefined).mockRejectedValueOnce(new Error('nothing to commit'));
      const autopilot = createAutopilot({ env: { GITHUB_TOKEN: 'test-secret' } });

      const result = await autopilot.start({ ...startOptions, push: true });

      expect(result.stage).toBe('ProviderLinked');
      expect(git.pushCurrent).not.toHaveBeenCalled();
      expect(result.steps.find((step) => step.name === 'commit-provider-state')).toMatchObject({
        policy: 'best-effort',
        success: false
      });
    });

    it('should create and link an Azure DevOps work item', async () => {
      git = createGit(AZURE_REMOTE);
      const autopilot = createAutopilot({ env: { AZURE_DEVOPS_PAT: 'test-secret' } });

      const result = await autopilot.start({ ...startOptions, push: true, draft: false });

      expect(result.provider).toBe('azuredevops');
      expect(createAzureDevOpsClient).toHaveBeenCalledWith({
        pat: 'test-secret',
        orgUrl: 'https://dev.azure.com/acme',
        project: 'Platform',
        repo: 'widgets',
        dryRun: false
      });
      expect(azure.findWorkItem).toHaveBeenCalledWith('ACF-5');
      expect(azure.createWorkItem).toHaveBeenCalledWith(result.workItem, 'User Story');
      expect(azure.createPullRequest).toHaveBeenCalledWith({
        sourceBranch: 'feature/ACF-5-refunds',
        targetBranch: 'main',
        title: 'ACF-5: Refunds',
        description: composePullRequestBody({
          workItem: result.workItem,
          reviewPackPath: 'artifacts/review-pack/ACF-5.md',
          workItemRef: 'WorkItem 101'
        }),
        isDraft: false
      });
      expect(azure.linkWorkItemToPullRequest).toHaveBeenCalledWith(101, 42);
      expect(result.reference).toEqual(azureReference);
    });

    it('should reuse an existing Azure DevOps work item', async () => {
      git = createGit(AZURE_REMOTE);
      azure.findWorkItem.mockResolvedValue(77);
      const autopilot = createAutopilot({ env: { AZURE_DEVOPS_PAT: 'test-secret' } });

      const result = await autopilot.start({ ...startOptions, push: true });

      expect(azure.createWorkItem).not.toHaveBeenCalled();
      expect(azure.linkWorkItemToPullRequest).toHaveBeenCalledWith(77, 42);
      expect(result.reference).toMatchObject({
        workItem: { id: 77, url: 'https://dev.azure.com/acme/Platform/_workitems/edit/77' }
      });
    });

    it('should honour an explicit provider over the remote', async () => {
      const autopilot = createAutopilot({ env: { AZURE_DEVOPS_PAT: 'test-secret' } });

      const result = await autopilot.start({
        ...startOptions,
        provider: 'azuredevops',
        push: true,
        credentials: { azureOrgUrl: 'https://dev.azure.com/acme/', azureProject: 'Platform', azureRepo: 'widgets' }
      });

      expect(result.provider).toBe('azuredevops');
      expect(createAzureDevOpsClient).toHaveBeenCalledWith(
        expect.objectContaining({ orgUrl: 'https://dev.azure.com/acme' })
      );
      expect(createGitHubClient).not.toHaveBeenCalled();
    });
  });

  describe('evidence', () => {
    const summary = composeEvidenceSummary('ACF-5', 'Refunds', NOW);

    async function saveState(state: AutopilotState): Promise<void> {
      await new StateStore(repoRoot).save(state);
    }

    it('should reject a malformed id', async () => {
      await expect(createAutopilot().evidence({ ...evidenceOptions, storyId: 'ACF5' })).rejects.toThrow(
        InvalidIdentifierError
      );
    });

    it('should fail when no state was recorded', async () => {
      await expect(createAutopilot().evidence(evidenceOptions)).rejects.toThrow(NotFoundError);
    });

    it('should fail when start never linked a provider', async () => {
      await saveState(baseState);

      await expect(createAutopilot().evidence(evidenceOptions)).rejects.toThrow(NoProviderConfiguredError);
      expect(createGitHubClient).not.toHaveBeenCalled();
      expect(createAzureDevOpsClient).not.toHaveBeenCalled();
    });

    it('should upsert the GitHub evidence comment', async () => {
      await saveState({ ...baseState, stage: 'ProviderLinked', provider: githubReference });
      const autopilot = createAutopilot({ env: { GITHUB_TOKEN: 'test-secret' } });

      const result = await autopilot.evidence(evidenceOptions);

      expect(createGitHubClient).toHaveBeenCalledWith({
        token: 'test-secret',
        repo: 'acme/widgets',
        apiUrl: 'https://api.github.com',
        dryRun: false
      });
      expect(github.upsertComment).toHaveBeenCalledWith(34, EVIDENCE_MARKER, summary);
      expect(validationRunner.runAll).not.toHaveBeenCalled();
      expect(result).toEqual({
        storyId: 'ACF-5',
        provider: 'github',
        pullRequest: 34,
        comment: { action: 'created', commentId: 7 },
        body: markEvidence(summary),
        dryRun: false,
        steps: [
          expect.objectContaining({ name: 'load-state', success: true }),
          expect.objectContaining({ name: 'post-evidence', success: true })
        ]
      });
    });

    it('should name what is missing for GitHub', async () => {
      await saveState({
        ...baseState,
        stage: 'ProviderLinked',
        provider: { ...githubReference, pr: { ...githubReference.pr, number: 0 } }
      });

      const error = await createAutopilot().evidence(evidenceOptions).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(MissingProviderInfoError);
      expect(error).toMatchObject({
        message: 'Missing GitHub provider info (pr/token). Re-run start with integration enabled.'
      });
      expect(github.upsertComment).not.toHaveBeenCalled();
    });

    it('should append an Azure DevOps thread on every run', async () => {
      await saveState({ ...baseState, stage: 'ProviderLinked', provider: azureReference });
      const autopilot = createAutopilot({ env: { AZURE_DEVOPS_PAT: 'test-secret' } });

      const first = await autopilot.evidence(evidenceOptions);
      await autopilot.evidence(evidenceOptions);

      expect(createAzureDevOpsClient).toHaveBeenCalledWith({
        pat: 'test-secret',
        orgUrl: 'https://dev.azure.com/acme',
        project: 'Platform',
        repo: 'widgets',
        dryRun: false
      });
      expect(azure.postPullRequestThread).toHaveBeenCalledTimes(2);
      expect(azure.postPullRequestThread).toHaveBeenCalledWith(42, markEvidence(summary));
      expect(first).toMatchObject({
        provider: 'azuredevops',
        pullRequest: 42,
        comment: { action: 'created', commentId: null }
      });
    });

    it('should name what is missing for Azure DevOps', async () => {
      await saveState({ ...baseState, stage: 'ProviderLinked', provider: azureReference });

      const error = await createAutopilot().evidence(evidenceOptions).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(MissingProviderInfoError);
      expect(error).toMatchObject({
        message: 'Missing Azure DevOps provider info (pat). Re-run start with integration enabled.'
      });
    });

    it('should run the local validations first and still post when they fail', async () => {
      await saveState({ ...baseState, stage: 'ProviderLinked', provider: githubReference });
      validationRunner.runAll.mockRejectedValue(new Error('spawn bash ENOENT'));
      const autopilot = createAutopilot({ env: { GITHUB_TOKEN: 'test-secret' } });

      const result = await autopilot.evidence({ ...evidenceOptions, runLocal: true, fullVerify: true });

      expect(validationRunner.runAll).toHaveBeenCalledWith({
        storiesDir: 'artifacts/stories',
        testsRoot: '.',
        fullVerify: true
      });
      expect(result.steps.map((step) => [step.name, step.success])).toEqual([
        ['load-state', true],
        ['run-validations', false],
        ['post-evidence', true]
      ]);
      expect(github.upsertComment).toHaveBeenCalledTimes(1);
    });
  });
});
