/**
 * Configuration Loader - resolves provider settings
 *
 * Precedence for every value: explicit argument, then environment variable,
 * then what the origin remote implies. Empty strings count as unset.
 */

import { ValidationError } from '../errors';
import type {
  AzureDevOpsSettings,
  CredentialOverrides,
  GitHubSettings,
  ProviderKind,
  ProviderSelector,
  SettingsResolution
} from '../types';
import { parseAzureRemote, parseGitHubRemote } from '../utils/remote-url';
import { logger } from '../utils/logger';

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';
export const DEFAULT_BASE_BRANCH = 'main';
export const DEFAULT_WORK_ITEM_TYPE = 'User Story';

const GITHUB_REPO_FORMAT = /^[^/\s]+\/[^/\s]+$/;

export type Environment = Readonly<Record<string, string | undefined>>;

function firstSet(...values: Array<string | null | undefined>): string | undefined {
  for (const value of values) {
    if (value !== undefined && value !== null && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export class ConfigLoader {
  private readonly env: Environment;

  constructor(env: Environment) {
    this.env = env;
  }

  baseBranch(explicit?: string): string {
    return firstSet(explicit, this.env.AUTOPILOT_BASE_BRANCH) ?? DEFAULT_BASE_BRANCH;
  }

  githubToken(explicit?: string): string | undefined {
    return firstSet(explicit, this.env.GITHUB_TOKEN, this.env.GH_TOKEN);
  }

  githubApiUrl(...preferred: Array<string | undefined>): string {
    return stripTrailingSlash(
      firstSet(...preferred, this.env.GITHUB_API_URL) ?? DEFAULT_GITHUB_API_URL
    );
  }

  azurePat(explicit?: string): string | undefined {
    return firstSet(explicit, this.env.AZURE_DEVOPS_PAT);
  }

  /**
   * `auto` picks Azure DevOps when the origin remote is an Azure Repos URL
   */
  resolveProviderKind(selector: ProviderSelector, originUrl: string | null): ProviderKind {
    if (selector !== 'auto') {
      return selector;
    }
    const kind: ProviderKind = originUrl && parseAzureRemote(originUrl) ? 'azuredevops' : 'github';
    logger.debug('Provider selected from origin remote', { originUrl, kind });
    return kind;
  }

  /**
   * @throws {ValidationError} If the repository is not in owner/name form
   */
  resolveGitHub(
    overrides: CredentialOverrides,
    originUrl: string | null
  ): SettingsResolution<GitHubSettings> {
    const token = this.githubToken(overrides.githubToken);
    const repo = firstSet(
      overrides.githubRepo,
      this.env.GITHUB_REPOSITORY,
      originUrl ? parseGitHubRemote(originUrl) : null
    );
    const apiUrl = this.githubApiUrl(overrides.githubApiUrl);

    const missing: string[] = [];
    if (!token) {
      missing.push('GITHUB_TOKEN (or GH_TOKEN)');
    }
    if (!repo) {
      missing.push('repo (GITHUB_REPOSITORY)');
    }
    if (!token || !repo) {
      return { status: 'missing', missing };
    }

    if (!GITHUB_REPO_FORMAT.test(repo)) {
      throw new ValidationError('Invalid GitHub configuration', [
        `repository "${repo}" must be in owner/name form`
      ]);
    }

    return { status: 'resolved', settings: { token, repo, apiUrl } };
  }

  /**
   * Organization, project and repository come from the origin remote only
   * when none of the three was given explicitly or through the environment
   */
  resolveAzureDevOps(
    overrides: CredentialOverrides,
    originUrl: string | null
  ): SettingsResolution<AzureDevOpsSettings> {
    const pat = this.azurePat(overrides.azurePat);
    let orgUrl = firstSet(overrides.azureOrgUrl, this.env.AZURE_DEVOPS_ORG_URL);
    let project = firstSet(overrides.azureProject, this.env.AZURE_DEVOPS_PROJECT);
    let repo = firstSet(overrides.azureRepo, this.env.AZURE_DEVOPS_REPO);
    const workItemType =
      firstSet(overrides.azureWorkItemType, this.env.AZURE_DEVOPS_WORK_ITEM_TYPE) ??
      DEFAULT_WORK_ITEM_TYPE;

    if (!orgUrl && !project && !repo && originUrl) {
      const inferred = parseAzureRemote(originUrl);
      if (inferred) {
        ({ orgUrl, project, repo } = inferred);
        logger.debug('Azure DevOps coordinates inferred from origin remote', { orgUrl, project, repo });
      }
    }

    const missing: string[] = [];
    if (!pat) {
      missing.push('AZURE_DEVOPS_PAT');
    }
    if (!orgUrl) {
      missing.push('AZURE_DEVOPS_ORG_URL');
    }
    if (!project) {
      missing.push('AZURE_DEVOPS_PROJECT');
    }
    if (!repo) {
      missing.push('AZURE_DEVOPS_REPO');
    }
    if (!pat || !orgUrl || !project || !repo) {
      return { status: 'missing', missing };
    }

    return {
      status: 'resolved',
      settings: { pat, orgUrl: stripTrailingSlash(orgUrl), project, repo, workItemType }
    };
  }

  /**
   * Connection for an already-linked Azure DevOps pull request: recorded
   * coordinates win over the environment, the PAT is never recorded
   */
  azureConnection(
    recorded: Partial<Pick<AzureDevOpsSettings, 'orgUrl' | 'project' | 'repo'>>,
    patOverride?: string
  ): Partial<Pick<AzureDevOpsSettings, 'pat' | 'orgUrl' | 'project' | 'repo'>> {
    const orgUrl = firstSet(recorded.orgUrl, this.env.AZURE_DEVOPS_ORG_URL);
    return {
      pat: this.azurePat(patOverride),
      orgUrl: orgUrl === undefined ? undefined : stripTrailingSlash(orgUrl),
      project: firstSet(recorded.project, this.env.AZURE_DEVOPS_PROJECT),
      repo: firstSet(recorded.repo, this.env.AZURE_DEVOPS_REPO)
    };
  }
}
