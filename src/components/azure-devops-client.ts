/**
 * Azure DevOps Client Component
 *
 * Work item lookup and creation, pull request creation, work item ↔ pull
 * request linking and pull request threads over the Azure DevOps REST API.
 */

import { z } from 'zod';
import type { AzureDevOpsSettings, AzurePullRequestRef, WorkItem } from '../types';
import { requestJson, parseResponse } from '../utils/http';
import type { HttpMethod } from '../utils/http';
import { escapeHtml } from '../utils/text';
import { logger } from '../utils/logger';
import { DRY_RUN_URL } from './github-client';

export const WIQL_API_VERSION = '7.1-preview.2';
export const WORK_ITEM_API_VERSION = '7.1-preview.3';
export const PULL_REQUEST_API_VERSION = '7.1-preview.1';
export const JSON_PATCH_CONTENT_TYPE = 'application/json-patch+json';

/** Longest slice of the story embedded in a new work item */
export const DESCRIPTION_CONTENT_LIMIT = 20_000;

const wiqlResultSchema = z.object({
  workItems: z.array(z.object({ id: z.number().int() })).optional()
});

const workItemSchema = z.object({
  id: z.number().int()
});

const pullRequestSchema = z.object({
  pullRequestId: z.number().int(),
  url: z.string(),
  title: z.string()
});

export type AzureDevOpsConnection = Pick<AzureDevOpsSettings, 'pat' | 'orgUrl' | 'project' | 'repo'>;

export interface AzureDevOpsClientConfig extends AzureDevOpsConnection {
  readonly dryRun: boolean;
}

export interface CreateAzurePullRequestParams {
  readonly sourceBranch: string;
  readonly targetBranch: string;
  readonly title: string;
  readonly description: string;
  readonly isDraft: boolean;
}

interface JsonPatchOperation {
  readonly op: 'add';
  readonly path: string;
  readonly value: unknown;
}

/**
 * Percent-encodes everything except unreserved characters; unlike
 * encodeURIComponent this also encodes `!'()*`
 */
export function encodeSegment(segment: string): string {
  return encodeURIComponent(segment).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

export function composeWorkItemDescription(workItem: WorkItem): string {
  return [
    '<p><strong>Managed by story-autopilot</strong></p>',
    `<p><strong>Story ID:</strong> ${workItem.id}</p>`,
    `<pre>${escapeHtml(workItem.content.slice(0, DESCRIPTION_CONTENT_LIMIT))}</pre>`
  ].join('\n');
}

export class AzureDevOpsClient {
  private readonly config: AzureDevOpsClientConfig;

  constructor(config: AzureDevOpsClientConfig) {
    this.config = config;
  }

  /**
   * Artifact URL Azure DevOps expects for a pull request relation
   */
  static pullRequestArtifactUrl(project: string, repo: string, pullRequestId: number): string {
    return `vstfs:///Git/PullRequestId/${encodeSegment(project)}%2F${encodeSegment(repo)}%2F${pullRequestId}`;
  }

  workItemUrl(workItemId: number): string {
    return `${this.config.orgUrl}/${this.config.project}/_workitems/edit/${workItemId}`;
  }

  /**
   * Most recently changed work item whose title contains the story id
   *
   * @returns The work item id, 0 in dry-run mode, or null when none matches
   */
  async findWorkItem(storyId: string): Promise<number | null> {
    if (this.config.dryRun) {
      logger.info('Dry run: skipping Azure DevOps work item query', { storyId });
      return 0;
    }

    const query =
      'SELECT [System.Id] FROM WorkItems ' +
      'WHERE [System.TeamProject] = @project ' +
      `AND [System.Title] CONTAINS '${storyId}' ` +
      'ORDER BY [System.ChangedDate] DESC';

    const data = await this.send('POST', `${this.projectUrl()}/_apis/wit/wiql?api-version=${WIQL_API_VERSION}`, {
      query
    });
    const { workItems } = parseResponse(wiqlResultSchema, data, 'Azure DevOps WIQL query');

    if (!workItems || workItems.length === 0) {
      logger.debug('No Azure DevOps work item matched', { storyId });
      return null;
    }

    logger.info('Found existing Azure DevOps work item', { storyId, workItemId: workItems[0].id });
    return workItems[0].id;
  }

  async createWorkItem(workItem: WorkItem, workItemType: string): Promise<number> {
    if (this.config.dryRun) {
      logger.info('Dry run: skipping Azure DevOps work item creation', { storyId: workItem.id });
      return 0;
    }

    const patch: JsonPatchOperation[] = [
      { op: 'add', path: '/fields/System.Title', value: `${workItem.id}: ${workItem.title}` },
      { op: 'add', path: '/fields/System.Description', value: composeWorkItemDescription(workItem) }
    ];

    const url =
      `${this.projectUrl()}/_apis/wit/workitems/$${encodeURIComponent(workItemType)}` +
      `?api-version=${WORK_ITEM_API_VERSION}`;
    const data = await this.send('POST', url, patch, JSON_PATCH_CONTENT_TYPE);
    const created = parseResponse(workItemSchema, data, 'Azure DevOps work item creation');

    logger.info('Created Azure DevOps work item', { storyId: workItem.id, workItemId: created.id, workItemType });
    return created.id;
  }

  async createPullRequest(params: CreateAzurePullRequestParams): Promise<AzurePullRequestRef> {
    if (this.config.dryRun) {
      logger.info('Dry run: skipping Azure DevOps pull request creation', { sourceBranch: params.sourceBranch });
      return { id: 0, url: DRY_RUN_URL, title: params.title };
    }

    const data = await this.send(
      'POST',
      `${this.repositoryUrl()}/pullrequests?api-version=${PULL_REQUEST_API_VERSION}`,
      {
        sourceRefName: `refs/heads/${params.sourceBranch}`,
        targetRefName: `refs/heads/${params.targetBranch}`,
        title: params.title,
        description: params.description,
        isDraft: params.isDraft
      }
    );
    const pr = parseResponse(pullRequestSchema, data, 'Azure DevOps pull request creation');

    logger.info('Created Azure DevOps pull request', { pullRequestId: pr.pullRequestId });
    return { id: pr.pullRequestId, url: pr.url, title: pr.title };
  }

  /**
   * Adds an ArtifactLink relation from the work item to the pull request;
   * does nothing in dry-run mode or when either id is 0
   */
  async linkWorkItemToPullRequest(workItemId: number, pullRequestId: number): Promise<boolean> {
    if (this.config.dryRun || workItemId === 0 || pullRequestId === 0) {
      logger.debug('Skipping work item link', { workItemId, pullRequestId, dryRun: this.config.dryRun });
      return false;
    }

    const patch: JsonPatchOperation[] = [
      {
        op: 'add',
        path: '/relations/-',
        value: {
          rel: 'ArtifactLink',
          url: AzureDevOpsClient.pullRequestArtifactUrl(this.config.project, this.config.repo, pullRequestId),
          attributes: { name: 'Pull Request' }
        }
      }
    ];

    await this.send(
      'PATCH',
      `${this.projectUrl()}/_apis/wit/workitems/${workItemId}?api-version=${WORK_ITEM_API_VERSION}`,
      patch,
      JSON_PATCH_CONTENT_TYPE
    );

    logger.info('Linked Azure DevOps work item to pull request', { workItemId, pullRequestId });
    return true;
  }

  /**
   * Posts a new active thread with one text comment. Every call appends.
   */
  async postPullRequestThread(pullRequestId: number, content: string): Promise<boolean> {
    if (this.config.dryRun || pullRequestId === 0) {
      logger.info('Dry run: skipping Azure DevOps thread comment', { pullRequestId });
      return false;
    }

    await this.send(
      'POST',
      `${this.repositoryUrl()}/pullRequests/${pullRequestId}/threads?api-version=${PULL_REQUEST_API_VERSION}`,
      { comments: [{ content, commentType: 1 }], status: 1 }
    );

    logger.info('Posted Azure DevOps thread comment', { pullRequestId });
    return true;
  }

  private projectUrl(): string {
    return `${this.config.orgUrl}/${this.config.project}`;
  }

  private repositoryUrl(): string {
    return `${this.projectUrl()}/_apis/git/repositories/${encodeURIComponent(this.config.repo)}`;
  }

  private send(method: HttpMethod, url: string, body: unknown, contentType?: string): Promise<unknown> {
    const credentials = Buffer.from(`:${this.config.pat}`, 'utf-8').toString('base64');
    return requestJson({
      method,
      url,
      headers: {
        Authorization: `Basic ${credentials}`,
        'User-Agent': 'story-autopilot'
      },
      body,
      contentType
    });
  }
}
