/**
 * GitHub Client Component
 *
 * Finds or opens the tracking issue, opens the pull request and keeps a single
 * evidence comment up to date. In dry-run mode no request is sent and
 * placeholders (number 0, URL `(dry-run)`) are returned.
 */

import { Octokit } from '@octokit/rest';
import { z } from 'zod';
import { HttpError, NetworkError } from '../errors';
import type {
  CommentUpsertResult,
  GitHubIssueRef,
  GitHubPullRequestRef,
  GitHubSettings,
  WorkItem
} from '../types';
import { HTTP_TIMEOUT_MS, parseResponse } from '../utils/http';
import { logger } from '../utils/logger';

export const GITHUB_API_VERSION = '2022-11-28';
export const USER_AGENT = 'story-autopilot';
export const ISSUE_LABELS: readonly string[] = ['story-autopilot', 'autopilot'];
export const DRY_RUN_URL = '(dry-run)';

const issueSchema = z.object({
  number: z.number().int(),
  html_url: z.string(),
  title: z.string()
});

const searchResultSchema = z.object({
  items: z.array(issueSchema)
});

const commentSchema = z.object({
  id: z.number().int(),
  body: z.string().nullish()
});

const commentListSchema = z.array(commentSchema);

export interface GitHubClientConfig extends GitHubSettings {
  readonly dryRun: boolean;
}

export interface CreatePullRequestParams {
  readonly head: string;
  readonly base: string;
  readonly title: string;
  readonly body: string;
  readonly draft: boolean;
}

/**
 * Issue body: the story is the source of truth and is embedded verbatim
 */
export function composeIssueBody(workItem: WorkItem): string {
  return [
    `${workItem.id}: ${workItem.title}`,
    '',
    'This issue is managed by story-autopilot.',
    '',
    `**Story File (source of truth)**: \`${workItem.relativePath}\``,
    '',
    '---',
    workItem.content
  ].join('\n').trim();
}

export class GitHubClient {
  private readonly config: GitHubClientConfig;
  private readonly owner: string;
  private readonly repo: string;
  private readonly octokit: Octokit;

  constructor(config: GitHubClientConfig) {
    this.config = config;
    const [owner, ...rest] = config.repo.split('/');
    this.owner = owner;
    this.repo = rest.join('/');
    this.octokit = new Octokit({
      auth: config.token,
      baseUrl: config.apiUrl,
      userAgent: USER_AGENT
    });
  }

  /**
   * Returns the first issue whose title mentions the story id, creating one
   * when the search comes back empty
   */
  async findOrCreateIssue(workItem: WorkItem): Promise<GitHubIssueRef> {
    const title = `${workItem.id}: ${workItem.title}`;

    if (this.config.dryRun) {
      logger.info('Dry run: skipping GitHub issue lookup', { storyId: workItem.id });
      return { number: 0, htmlUrl: DRY_RUN_URL, title };
    }

    const query = `repo:${this.config.repo} ${workItem.id} in:title type:issue`;
    const search = await this.call('search issues', '/search/issues', () =>
      this.octokit.search.issuesAndPullRequests({
        q: query,
        headers: this.headers(),
        request: this.requestOptions()
      })
    );
    const { items } = parseResponse(searchResultSchema, search.data, 'GitHub issue search');

    if (items.length > 0) {
      const existing = items[0];
      logger.info('Found existing GitHub issue', { storyId: workItem.id, number: existing.number });
      return { number: existing.number, htmlUrl: existing.html_url, title: existing.title };
    }

    const created = await this.call('create issue', `/repos/${this.config.repo}/issues`, () =>
      this.octokit.issues.create({
        owner: this.owner,
        repo: this.repo,
        title,
        body: composeIssueBody(workItem),
        labels: [...ISSUE_LABELS],
        headers: this.headers(),
        request: this.requestOptions()
      })
    );
    const issue = parseResponse(issueSchema, created.data, 'GitHub issue creation');

    logger.info('Created GitHub issue', { storyId: workItem.id, number: issue.number });
    return { number: issue.number, htmlUrl: issue.html_url, title: issue.title };
  }

  async createPullRequest(params: CreatePullRequestParams): Promise<GitHubPullRequestRef> {
    if (this.config.dryRun) {
      logger.info('Dry run: skipping GitHub pull request creation', { head: params.head });
      return { number: 0, htmlUrl: DRY_RUN_URL, title: params.title };
    }

    const response = await this.call('create pull request', `/repos/${this.config.repo}/pulls`, () =>
      this.octokit.pulls.create({
        owner: this.owner,
        repo: this.repo,
        title: params.title,
        head: params.head,
        base: params.base,
        body: params.body,
        draft: params.draft,
        headers: this.headers(),
        request: this.requestOptions()
      })
    );
    const pr = parseResponse(issueSchema, response.data, 'GitHub pull request creation');

    logger.info('Created GitHub pull request', { number: pr.number, head: params.head, base: params.base });
    return { number: pr.number, htmlUrl: pr.html_url, title: pr.title };
  }

  /**
   * Updates the first comment (within the latest 100) containing the marker,
   * or creates one; the posted body is `marker + "\n" + body`
   */
  async upsertComment(prNumber: number, marker: string, body: string): Promise<CommentUpsertResult> {
    if (this.config.dryRun) {
      logger.info('Dry run: skipping GitHub comment upsert', { prNumber });
      return { action: 'skipped', commentId: null };
    }

    const finalBody = `${marker}\n${body}`;
    const listed = await this.call(
      'list comments',
      `/repos/${this.config.repo}/issues/${prNumber}/comments`,
      () =>
        this.octokit.issues.listComments({
          owner: this.owner,
          repo: this.repo,
          issue_number: prNumber,
          per_page: 100,
          headers: this.headers(),
          request: this.requestOptions()
        })
    );
    const comments = parseResponse(commentListSchema, listed.data, 'GitHub comment listing');
    const existing = comments.find((comment) => (comment.body ?? '').includes(marker));

    if (existing) {
      await this.call('update comment', `/repos/${this.config.repo}/issues/comments/${existing.id}`, () =>
        this.octokit.issues.updateComment({
          owner: this.owner,
          repo: this.repo,
          comment_id: existing.id,
          body: finalBody,
          headers: this.headers(),
          request: this.requestOptions()
        })
      );
      logger.info('Updated GitHub evidence comment', { prNumber, commentId: existing.id });
      return { action: 'updated', commentId: existing.id };
    }

    const created = await this.call('create comment', `/repos/${this.config.repo}/issues/${prNumber}/comments`, () =>
      this.octokit.issues.createComment({
        owner: this.owner,
        repo: this.repo,
        issue_number: prNumber,
        body: finalBody,
        headers: this.headers(),
        request: this.requestOptions()
      })
    );
    const comment = parseResponse(commentSchema, created.data, 'GitHub comment creation');

    logger.info('Created GitHub evidence comment', { prNumber, commentId: comment.id });
    return { action: 'created', commentId: comment.id };
  }

  private headers(): Record<string, string> {
    return { 'x-github-api-version': GITHUB_API_VERSION };
  }

  private requestOptions(): { signal: AbortSignal } {
    return { signal: AbortSignal.timeout(HTTP_TIMEOUT_MS) };
  }

  /**
   * Maps Octokit failures onto HttpError (a response arrived) or NetworkError
   */
  private async call<T>(operation: string, route: string, action: () => Promise<T>): Promise<T> {
    const url = `${this.config.apiUrl}${route}`;
    try {
      return await action();
    } catch (error) {
      logger.error(`GitHub ${operation} failed`, error, { url });
      throw toTransportError(error, url);
    }
  }
}

const octokitFailureSchema = z.object({
  status: z.number(),
  message: z.string().optional(),
  response: z
    .object({
      data: z.unknown().optional()
    })
    .optional()
});

export function toTransportError(error: unknown, url: string): Error {
  const failure = octokitFailureSchema.safeParse(error);
  if (failure.success && failure.data.response) {
    const data = failure.data.response.data;
    const body = typeof data === 'string' ? data : JSON.stringify(data ?? '');
    return new HttpError(failure.data.status, '', url, body);
  }
  return new NetworkError(url, error instanceof Error ? error : undefined);
}
