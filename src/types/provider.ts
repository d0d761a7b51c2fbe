/**
 * Provider references recorded once tracker integration succeeds
 */

export type ProviderKind = 'github' | 'azuredevops';

export type ProviderSelector = 'auto' | ProviderKind;

export const PROVIDER_KINDS: readonly ProviderKind[] = ['github', 'azuredevops'];

export const PROVIDER_SELECTORS: readonly ProviderSelector[] = ['auto', ...PROVIDER_KINDS];

export interface GitHubIssueRef {
  readonly number: number;
  readonly htmlUrl: string;
  readonly title: string;
}

export interface GitHubPullRequestRef {
  readonly number: number;
  readonly htmlUrl: string;
  readonly title: string;
}

export interface GitHubReference {
  readonly kind: 'github';
  readonly apiUrl: string;
  readonly repo: string;
  readonly issue: GitHubIssueRef;
  readonly pr: GitHubPullRequestRef;
}

export interface AzureWorkItemRef {
  readonly id: number;
  readonly url: string;
}

export interface AzurePullRequestRef {
  readonly id: number;
  readonly url: string;
  readonly title: string;
}

export interface AzureDevOpsReference {
  readonly kind: 'azuredevops';
  readonly orgUrl: string;
  readonly project: string;
  readonly repo: string;
  readonly workItemType: string;
  readonly workItem: AzureWorkItemRef;
  readonly pr: AzurePullRequestRef;
}

export type ProviderReference = GitHubReference | AzureDevOpsReference;

export type CommentUpsertAction = 'created' | 'updated' | 'skipped';

export interface CommentUpsertResult {
  readonly action: CommentUpsertAction;
  readonly commentId: number | null;
}
