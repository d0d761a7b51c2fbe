/**
 * Configuration types for the start and evidence commands
 */

import type { ProviderReference, ProviderSelector, CommentUpsertResult, ProviderKind } from './provider';
import type { AutopilotStage } from './state';
import type { StepRecord, StartStep, EvidenceStep } from './step';
import type { WorkItem } from './work-item';

/**
 * Values given explicitly on the command line; they win over the environment
 */
export interface CredentialOverrides {
  readonly githubToken?: string;
  readonly githubRepo?: string;
  readonly githubApiUrl?: string;
  readonly azurePat?: string;
  readonly azureOrgUrl?: string;
  readonly azureProject?: string;
  readonly azureRepo?: string;
  readonly azureWorkItemType?: string;
}

export interface StartOptions {
  readonly storyId: string;
  readonly storiesDir: string;
  readonly provider: ProviderSelector;
  readonly baseBranch?: string;
  readonly draft: boolean;
  readonly dryRun: boolean;
  readonly allowUntracked: boolean;
  readonly commit: boolean;
  readonly push: boolean;
  readonly requireIntegration: boolean;
  readonly credentials: CredentialOverrides;
}

export interface EvidenceOptions {
  readonly storyId: string;
  readonly storiesDir: string;
  readonly testsRoot: string;
  readonly runLocal: boolean;
  readonly fullVerify: boolean;
  readonly dryRun: boolean;
  readonly credentials: Pick<CredentialOverrides, 'githubToken' | 'azurePat'>;
}

export interface GitHubSettings {
  readonly token: string;
  readonly repo: string;
  readonly apiUrl: string;
}

export interface AzureDevOpsSettings {
  readonly pat: string;
  readonly orgUrl: string;
  readonly project: string;
  readonly repo: string;
  readonly workItemType: string;
}

export type SettingsResolution<T> =
  | { readonly status: 'resolved'; readonly settings: T }
  | { readonly status: 'missing'; readonly missing: string[] };

export interface StartResult {
  readonly workItem: WorkItem;
  readonly branch: string;
  readonly baseBranch: string;
  readonly reviewPackPath: string;
  readonly statePath: string;
  readonly provider: ProviderKind;
  readonly reference?: ProviderReference;
  readonly stage: AutopilotStage;
  readonly dryRun: boolean;
  readonly steps: StepRecord<StartStep>[];
}

export interface EvidenceResult {
  readonly storyId: string;
  readonly provider: ProviderKind;
  /** PR number (GitHub) or pull request id (Azure DevOps) */
  readonly pullRequest: number;
  readonly comment: CommentUpsertResult;
  readonly body: string;
  readonly dryRun: boolean;
  readonly steps: StepRecord<EvidenceStep>[];
}
