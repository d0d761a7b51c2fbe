/**
 * Persisted per-work-item autopilot record
 */

import type { ProviderReference } from './provider';

/**
 * Progress of `start` for one work item, in order
 */
export type AutopilotStage =
  | 'Uninitialized'
  | 'BranchCreated'
  | 'ReviewPackWritten'
  | 'StatePersisted'
  | 'ProviderLinked';

export const AUTOPILOT_STAGES: readonly AutopilotStage[] = [
  'Uninitialized',
  'BranchCreated',
  'ReviewPackWritten',
  'StatePersisted',
  'ProviderLinked'
];

export interface AutopilotState {
  readonly storyId: string;
  readonly storyTitle: string;
  readonly storyFile: string;
  readonly branch: string;
  readonly baseBranch: string;
  readonly createdAt: string;
  readonly stage: AutopilotStage;
  readonly provider?: ProviderReference;
}
