/**
 * Step bookkeeping for the start and evidence sequences
 */

/**
 * How a failing step affects the rest of the sequence
 *
 * - fatal: the error propagates and the command fails
 * - best-effort: the error is logged and the sequence continues
 */
export type FailurePolicy = 'fatal' | 'best-effort';

export type StartStep =
  | 'locate-story'
  | 'check-worktree'
  | 'fetch-base'
  | 'checkout-base'
  | 'pull-base'
  | 'create-branch'
  | 'write-review-pack'
  | 'persist-state'
  | 'commit-artifacts'
  | 'push-branch'
  | 'provider-integration'
  | 'persist-provider-state'
  | 'commit-provider-state'
  | 'push-provider-state';

export type EvidenceStep =
  | 'load-state'
  | 'run-validations'
  | 'post-evidence';

export interface StepRecord<TStep extends string = StartStep | EvidenceStep> {
  readonly name: TStep;
  readonly policy: FailurePolicy;
  readonly success: boolean;
  readonly duration: number;
  readonly error?: string;
}

export type StepOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };
