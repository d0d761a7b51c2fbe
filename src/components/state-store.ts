/**
 * State Store - per-work-item JSON record under artifacts/autopilot
 *
 * Read-modify-write without locking; each write replaces the whole file.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { NotFoundError, UnknownProviderError, ValidationError } from '../errors';
import { PROVIDER_KINDS, AUTOPILOT_STAGES } from '../types';
import type { AutopilotState, AutopilotStage, ProviderKind, ProviderReference } from '../types';
import { logger } from '../utils/logger';

export const STATE_DIR = path.join('artifacts', 'autopilot');

const githubReferenceSchema = z.object({
  kind: z.literal('github'),
  apiUrl: z.string(),
  repo: z.string(),
  issue: z.object({
    number: z.number().int(),
    htmlUrl: z.string(),
    title: z.string()
  }),
  pr: z.object({
    number: z.number().int(),
    htmlUrl: z.string(),
    title: z.string()
  })
});

const azureDevOpsReferenceSchema = z.object({
  kind: z.literal('azuredevops'),
  orgUrl: z.string(),
  project: z.string(),
  repo: z.string(),
  workItemType: z.string(),
  workItem: z.object({
    id: z.number().int(),
    url: z.string()
  }),
  pr: z.object({
    id: z.number().int(),
    url: z.string(),
    title: z.string()
  })
});

const providerReferenceSchema = z.discriminatedUnion('kind', [
  githubReferenceSchema,
  azureDevOpsReferenceSchema
]);

const stageSchema = z.custom<AutopilotStage>(
  (value) => typeof value === 'string' && AUTOPILOT_STAGES.some((stage) => stage === value),
  { message: 'Unknown stage' }
);

const stateRecordSchema = z.object({
  storyId: z.string(),
  storyTitle: z.string(),
  storyFile: z.string(),
  branch: z.string(),
  baseBranch: z.string(),
  createdAt: z.string(),
  stage: stageSchema.optional(),
  provider: z.unknown().optional()
});

const providerKindProbe = z.object({ kind: z.string() });

function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some((kind) => kind === value);
}

/**
 * Serializes with object keys sorted at every level, two-space indent and a
 * trailing newline
 */
export function serializeState(value: unknown): string {
  return `${JSON.stringify(sortKeys(value), null, 2)}\n`;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sortKeys(item));
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/**
 * Validates a decoded state file
 *
 * A provider block without a `kind` counts as absent.
 *
 * @throws {UnknownProviderError} If the recorded provider kind is not supported
 * @throws {ValidationError} If the record is malformed
 */
export function parseState(raw: unknown, source: string): AutopilotState {
  const record = stateRecordSchema.safeParse(raw);
  if (!record.success) {
    throw new ValidationError(
      `Malformed autopilot state in ${source}`,
      record.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const { provider: rawProvider, stage, ...fields } = record.data;
  let provider: ProviderReference | undefined;

  const probe = providerKindProbe.safeParse(rawProvider);
  if (probe.success) {
    if (!isProviderKind(probe.data.kind)) {
      throw new UnknownProviderError(probe.data.kind);
    }
    const parsed = providerReferenceSchema.safeParse(rawProvider);
    if (!parsed.success) {
      throw new ValidationError(
        `Malformed provider block in ${source}`,
        parsed.error.issues.map((issue) => `provider.${issue.path.join('.')}: ${issue.message}`)
      );
    }
    provider = parsed.data;
  }

  return {
    ...fields,
    stage: stage ?? (provider ? 'ProviderLinked' : 'StatePersisted'),
    ...(provider && { provider })
  };
}

export class StateStore {
  private readonly repoRoot: string;

  constructor(repoRoot: string) {
    this.repoRoot = repoRoot;
  }

  pathFor(storyId: string): string {
    return path.join(this.repoRoot, STATE_DIR, `${storyId}.json`);
  }

  /**
   * @throws {NotFoundError} If `start` never ran for this id
   */
  async load(storyId: string): Promise<AutopilotState> {
    const statePath = this.pathFor(storyId);

    let content: string;
    try {
      content = await fs.readFile(statePath, 'utf-8');
    } catch (error) {
      logger.debug('State file unreadable', {
        statePath,
        error: error instanceof Error ? error.message : String(error)
      });
      throw new NotFoundError(`Autopilot state not found: ${statePath}`, 'state', statePath);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(
        `Malformed autopilot state in ${statePath}`,
        ['not valid JSON'],
        error instanceof Error ? error : undefined
      );
    }

    return parseState(raw, statePath);
  }

  async save(state: AutopilotState): Promise<string> {
    const statePath = this.pathFor(state.storyId);
    await fs.mkdir(path.dirname(statePath), { recursive: true });
    await fs.writeFile(statePath, serializeState(state), 'utf-8');

    logger.info('Autopilot state written', {
      statePath,
      stage: state.stage,
      provider: state.provider?.kind
    });

    return statePath;
  }
}
