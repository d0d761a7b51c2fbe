/**
 * Review Pack - markdown artifacts that accompany the pull request
 *
 * Covers the review checklist written by `start`, the pull request body and
 * the evidence summary posted by `evidence`.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { WorkItem } from '../types';
import { formatUtcTimestamp } from '../utils/text';
import { logger } from '../utils/logger';

export const REVIEW_PACK_DIR = path.join('artifacts', 'review-pack');

/** Identifies the evidence comment so later runs can find and replace it */
export const EVIDENCE_MARKER = '<!-- story-autopilot:evidence -->';

export const EVIDENCE_COMMANDS: readonly string[] = [
  './scripts/validate-project.sh',
  './scripts/validate-documentation.sh',
  './scripts/validate-rnd-policy.sh',
  'python3 scripts/traceability/traceability.py validate --stories-dir artifacts/stories --tests-root .'
];

export interface PullRequestBodyContext {
  readonly workItem: WorkItem;
  readonly reviewPackPath: string;
  /** `#12` for a GitHub issue, `WorkItem 345` for Azure DevOps */
  readonly workItemRef?: string;
}

export function renderReviewPack(workItem: WorkItem, generatedAt: Date): string {
  return [
    `# Review Pack — ${workItem.id}: ${workItem.title}`,
    '',
    `Generated: ${formatUtcTimestamp(generatedAt)}`,
    '',
    '## Links',
    `- Story file: \`${workItem.relativePath}\``,
    '',
    '## Scope (Human-verified)',
    '- [ ] Scope matches acceptance criteria',
    '- [ ] No new dependencies without ADR approval',
    '- [ ] Security model changes reviewed (if applicable)',
    '',
    '## Evidence (Autopilot)',
    '- [ ] `scripts/validate-project.sh`',
    '- [ ] `scripts/validate-documentation.sh`',
    '- [ ] `scripts/validate-rnd-policy.sh`',
    '- [ ] `python3 scripts/traceability/traceability.py validate`',
    '- [ ] Optional: `scripts/scaffold-and-verify.sh` (template build/test/coverage)',
    '',
    '## Notes',
    '- Add any reviewer notes, risks, or waivers here (link to ADRs/waivers if needed).',
    ''
  ].join('\n');
}

export function composePullRequestBody(context: PullRequestBodyContext): string {
  const { workItem, reviewPackPath, workItemRef } = context;
  const lines = [
    `## ${workItem.id}: ${workItem.title}`,
    '',
    `- Story: \`${workItem.relativePath}\``,
    `- Review pack: \`${reviewPackPath}\``
  ];

  if (workItemRef) {
    lines.push(`- Work item: ${workItemRef}`);
  }

  lines.push(
    '',
    '## Autopilot checklist',
    '- [ ] Evidence pack generated/updated',
    '- [ ] Traceability passes (Story → Test → Commit → Release)',
    '- [ ] Policy self-checks completed'
  );

  return `${lines.join('\n')}\n`;
}

export function composeEvidenceSummary(storyId: string, storyTitle: string, generatedAt: Date): string {
  return [
    `## Evidence Pack — ${storyId}: ${storyTitle}`,
    '',
    `Generated: ${formatUtcTimestamp(generatedAt)}`,
    '',
    '### Commands',
    ...EVIDENCE_COMMANDS.map((command) => `- \`${command}\``),
    '',
    '### Notes',
    '- This comment is managed by story-autopilot.'
  ].join('\n');
}

/**
 * Evidence summary prefixed with the marker line
 */
export function markEvidence(summary: string): string {
  return `${EVIDENCE_MARKER}\n${summary}`;
}

export class ReviewPackWriter {
  private readonly repoRoot: string;

  constructor(repoRoot: string) {
    this.repoRoot = repoRoot;
  }

  pathFor(storyId: string): string {
    return path.join(this.repoRoot, REVIEW_PACK_DIR, `${storyId}.md`);
  }

  /**
   * Writes (or overwrites) the review pack and returns its absolute path
   */
  async write(workItem: WorkItem, generatedAt: Date): Promise<string> {
    const reviewPackPath = this.pathFor(workItem.id);
    await fs.mkdir(path.dirname(reviewPackPath), { recursive: true });
    await fs.writeFile(reviewPackPath, renderReviewPack(workItem, generatedAt), 'utf-8');

    logger.info('Review pack written', { storyId: workItem.id, reviewPackPath });
    return reviewPackPath;
  }
}
