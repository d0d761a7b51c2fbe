/**
 * Story Locator - resolves a work item id to its story file and title
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { InvalidIdentifierError, NotFoundError } from '../errors';
import type { WorkItem } from '../types';
import { trimChars } from '../utils/text';
import { logger } from '../utils/logger';

export const STORY_ID_PATTERN = /^ACF-\d+$/;
export const STORY_ID_EXAMPLE = 'ACF-###';

/** Frontmatter is only searched within this many lines of the opening fence */
const FRONTMATTER_SCAN_LINES = 80;

export interface ParsedTitle {
  readonly frontmatterTitle: string;
  readonly headingTitle: string;
  readonly title: string;
}

/**
 * @throws {InvalidIdentifierError} If the id does not match ACF-<digits>
 */
export function assertStoryId(storyId: string): void {
  if (!STORY_ID_PATTERN.test(storyId)) {
    throw new InvalidIdentifierError(storyId, STORY_ID_EXAMPLE);
  }
}

/**
 * Extracts the title of a story
 *
 * A `title:` key in leading frontmatter wins. Otherwise the first markdown
 * heading is used, with the id removed and spaces, dashes and colons trimmed
 * from both ends. Falls back to `Untitled`.
 */
export function extractTitle(storyId: string, content: string): ParsedTitle {
  const lines = content.split(/\r?\n/);
  let frontmatterTitle = '';

  if (content.startsWith('---')) {
    for (const line of lines.slice(1, FRONTMATTER_SCAN_LINES)) {
      if (line.trim() === '---') {
        break;
      }
      if (line.toLowerCase().startsWith('title:')) {
        frontmatterTitle = line.slice(line.indexOf(':') + 1).trim();
        break;
      }
    }
  }

  let headingTitle = '';
  for (const line of lines) {
    const match = /^#+\s+(.+)$/.exec(line.trim());
    if (match) {
      headingTitle = match[1].trim();
      break;
    }
  }

  const fromHeading = trimChars(headingTitle.split(storyId).join(''), ' -:');

  return {
    frontmatterTitle,
    headingTitle,
    title: frontmatterTitle || fromHeading || 'Untitled'
  };
}

export class StoryLocator {
  private readonly repoRoot: string;

  constructor(repoRoot: string) {
    this.repoRoot = repoRoot;
  }

  /**
   * Finds `<storiesDir>/<id>.md`, or else the first markdown file under
   * `storiesDir` (sorted by path) that mentions the id as a whole token
   *
   * @throws {InvalidIdentifierError} If the id is malformed
   * @throws {NotFoundError} If no story file matches
   */
  async locate(storyId: string, storiesDir: string): Promise<WorkItem> {
    assertStoryId(storyId);

    const directory = path.resolve(this.repoRoot, storiesDir);
    logger.debug('Locating story', { storyId, directory });

    let filePath: string | null = path.join(directory, `${storyId}.md`);
    if (!(await isFile(filePath))) {
      filePath = await this.scanForId(directory, storyId);
    }

    if (!filePath) {
      throw new NotFoundError(
        `Story file not found for ${storyId} under ${directory}`,
        'story',
        directory
      );
    }

    const content = await fs.readFile(filePath, 'utf-8');
    const { title } = extractTitle(storyId, content);

    logger.info('Story located', { storyId, filePath, title });

    return {
      id: storyId,
      title,
      filePath,
      relativePath: toPosix(path.relative(this.repoRoot, filePath)),
      content
    };
  }

  private async scanForId(directory: string, storyId: string): Promise<string | null> {
    const candidates = (await listMarkdownFiles(directory)).sort();
    // ACF-1 must not match inside ACF-12
    const mention = new RegExp(`${storyId}(?!\\d)`);

    for (const candidate of candidates) {
      const content = await fs.readFile(candidate, 'utf-8');
      if (mention.test(content)) {
        logger.debug('Story found by content scan', { storyId, candidate });
        return candidate;
      }
    }

    return null;
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

async function listMarkdownFiles(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true }).catch(() => null);
  if (!entries) {
    return [];
  }

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listMarkdownFiles(fullPath)));
    } else if (entry.isFile() && entry.name.endsWith('.md')) {
      files.push(fullPath);
    }
  }
  return files;
}

export function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/');
}
