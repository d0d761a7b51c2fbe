/**
 * String helpers shared by the story locator and the templates
 */

const SLUG_MAX_LENGTH = 40;
const SLUG_FALLBACK = 'work';

/**
 * Reduces a title to a lowercase, dash separated branch segment
 *
 * Runs of anything other than ASCII letters and digits become a single dash,
 * the result is capped at 40 characters and falls back to `work` when empty.
 */
export function slugify(text: string, maxLength: number = SLUG_MAX_LENGTH): string {
  const slug = trimChars(text.trim().replace(/[^a-zA-Z0-9]+/g, '-'), '-')
    .toLowerCase()
    .replace(/-{2,}/g, '-');

  return slug.slice(0, maxLength) || SLUG_FALLBACK;
}

/**
 * Removes any of the given characters from both ends of a string
 */
export function trimChars(text: string, chars: string): string {
  let start = 0;
  let end = text.length;

  while (start < end && chars.includes(text.charAt(start))) {
    start++;
  }
  while (end > start && chars.includes(text.charAt(end - 1))) {
    end--;
  }

  return text.slice(start, end);
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * UTC timestamp with second precision, e.g. 2026-03-01T09:30:00Z
 */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
