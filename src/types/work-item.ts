/**
 * Work item (story) types
 */

export interface WorkItem {
  readonly id: string;
  readonly title: string;
  /** Absolute path of the story file */
  readonly filePath: string;
  /** Story file path relative to the repository root, with forward slashes */
  readonly relativePath: string;
  readonly content: string;
}
