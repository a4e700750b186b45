/**
 * Document exclusion for sync runs.
 * Patterns come from the repository config file and an optional
 * .notion-sync-ignore file at the repository root.
 */
import fs from 'node:fs';
import path from 'node:path';
import { minimatch } from 'minimatch';

export const IGNORE_FILE_NAME = '.notion-sync-ignore';

/**
 * Load patterns from the ignore file, one per line; `#` starts a comment.
 * Returns an empty array if the file doesn't exist.
 */
export function loadIgnoreFile(repoRoot: string): string[] {
  const ignoreFile = path.join(repoRoot, IGNORE_FILE_NAME);
  if (!fs.existsSync(ignoreFile)) return [];
  const content = fs.readFileSync(ignoreFile, 'utf-8');
  return content
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Combine config-level patterns with the ignore file, deduplicated.
 */
export function resolveExcludePatterns(configExclude: string[], repoRoot: string): string[] {
  const all = new Set([...configExclude, ...loadIgnoreFile(repoRoot)]);
  return [...all];
}

/**
 * Check whether a document is excluded. Patterns are matched
 * case-insensitively against both the directory name and the title.
 */
export function isExcluded(document: { title: string; directory: string }, patterns: string[]): boolean {
  return patterns.some(
    pattern =>
      minimatch(document.directory, pattern, { nocase: true, dot: true }) ||
      minimatch(document.title, pattern, { nocase: true, dot: true }),
  );
}
