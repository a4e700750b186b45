/**
 * Change classification.
 * Turns `git status --porcelain=v1` output into typed change records and
 * derives the groupings the commit message generator works from.
 */
import path from 'node:path';
import { IMAGE_EXTENSIONS } from '../render/assets.js';
import type { ChangeKind, ChangeRecord, ChangeSet } from './types.js';

const RENAME_ARROW = ' -> ';

const CHANGE_KINDS: readonly ChangeKind[] = ['added', 'modified', 'deleted', 'renamed'];

const QUOTE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  '"': '"',
  '\\': '\\',
};

/**
 * Undo git's C-style quoting of paths with special characters,
 * including octal-escaped UTF-8 bytes.
 */
export function unquotePath(value: string): string {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) {
    return value;
  }
  const body = value.slice(1, -1);
  const bytes: number[] = [];
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === '\\' && i + 1 < body.length) {
      const octal = /^[0-7]{3}/.exec(body.slice(i + 1, i + 4));
      if (octal) {
        bytes.push(parseInt(octal[0], 8));
        i += 3;
      } else {
        const next = body[i + 1];
        bytes.push(...Buffer.from(QUOTE_ESCAPES[next] ?? next, 'utf-8'));
        i += 1;
      }
      continue;
    }
    bytes.push(...Buffer.from(ch, 'utf-8'));
  }
  return Buffer.from(bytes).toString('utf-8');
}

function kindFromStatus(index: string, worktree: string): ChangeKind {
  if (index === '?' || worktree === '?') return 'added';
  if (index === 'D' || worktree === 'D') return 'deleted';
  if (index === 'A') return 'added';
  if (index === 'R' || worktree === 'R') return 'renamed';
  return 'modified';
}

/** Index of the ` -> ` separating two paths, ignoring arrows inside quoted paths */
function findRenameArrow(text: string): number {
  let quoted = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted && ch === '\\') {
      i++;
    } else if (ch === '"') {
      quoted = !quoted;
    } else if (!quoted && text.startsWith(RENAME_ARROW, i)) {
      return i;
    }
  }
  return -1;
}

/**
 * Parse one porcelain line (`XY PATH` or `XY OLD -> NEW`).
 * Returns null for lines that cannot be parsed.
 */
export function parseStatusLine(line: string): ChangeRecord | null {
  if (line.length < 4) return null;

  let pathText: string;
  if (line[2] === ' ') {
    pathText = line.slice(3);
  } else {
    const spaceIdx = line.indexOf(' ');
    if (spaceIdx < 2) return null;
    pathText = line.slice(spaceIdx + 1);
  }
  if (!pathText.trim()) return null;

  const kind = kindFromStatus(line[0], line[1]);
  const twoPaths = /[RC]/.test(line.slice(0, 2));
  const arrowIdx = twoPaths ? findRenameArrow(pathText) : -1;
  if (arrowIdx === -1) {
    return { path: unquotePath(pathText.trim()), kind };
  }

  const record: ChangeRecord = {
    path: unquotePath(pathText.slice(arrowIdx + RENAME_ARROW.length).trim()),
    kind,
  };
  if (kind === 'renamed') {
    record.previousPath = unquotePath(pathText.slice(0, arrowIdx).trim());
  }
  return record;
}

/**
 * Classify raw status lines. Malformed lines are skipped.
 */
export function classifyStatus(lines: string[]): ChangeSet {
  const changes: ChangeRecord[] = [];
  for (const line of lines) {
    const record = parseStatusLine(line);
    if (record) changes.push(record);
  }
  return { changes };
}

function segments(filePath: string): string[] {
  return filePath.split('/').filter(part => part.length > 0);
}

/**
 * The top-level directory a change belongs to. Null for root-level files
 * and for anything under a dot-directory (internal state).
 */
export function changeGroup(change: ChangeRecord): string | null {
  const parts = segments(change.path);
  if (parts.length < 2) return null;
  if (parts[0].startsWith('.')) return null;
  return parts[0];
}

export function isRootFile(change: ChangeRecord): boolean {
  const parts = segments(change.path);
  return parts.length === 1 && !parts[0].startsWith('.');
}

export function isImagePath(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(path.posix.extname(filePath).toLowerCase());
}

/**
 * Distinct groups with changes, sorted alphabetically.
 */
export function changedGroups(set: ChangeSet): string[] {
  const groups = new Set<string>();
  for (const change of set.changes) {
    const group = changeGroup(change);
    if (group) groups.add(group);
  }
  return [...groups].sort();
}

export function countByKind(set: ChangeSet): Record<ChangeKind, number> {
  const counts: Record<ChangeKind, number> = { added: 0, modified: 0, deleted: 0, renamed: 0 };
  for (const change of set.changes) {
    counts[change.kind]++;
  }
  return counts;
}

export function countImagesAdded(changes: ChangeRecord[]): number {
  return changes.filter(c => c.kind === 'added' && isImagePath(c.path)).length;
}

export function hasRootChanges(set: ChangeSet): boolean {
  return set.changes.some(isRootFile);
}

/**
 * One-line summary such as "2 added, 1 modified".
 */
export function formatChangeSummary(set: ChangeSet): string {
  const counts = countByKind(set);
  const parts = CHANGE_KINDS
    .filter(kind => counts[kind] > 0)
    .map(kind => `${counts[kind]} ${kind}`);
  return parts.length > 0 ? parts.join(', ') : 'no changes';
}
