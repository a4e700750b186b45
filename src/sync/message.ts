/**
 * Commit message generation.
 * Maps a classified change set to a single Conventional-Commits message:
 * `docs(<scope>): <action>` for one topic, a summary plus body otherwise.
 */
import { changeGroup, changedGroups, countImagesAdded, hasRootChanges } from './changes.js';
import type { ChangeRecord, ChangeSet } from './types.js';

const MAX_SCOPE_LENGTH = 30;
const DEFAULT_SCOPE = 'docs';
const CONTENT_FILE = 'readme.md';

/**
 * Make a group or document name safe to embed as a commit scope.
 * Never returns an empty string.
 */
export function sanitizeScope(scope: string): string {
  let sanitized = scope.trim();
  if (sanitized.length > MAX_SCOPE_LENGTH) {
    sanitized = sanitized.slice(0, MAX_SCOPE_LENGTH - 3) + '...';
  }
  return sanitized || DEFAULT_SCOPE;
}

function images(count: number): string {
  return `${count} image${count > 1 ? 's' : ''}`;
}

/** `<group>/README.md`, matched case-insensitively */
function isContentFile(change: ChangeRecord, group: string): boolean {
  const parts = change.path.split('/').filter(part => part.length > 0);
  return parts.length === 2 && parts[0] === group && parts[1].toLowerCase() === CONTENT_FILE;
}

/**
 * Describe what happened inside a single group.
 */
export function describeGroupChanges(changeSet: ChangeSet, group: string): string {
  const groupChanges = changeSet.changes.filter(c => changeGroup(c) === group);
  const imagesAdded = countImagesAdded(groupChanges);
  const contentChanged = groupChanges.some(c => isContentFile(c, group));

  const contentAdded = groupChanges.some(c => c.kind === 'added' && isContentFile(c, group));
  if (contentAdded && groupChanges.every(c => c.kind === 'added')) {
    return imagesAdded > 0 ? `initial sync with ${images(imagesAdded)}` : 'initial sync';
  }
  if (imagesAdded > 0 && contentChanged) {
    return `update content and add ${images(imagesAdded)}`;
  }
  if (imagesAdded > 0) {
    return `add ${images(imagesAdded)}`;
  }
  if (contentChanged) {
    return 'update content';
  }
  return 'sync latest changes';
}

/**
 * Build the commit message for one sync run.
 *
 * @param syncedNames - Directory names of the documents rendered this run;
 *   only consulted for the first commit of a repository. With none rendered,
 *   the first commit is described from the changed groups like any other.
 */
export function generateCommitMessage(
  changeSet: ChangeSet,
  syncedNames: string[],
  isInitial: boolean,
): string {
  if (isInitial && syncedNames.length === 1) {
    return `docs(${sanitizeScope(syncedNames[0])}): initial sync`;
  }
  if (isInitial && syncedNames.length > 1) {
    const names = [...syncedNames].sort().join(', ');
    return `docs: initial sync of ${syncedNames.length} topics\n\nTopics: ${names}`;
  }

  const groups = changedGroups(changeSet);
  if (groups.length === 1) {
    const group = groups[0];
    return `docs(${sanitizeScope(group)}): ${describeGroupChanges(changeSet, group)}`;
  }
  if (groups.length > 1) {
    return `docs: sync updates across ${groups.length} topics\n\nUpdated: ${groups.join(', ')}`;
  }

  // Only root-level files (the generated index) changed
  if (hasRootChanges(changeSet)) {
    return 'docs: update documentation index';
  }
  return 'docs: sync latest changes';
}
