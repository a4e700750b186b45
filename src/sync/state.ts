/**
 * Sync state tracking.
 * Persists one entry per synced document in <repoRoot>/.notion-sync/state.json
 * and decides which documents need to be rendered again.
 */
import fs from 'node:fs';
import { atomicWriteFileSync } from '../utils/fs.js';
import { isRecord, getRecord, getString } from '../utils/records.js';
import type { DocumentState, SourceDocument, SyncStateData } from './types.js';

export const STATE_VERSION = '1.0';

/**
 * True when the document must be rendered: forced, never seen before, or
 * edited remotely after the recorded edit time.
 */
export function shouldSync(
  document: SourceDocument,
  prior: DocumentState | undefined,
  force: boolean,
): boolean {
  if (force || !prior) return true;
  const stored = Date.parse(prior.lastEditedTime);
  const remote = Date.parse(document.lastEditedTime);
  if (Number.isNaN(stored) || Number.isNaN(remote)) return true;
  return remote > stored;
}

/**
 * Build a fresh state entry for a document that was just rendered.
 */
export function recordDocument(document: SourceDocument, directory: string, now: Date): DocumentState {
  return {
    pageId: document.id,
    title: document.title,
    directory,
    lastEditedTime: document.lastEditedTime,
    lastSyncedTime: now.toISOString(),
    contentHash: null,
  };
}

export function emptyState(): SyncStateData {
  return { version: STATE_VERSION, lastSyncTime: null, pages: {} };
}

function parseDocumentState(value: unknown): DocumentState | null {
  if (!isRecord(value)) return null;
  const pageId = value['page_id'];
  const title = value['title'];
  const directory = value['directory'];
  const lastEditedTime = value['last_edited_time'];
  const lastSyncedTime = value['last_synced_time'];
  if (
    typeof pageId !== 'string' ||
    typeof title !== 'string' ||
    typeof directory !== 'string' ||
    typeof lastEditedTime !== 'string' ||
    typeof lastSyncedTime !== 'string'
  ) {
    return null;
  }
  const contentHash = value['content_hash'];
  return {
    pageId,
    title,
    directory,
    lastEditedTime,
    lastSyncedTime,
    contentHash: typeof contentHash === 'string' ? contentHash : null,
  };
}

/**
 * Parse the persisted JSON form. Malformed page entries are dropped and
 * reported through `onWarning`; unknown fields are ignored.
 */
export function parseState(raw: unknown, onWarning: (message: string) => void = () => {}): SyncStateData {
  if (!isRecord(raw)) {
    onWarning('State file is not a JSON object; starting from an empty state');
    return emptyState();
  }
  const lastSyncTime = raw['last_sync_time'];
  const state: SyncStateData = {
    version: getString(raw, 'version', STATE_VERSION),
    lastSyncTime: typeof lastSyncTime === 'string' ? lastSyncTime : null,
    pages: {},
  };
  for (const [id, entry] of Object.entries(getRecord(raw, 'pages'))) {
    const parsed = parseDocumentState(entry);
    if (parsed) {
      state.pages[id] = parsed;
    } else {
      onWarning(`Dropping malformed state entry for ${id}`);
    }
  }
  return state;
}

export function serializeState(state: SyncStateData): string {
  const pages: Record<string, Record<string, string | null>> = {};
  for (const [id, entry] of Object.entries(state.pages)) {
    pages[id] = {
      page_id: entry.pageId,
      title: entry.title,
      directory: entry.directory,
      last_edited_time: entry.lastEditedTime,
      last_synced_time: entry.lastSyncedTime,
      content_hash: entry.contentHash,
    };
  }
  const data = {
    version: state.version,
    last_sync_time: state.lastSyncTime,
    pages,
  };
  return JSON.stringify(data, null, 2) + '\n';
}

export interface StateStoreOptions {
  onWarning?: (message: string) => void;
}

/**
 * In-memory state with explicit load/save against one JSON file.
 */
export interface StateStore {
  readonly filePath: string;
  load(): void;
  get(pageId: string): DocumentState | undefined;
  merge(entry: DocumentState): void;
  entries(): DocumentState[];
  lastSyncTime(): string | null;
  markSynced(now: Date): void;
  reset(): void;
  save(): void;
}

export function createStateStore(filePath: string, options: StateStoreOptions = {}): StateStore {
  const warn = options.onWarning ?? (() => {});
  let state = emptyState();

  return {
    filePath,

    load() {
      if (!fs.existsSync(filePath)) {
        state = emptyState();
        return;
      }
      let raw: unknown;
      try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        warn(`Could not load state file ${filePath}: ${message}`);
        state = emptyState();
        return;
      }
      state = parseState(raw, warn);
    },

    get(pageId) {
      return state.pages[pageId];
    },

    merge(entry) {
      state.pages[entry.pageId] = entry;
    },

    entries() {
      return Object.values(state.pages);
    },

    lastSyncTime() {
      return state.lastSyncTime;
    },

    markSynced(now) {
      state.lastSyncTime = now.toISOString();
    },

    reset() {
      state = emptyState();
    },

    save() {
      atomicWriteFileSync(filePath, serializeState(state));
    },
  };
}
