/**
 * Type definitions for the sync engine.
 */
import type { Block } from '../render/types.js';

/**
 * A remote document discovered under the parent page.
 */
export interface SourceDocument {
  /** Document ID (dashes stripped) */
  id: string;
  title: string;
  /** ISO 8601 timestamp of the last remote edit */
  lastEditedTime: string;
  /** ISO 8601 creation timestamp */
  createdTime: string;
  url: string;
  /** Emoji or icon URL */
  icon?: string;
  /** Cover image URL */
  cover?: string;
}

export interface BlockPage {
  blocks: Block[];
  nextCursor: string | null;
}

/**
 * Read access to the remote document store.
 */
export interface DocumentSource {
  listChildDocuments(parentId: string): Promise<SourceDocument[]>;
  /** One page of direct children; `children` of each block is left empty */
  listBlocks(blockId: string, cursor?: string): Promise<BlockPage>;
  fetchBinary(url: string, signal: AbortSignal): Promise<Uint8Array>;
}

/**
 * The version-control backend the sync commits into.
 */
export interface VersionControl {
  ensureRepository(): Promise<void>;
  configureUser(): Promise<void>;
  hasCommits(): Promise<boolean>;
  /** Raw `git status --porcelain=v1` lines */
  detectStatus(): Promise<string[]>;
  stageAll(): Promise<void>;
  /** Returns false when there was nothing to commit */
  commit(message: string): Promise<boolean>;
  push(remote: string, branch: string): Promise<boolean>;
}

/**
 * Logging surface used by the engine and its collaborators.
 * The CLI's Output class satisfies it.
 */
export interface SyncLogger {
  status(message: string): void;
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Per-document sync bookkeeping.
 */
export interface DocumentState {
  pageId: string;
  title: string;
  /** Directory (slug) the document is written to */
  directory: string;
  /** Remote last-edited timestamp at the time of the last render */
  lastEditedTime: string;
  /** When the document was last rendered locally */
  lastSyncedTime: string;
  /** Reserved; always null for now */
  contentHash: string | null;
}

/**
 * In-memory form of .notion-sync/state.json.
 */
export interface SyncStateData {
  version: string;
  lastSyncTime: string | null;
  pages: Record<string, DocumentState>;
}

export type ChangeKind = 'added' | 'modified' | 'deleted' | 'renamed';

/**
 * One filesystem delta reported by the version-control backend.
 */
export interface ChangeRecord {
  /** Path relative to the repository root (forward slashes) */
  path: string;
  kind: ChangeKind;
  /** Previous path, for renames only */
  previousPath?: string;
}

export interface ChangeSet {
  changes: ChangeRecord[];
}

export interface SyncOptions {
  /** Push after committing */
  push: boolean;
  /** Re-render every document regardless of state */
  force: boolean;
  /** Write files but do not commit or push */
  dryRun: boolean;
}

export interface SyncResult {
  synced: string[];
  skipped: string[];
  failed: Array<{ title: string; error: string }>;
  assetsDownloaded: number;
  commitCreated: boolean;
  pushed: boolean;
  /** Commit message generated for this run, if any */
  message: string | null;
}
