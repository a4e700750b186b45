/**
 * Sync engine: mirrors the child pages of the parent page into the
 * repository and commits the result.
 */
import fs from 'node:fs';
import path from 'node:path';
import { directoryForTitle, type Settings } from '../config.js';
import { renderDocument } from '../render/renderer.js';
import type { AssetResolver } from '../render/assets.js';
import type { Block } from '../render/types.js';
import { atomicWriteFileSync } from '../utils/fs.js';
import { classifyStatus, formatChangeSummary } from './changes.js';
import { generateCommitMessage } from './message.js';
import { recordDocument, shouldSync, type StateStore } from './state.js';
import { isExcluded, resolveExcludePatterns } from './ignore.js';
import type {
  DocumentSource,
  DocumentState,
  SourceDocument,
  SyncLogger,
  SyncOptions,
  SyncResult,
  VersionControl,
} from './types.js';

export const CONTENT_FILE = 'README.md';
export const ASSET_DIR = 'images';
const DEFAULT_ICON = '📄';
const DISCOVERY_FAILURE = '(page discovery)';

export type EngineSettings = Pick<
  Settings,
  'repoRoot' | 'parentPageId' | 'indexTitle' | 'indexDescription' | 'remote' | 'branch' | 'exclude' | 'directoryOverrides'
>;

export interface SyncDependencies {
  source: DocumentSource;
  git: VersionControl;
  state: StateStore;
  resolver: AssetResolver;
  logger: SyncLogger;
  /** Clock; injectable for tests */
  now?: () => Date;
}

interface PlannedDocument {
  document: SourceDocument;
  directory: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Format an ISO timestamp as `YYYY-MM-DD HH:MM UTC`. Unparseable values pass through.
 */
export function formatUtc(iso: string): string {
  const time = Date.parse(iso);
  if (Number.isNaN(time)) return iso;
  return new Date(time).toISOString().slice(0, 16).replace('T', ' ') + ' UTC';
}

/** The page icon when it is an emoji; external icon URLs are not shown inline */
export function iconGlyph(document: SourceDocument): string | null {
  const icon = document.icon?.trim();
  if (!icon || /^https?:\/\//i.test(icon)) return null;
  return icon;
}

/**
 * Assign each document a directory. When two titles map to the same name,
 * later documents get a suffix from their ID.
 */
export function assignDirectories(
  documents: SourceDocument[],
  overrides: Record<string, string> = {},
): Map<string, string> {
  const assigned = new Map<string, string>();
  const used = new Set<string>();
  for (const document of documents) {
    let directory = directoryForTitle(document.title, overrides);
    if (used.has(directory)) {
      directory = `${directory}-${document.id.slice(0, 8)}`;
    }
    used.add(directory);
    assigned.set(document.id, directory);
  }
  return assigned;
}

/**
 * Fetch the full block tree below a page or block, following pagination.
 * Child pages and databases are not descended into; they render as references.
 */
export async function fetchBlockTree(source: DocumentSource, blockId: string): Promise<Block[]> {
  const blocks: Block[] = [];
  let cursor: string | undefined;
  do {
    const page = await source.listBlocks(blockId, cursor);
    for (const block of page.blocks) {
      const descend = block.hasChildren && block.type !== 'child_page' && block.type !== 'child_database';
      blocks.push(descend ? { ...block, children: await fetchBlockTree(source, block.id) } : block);
    }
    cursor = page.nextCursor ?? undefined;
  } while (cursor);
  return blocks;
}

export function renderPageHeader(document: SourceDocument): string {
  const glyph = iconGlyph(document);
  const lines = [
    glyph ? `# ${glyph} ${document.title}` : `# ${document.title}`,
    '',
    `> 📅 Last updated: ${formatUtc(document.lastEditedTime)}`,
    `> 🔗 [View in Notion](${document.url})`,
    '',
    '---',
    '',
  ];
  return lines.join('\n') + '\n';
}

/**
 * Render the root index, documents sorted by title (case-insensitive).
 */
export function renderIndex(
  entries: PlannedDocument[],
  options: { title: string; description: string },
  now: Date,
): string {
  const sorted = [...entries].sort((a, b) =>
    compareText(a.document.title.toLowerCase(), b.document.title.toLowerCase()),
  );
  const lines = [
    `# ${options.title}`,
    '',
    options.description,
    '',
    '---',
    '',
    '## Topics',
    '',
    ...sorted.map(
      ({ document, directory }) => `- [${iconGlyph(document) ?? DEFAULT_ICON} ${document.title}](./${directory}/)`,
    ),
    '',
    '---',
    '',
    '## About',
    '',
    'These notes are automatically synced from [Notion](https://notion.so) by notion-mirror.',
    '',
    `*Last sync: ${formatUtc(now.toISOString())}*`,
    '',
  ];
  return lines.join('\n');
}

/**
 * Render one document into `<directory>/README.md`.
 * Returns the number of distinct local assets it references.
 */
async function writeDocument(
  planned: PlannedDocument,
  repoRoot: string,
  deps: SyncDependencies,
): Promise<number> {
  const docDir = path.join(repoRoot, planned.directory);
  const blocks = await fetchBlockTree(deps.source, planned.document.id);
  const rendered = await renderDocument(blocks, {
    assetDir: path.join(docDir, ASSET_DIR),
    assetPrefix: ASSET_DIR,
    resolver: deps.resolver,
  });
  atomicWriteFileSync(path.join(docDir, CONTENT_FILE), renderPageHeader(planned.document) + rendered.text);
  return new Set(rendered.assets).size;
}

/**
 * Remove the directory a renamed document used to live in, unless another
 * document now owns it.
 */
function removeStaleDirectory(
  prior: DocumentState | undefined,
  directory: string,
  owned: Set<string>,
  repoRoot: string,
  logger: SyncLogger,
): void {
  if (!prior || prior.directory === directory || owned.has(prior.directory)) return;
  const stale = safeDirectory(repoRoot, prior.directory);
  if (stale && fs.existsSync(stale)) {
    fs.rmSync(stale, { recursive: true, force: true });
    logger.status(`Removed stale directory ${prior.directory}/`);
  }
}

/**
 * Resolve a stored directory name inside the repository, or null if it
 * would escape it or point at the repository root.
 */
function safeDirectory(repoRoot: string, directory: string): string | null {
  const resolved = path.resolve(repoRoot, directory);
  const relative = path.relative(repoRoot, resolved);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative) || relative.startsWith('.')) {
    return null;
  }
  return resolved;
}

function emptyResult(): SyncResult {
  return {
    synced: [],
    skipped: [],
    failed: [],
    assetsDownloaded: 0,
    commitCreated: false,
    pushed: false,
    message: null,
  };
}

/**
 * Run one full sync pass. Per-document failures are collected in the
 * result; only version-control failures propagate.
 */
export async function runSync(
  settings: EngineSettings,
  deps: SyncDependencies,
  options: SyncOptions,
): Promise<SyncResult> {
  const { source, git, state, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const result = emptyResult();

  await git.ensureRepository();
  await git.configureUser();
  const isInitial = !(await git.hasCommits());
  state.load();

  logger.status('Discovering pages in Notion...');
  let documents: SourceDocument[];
  try {
    documents = await source.listChildDocuments(settings.parentPageId);
  } catch (err) {
    logger.error(`Failed to fetch pages: ${errorMessage(err)}`);
    result.failed.push({ title: DISCOVERY_FAILURE, error: errorMessage(err) });
    return result;
  }
  if (documents.length === 0) {
    logger.warn('No pages found under the parent page. Make sure the integration has access to them.');
    return result;
  }
  logger.status(`Found ${documents.length} page${documents.length === 1 ? '' : 's'}`);

  const directories = assignDirectories(documents, settings.directoryOverrides);
  const patterns = resolveExcludePatterns(settings.exclude, settings.repoRoot);
  const planned: PlannedDocument[] = [];
  for (const document of documents) {
    const directory = directories.get(document.id) ?? directoryForTitle(document.title, settings.directoryOverrides);
    if (isExcluded({ title: document.title, directory }, patterns)) {
      logger.debug(`Excluded ${document.title}`);
      continue;
    }
    planned.push({ document, directory });
  }
  const owned = new Set(planned.map(p => p.directory));

  const syncedDirectories: string[] = [];
  for (const entry of planned) {
    const { document, directory } = entry;
    const prior = state.get(document.id);
    if (!shouldSync(document, prior, options.force)) {
      logger.debug(`Skipping ${document.title} (unchanged)`);
      result.skipped.push(document.title);
      continue;
    }
    logger.status(`Syncing: ${document.title}`);
    try {
      result.assetsDownloaded += await writeDocument(entry, settings.repoRoot, deps);
      removeStaleDirectory(prior, directory, owned, settings.repoRoot, logger);
      state.merge(recordDocument(document, directory, now()));
      result.synced.push(document.title);
      syncedDirectories.push(directory);
    } catch (err) {
      logger.error(`Failed to sync '${document.title}': ${errorMessage(err)}`);
      result.failed.push({ title: document.title, error: errorMessage(err) });
    }
  }

  atomicWriteFileSync(
    path.join(settings.repoRoot, CONTENT_FILE),
    renderIndex(planned, { title: settings.indexTitle, description: settings.indexDescription }, now()),
  );

  state.markSynced(now());
  state.save();

  const changes = classifyStatus(await git.detectStatus());
  if (changes.changes.length === 0) {
    logger.status('No changes to commit');
    return result;
  }
  logger.debug(`Changes: ${formatChangeSummary(changes)}`);

  result.message = generateCommitMessage(changes, syncedDirectories, isInitial);
  if (options.dryRun) {
    logger.status(`Dry run - would commit:\n${result.message}`);
    return result;
  }

  await git.stageAll();
  result.commitCreated = await git.commit(result.message);
  if (options.push && result.commitCreated) {
    result.pushed = await git.push(settings.remote, settings.branch);
  }
  return result;
}

export interface StatusReport {
  lastSyncTime: string | null;
  /** Tracked documents sorted by title */
  documents: DocumentState[];
}

/**
 * Summarize what has been synced so far.
 */
export function describeStatus(state: StateStore): StatusReport {
  state.load();
  return {
    lastSyncTime: state.lastSyncTime(),
    documents: [...state.entries()].sort((a, b) => compareText(a.title, b.title)),
  };
}

/**
 * Delete every tracked directory and the root index, then reset the state.
 * With `dryRun`, only reports what would be removed.
 * Returns the removed paths relative to the repository root.
 */
export function cleanRepository(
  repoRoot: string,
  state: StateStore,
  options: { dryRun: boolean; logger: SyncLogger },
): string[] {
  state.load();
  const targets: string[] = [];
  for (const entry of state.entries()) {
    const dir = safeDirectory(repoRoot, entry.directory);
    if (!dir) {
      options.logger.warn(`Refusing to remove '${entry.directory}' outside the repository`);
      continue;
    }
    if (fs.existsSync(dir)) targets.push(dir);
  }
  const index = path.join(repoRoot, CONTENT_FILE);
  if (fs.existsSync(index)) targets.push(index);

  const removed = targets.map(target => path.relative(repoRoot, target));
  if (options.dryRun) {
    return removed;
  }
  for (const target of targets) {
    fs.rmSync(target, { recursive: true, force: true });
    options.logger.status(`Removed: ${path.relative(repoRoot, target)}`);
  }
  state.reset();
  state.save();
  return removed;
}
