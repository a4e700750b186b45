import {
  Client,
  APIErrorCode,
  ClientErrorCode,
  isNotionClientError,
  type NotionClientError,
} from '@notionhq/client';
import { formatId, normalizeId, type Settings } from './config.js';
import { isBlockType, type Block } from './render/types.js';
import { isRecord, getArray, getRecord, getString, getOptionalString } from './utils/records.js';
import type { BlockPage, DocumentSource, SourceDocument, SyncLogger } from './sync/types.js';

/** Notion allows an average of three requests per second */
const MIN_REQUEST_INTERVAL_MS = 334;
const MAX_RETRIES = 3;
const PAGE_SIZE = 100;

const RETRYABLE_CODES: ReadonlySet<NotionClientError['code']> = new Set([
  APIErrorCode.RateLimited,
  APIErrorCode.InternalServerError,
  APIErrorCode.ServiceUnavailable,
  ClientErrorCode.RequestTimeout,
]);

/**
 * The subset of the Notion SDK the source uses.
 */
export interface NotionApi {
  blocks: {
    children: {
      list(args: { block_id: string; start_cursor?: string; page_size?: number }): Promise<unknown>;
    };
  };
  pages: {
    retrieve(args: { page_id: string }): Promise<unknown>;
  };
}

export interface NotionSourceOptions {
  /** Injected API (tests); defaults to an SDK client authenticated with the settings' token */
  api?: NotionApi;
  minIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  fetch?: typeof fetch;
}

export interface NotionSource extends DocumentSource {
  /** Number of API calls made so far, retries included */
  readonly requestCount: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function isRetryableError(err: unknown): boolean {
  return isNotionClientError(err) && RETRYABLE_CODES.has(err.code);
}

function plainText(items: unknown[]): string {
  return items
    .filter(isRecord)
    .map(item => getString(item, 'plain_text'))
    .join('');
}

/** Emoji, or the URL of an external icon */
function pageIcon(page: Record<string, unknown>): string | undefined {
  const icon = getRecord(page, 'icon');
  switch (getString(icon, 'type')) {
    case 'emoji':
      return getOptionalString(icon, 'emoji') ?? undefined;
    case 'external':
      return getOptionalString(getRecord(icon, 'external'), 'url') ?? undefined;
    default:
      return undefined;
  }
}

function pageCover(page: Record<string, unknown>): string | undefined {
  const cover = getRecord(page, 'cover');
  const type = getString(cover, 'type');
  if (type !== 'external' && type !== 'file') return undefined;
  return getOptionalString(getRecord(cover, type), 'url') ?? undefined;
}

/**
 * Map a page object to a SourceDocument. The title comes from the page's
 * title property, falling back to the title on the child_page block.
 */
export function toSourceDocument(page: unknown, fallbackTitle = ''): SourceDocument {
  if (!isRecord(page)) {
    throw new Error('Unexpected page response from Notion');
  }
  const titleProperty = getRecord(getRecord(page, 'properties'), 'title');
  const title = plainText(getArray(titleProperty, 'title')) || fallbackTitle;

  const document: SourceDocument = {
    id: normalizeId(getString(page, 'id')),
    title,
    lastEditedTime: getString(page, 'last_edited_time'),
    createdTime: getString(page, 'created_time'),
    url: getString(page, 'url'),
  };
  const icon = pageIcon(page);
  if (icon) document.icon = icon;
  const cover = pageCover(page);
  if (cover) document.cover = cover;
  return document;
}

/**
 * Map a raw block object. Types the renderer does not know become `unknown`
 * and keep their tag in `rawType`.
 */
export function toBlock(raw: unknown): Block | null {
  if (!isRecord(raw)) return null;
  const rawType = getString(raw, 'type');
  if (!rawType) return null;
  return {
    id: normalizeId(getString(raw, 'id')),
    type: isBlockType(rawType) ? rawType : 'unknown',
    rawType,
    hasChildren: raw['has_children'] === true,
    content: getRecord(raw, rawType),
    children: [],
  };
}

interface ListPage {
  results: unknown[];
  nextCursor: string | null;
}

function toListPage(response: unknown): ListPage {
  if (!isRecord(response)) {
    throw new Error('Unexpected list response from Notion');
  }
  const hasMore = response['has_more'] === true;
  return {
    results: getArray(response, 'results'),
    nextCursor: hasMore ? getOptionalString(response, 'next_cursor') : null,
  };
}

/**
 * Create the Notion-backed document source.
 * All API calls go through one throttle and are retried with exponential
 * backoff on rate limiting, server errors and timeouts.
 */
export function createNotionSource(
  settings: Pick<Settings, 'notionToken'>,
  logger: SyncLogger,
  options: NotionSourceOptions = {},
): NotionSource {
  const api: NotionApi = options.api ?? new Client({ auth: settings.notionToken });
  const minInterval = options.minIntervalMs ?? MIN_REQUEST_INTERVAL_MS;
  const wait = options.sleep ?? sleep;
  const fetchImpl = options.fetch ?? fetch;

  let requestCount = 0;
  let lastRequestAt = 0;

  async function throttle(): Promise<void> {
    const elapsed = Date.now() - lastRequestAt;
    if (lastRequestAt > 0 && elapsed < minInterval) {
      await wait(minInterval - elapsed);
    }
    lastRequestAt = Date.now();
  }

  async function call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      await throttle();
      requestCount++;
      logger.debug(`Notion ${label}`);
      try {
        return await fn();
      } catch (err) {
        if (!isRetryableError(err) || attempt >= MAX_RETRIES) {
          throw err;
        }
        const delay = Math.pow(2, attempt) * 500; // 500ms, 1s, 2s
        const message = err instanceof Error ? err.message : String(err);
        logger.warn(`Notion ${label} failed (${message}); retrying in ${delay}ms`);
        await wait(delay);
      }
    }
  }

  async function listPage(blockId: string, cursor?: string): Promise<ListPage> {
    const args: { block_id: string; start_cursor?: string; page_size: number } = {
      block_id: formatId(blockId),
      page_size: PAGE_SIZE,
    };
    if (cursor) args.start_cursor = cursor;
    return toListPage(await call(`blocks.children.list ${blockId}`, () => api.blocks.children.list(args)));
  }

  return {
    get requestCount() {
      return requestCount;
    },

    async listChildDocuments(parentId) {
      const documents: SourceDocument[] = [];
      let cursor: string | undefined;
      do {
        const page = await listPage(parentId, cursor);
        for (const raw of page.results) {
          if (!isRecord(raw) || raw['type'] !== 'child_page') continue;
          const pageId = getString(raw, 'id');
          const fallbackTitle = getString(getRecord(raw, 'child_page'), 'title');
          const details = await call(`pages.retrieve ${pageId}`, () =>
            api.pages.retrieve({ page_id: formatId(pageId) }),
          );
          documents.push(toSourceDocument(details, fallbackTitle));
        }
        cursor = page.nextCursor ?? undefined;
      } while (cursor);
      return documents;
    },

    async listBlocks(blockId, cursor): Promise<BlockPage> {
      const page = await listPage(blockId, cursor);
      const blocks: Block[] = [];
      for (const raw of page.results) {
        const block = toBlock(raw);
        if (block) blocks.push(block);
      }
      return { blocks, nextCursor: page.nextCursor };
    },

    async fetchBinary(url, signal) {
      const response = await fetchImpl(url, { signal });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
      }
      return new Uint8Array(await response.arrayBuffer());
    },
  };
}
