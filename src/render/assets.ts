/**
 * Asset resolution: downloads referenced images into a page's asset
 * directory under content-derived names.
 */
import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { atomicWriteFileSync } from '../utils/fs.js';

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png', '.jpg', '.jpeg', '.gif', '.webp', '.svg',
]);

const DEFAULT_EXTENSION = '.png';
const DEFAULT_TIMEOUT_MS = 30_000;

export type BinaryFetcher = (url: string, signal: AbortSignal) => Promise<Uint8Array>;

export interface AssetResolverOptions {
  fetchBinary: BinaryFetcher;
  /** Hard timeout for a single download (default: 30000) */
  timeoutMs?: number;
  onWarning?: (message: string) => void;
}

export interface AssetResolver {
  /**
   * Return the local path for `url` inside `targetDir`, downloading it if
   * the file is not there yet. Returns null when the download fails.
   */
  resolve(url: string, targetDir: string, filename?: string): Promise<string | null>;
}

function urlExtension(url: string): string {
  try {
    return path.posix.extname(new URL(url).pathname).toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Derive a deterministic file name from a URL:
 * `image-<12 hex chars of md5(url)><ext>`.
 */
export function assetFileName(url: string): string {
  const hash = crypto.createHash('md5').update(url).digest('hex').slice(0, 12);
  const ext = urlExtension(url);
  return `image-${hash}${IMAGE_EXTENSIONS.has(ext) ? ext : DEFAULT_EXTENSION}`;
}

export function createAssetResolver(options: AssetResolverOptions): AssetResolver {
  const { fetchBinary, timeoutMs = DEFAULT_TIMEOUT_MS, onWarning } = options;

  return {
    async resolve(url, targetDir, filename) {
      const targetPath = path.join(targetDir, filename ?? assetFileName(url));
      if (fs.existsSync(targetPath)) {
        return targetPath;
      }

      try {
        const data = await fetchBinary(url, AbortSignal.timeout(timeoutMs));
        atomicWriteFileSync(targetPath, data);
        return targetPath;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        onWarning?.(`Failed to download asset ${url}: ${message}`);
        return null;
      }
    },
  };
}
