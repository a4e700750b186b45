import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { assetFileName, createAssetResolver } from './assets.js';

describe('asset resolver', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'assets-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('assetFileName', () => {
    it('should keep known image extensions', () => {
      expect(assetFileName('https://example.com/pic.JPG?x=1')).toMatch(/^image-[0-9a-f]{12}\.jpg$/);
    });

    it('should default to png', () => {
      expect(assetFileName('https://example.com/download?id=1')).toMatch(/^image-[0-9a-f]{12}\.png$/);
      expect(assetFileName('https://example.com/file.bin')).toMatch(/\.png$/);
    });

    it('should be deterministic per URL', () => {
      const url = 'https://example.com/a.gif';
      expect(assetFileName(url)).toBe(assetFileName(url));
      expect(assetFileName(url)).not.toBe(assetFileName('https://example.com/b.gif'));
    });
  });

  describe('resolve', () => {
    it('should download into the target directory', async () => {
      const fetchBinary = vi.fn(async () => new Uint8Array([1, 2, 3]));
      const resolver = createAssetResolver({ fetchBinary });
      const url = 'https://example.com/a.png';
      const target = path.join(dir, 'images');

      const result = await resolver.resolve(url, target);

      expect(result).toBe(path.join(target, assetFileName(url)));
      expect(fs.readFileSync(path.join(target, assetFileName(url)))).toEqual(Buffer.from([1, 2, 3]));
      expect(fetchBinary).toHaveBeenCalledTimes(1);
    });

    it('should not fetch again when the file exists', async () => {
      const fetchBinary = vi.fn(async () => new Uint8Array([9]));
      const resolver = createAssetResolver({ fetchBinary });

      await resolver.resolve('https://example.com/a.png', dir);
      await resolver.resolve('https://example.com/a.png', dir);

      expect(fetchBinary).toHaveBeenCalledTimes(1);
    });

    it('should honor an explicit filename', async () => {
      const resolver = createAssetResolver({ fetchBinary: async () => new Uint8Array([1]) });
      const result = await resolver.resolve('https://example.com/a.png', dir, 'cover.png');
      expect(result).toBe(path.join(dir, 'cover.png'));
    });

    it('should return null and warn when the download fails', async () => {
      const onWarning = vi.fn();
      const resolver = createAssetResolver({
        fetchBinary: async () => {
          throw new Error('boom');
        },
        onWarning,
      });

      const result = await resolver.resolve('https://example.com/a.png', dir);

      expect(result).toBeNull();
      expect(onWarning).toHaveBeenCalledWith('Failed to download asset https://example.com/a.png: boom');
      expect(fs.readdirSync(dir)).toEqual([]);
    });
  });
});
