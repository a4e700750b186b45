import fs from 'node:fs';
import path from 'node:path';
import { randomBytes } from 'node:crypto';

/**
 * Create a directory (and parents) if it does not exist yet.
 */
export function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Write a file atomically using a temp file + rename.
 * Readers never see a partially written file.
 */
export function atomicWriteFileSync(targetPath: string, content: string | Uint8Array): void {
  ensureDir(path.dirname(targetPath));
  const tmpFile = targetPath + '.tmp.' + randomBytes(4).toString('hex');
  fs.writeFileSync(tmpFile, content);
  fs.renameSync(tmpFile, targetPath);
}
