import { describe, it, expect, vi, beforeEach } from 'vitest';
import fs from 'node:fs';

vi.mock('node:fs');
const mockedFs = vi.mocked(fs);

import { loadIgnoreFile, resolveExcludePatterns, isExcluded } from './ignore.js';

describe('document exclusion', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('loadIgnoreFile', () => {
    it('should return empty array when no file exists', () => {
      mockedFs.existsSync.mockReturnValue(false);
      expect(loadIgnoreFile('/repo')).toEqual([]);
    });

    it('should parse ignore file', () => {
      mockedFs.existsSync.mockReturnValue(true);
      mockedFs.readFileSync.mockReturnValue('# Comment\ndrafts-*\n\n  scratch  \n');
      expect(loadIgnoreFile('/repo')).toEqual(['drafts-*', 'scratch']);
      expect(mockedFs.readFileSync).toHaveBeenCalledWith('/repo/.notion-sync-ignore', 'utf-8');
    });
  });

  describe('resolveExcludePatterns', () => {
    it('should merge config and file patterns without duplicates', () => {
      mockedFs.existsSync.mockReturnValue(true);
      mockedFs.readFileSync.mockReturnValue('scratch\ndrafts-*\n');
      expect(resolveExcludePatterns(['drafts-*'], '/repo')).toEqual(['drafts-*', 'scratch']);
    });
  });

  describe('isExcluded', () => {
    it('should match directory names', () => {
      expect(isExcluded({ title: 'Draft: Ideas', directory: 'draft-ideas' }, ['draft-*'])).toBe(true);
    });

    it('should match titles case-insensitively', () => {
      expect(isExcluded({ title: 'Private Notes', directory: 'private-notes' }, ['private *'])).toBe(true);
    });

    it('should keep documents no pattern matches', () => {
      expect(isExcluded({ title: 'Linux', directory: 'linux' }, ['draft-*', 'private *'])).toBe(false);
      expect(isExcluded({ title: 'Linux', directory: 'linux' }, [])).toBe(false);
    });
  });
});
