import { describe, it, expect, vi, beforeEach } from 'vitest';
import fs from 'node:fs';

vi.mock('node:fs');
const mockedFs = vi.mocked(fs);

import { parseEnvFile, loadEnvFile } from './env.js';

describe('env file', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should parse keys, comments and quoted values', () => {
    expect(parseEnvFile('# comment\r\nA=1\n\nB = "two words"\nC=\'x=y\'\nnot a pair\n=orphan\n')).toEqual({
      A: '1',
      B: 'two words',
      C: 'x=y',
    });
  });

  it('should keep a lone quote character', () => {
    expect(parseEnvFile('A="')).toEqual({ A: '"' });
  });

  it('should return nothing when the file is missing', () => {
    mockedFs.existsSync.mockReturnValue(false);
    expect(loadEnvFile('/repo/.env')).toEqual({});
    expect(mockedFs.readFileSync).not.toHaveBeenCalled();
  });
});
