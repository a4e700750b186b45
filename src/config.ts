import fs from 'node:fs';
import path from 'node:path';
import { isRecord } from './utils/records.js';
import { loadEnvFile } from './utils/env.js';

export const SYNC_DIR_NAME = '.notion-sync';
const STATE_FILE_NAME = 'state.json';
const CONFIG_FILE_NAME = 'config.json';
export const ENV_FILE_NAME = '.env';

const REQUIRED_ENV = ['NOTION_TOKEN', 'NOTION_PARENT_PAGE_ID', 'GIT_USER_NAME', 'GIT_USER_EMAIL'] as const;

export const DEFAULT_INDEX_TITLE = '📚 Tech Notes';
export const DEFAULT_INDEX_DESCRIPTION = 'A collection of technical notes and documentation.';

/**
 * Titles whose generic slug would be ambiguous or too long.
 * Keys are lowercase titles.
 */
const BUILTIN_DIRECTORY_OVERRIDES: Readonly<Record<string, string>> = {
  'linux': 'linux',
  'ssh': 'ssh-secure-shell',
  'ssh – secure shell': 'ssh-secure-shell',
  'git': 'git-github',
  'git & github': 'git-github',
  'aws': 'aws',
  'aws – amazon web services': 'aws',
  'docker': 'docker',
  'kubernetes': 'kubernetes',
  'jenkins': 'jenkins',
  'spring boot': 'spring-boot',
};

export interface Settings {
  notionToken: string;
  /** Parent page ID, dashes stripped */
  parentPageId: string;
  gitUserName: string;
  gitUserEmail: string;
  githubToken: string | null;
  repoRoot: string;
  debug: boolean;
  dryRun: boolean;
  forceSync: boolean;
  indexTitle: string;
  indexDescription: string;
  remote: string;
  branch: string;
  /** Glob patterns matched against document slugs and titles */
  exclude: string[];
  /** Lowercase title → directory name, merged over the built-in table */
  directoryOverrides: Record<string, string>;
}

/**
 * Raised for missing or invalid settings. Always fatal.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function syncDir(repoRoot: string): string {
  return path.join(repoRoot, SYNC_DIR_NAME);
}

export function stateFilePath(repoRoot: string): string {
  return path.join(syncDir(repoRoot), STATE_FILE_NAME);
}

export function configFilePath(repoRoot: string): string {
  return path.join(syncDir(repoRoot), CONFIG_FILE_NAME);
}

/**
 * Strip dashes from a Notion ID.
 */
export function normalizeId(id: string): string {
  return id.replace(/-/g, '').toLowerCase();
}

/**
 * Re-insert dashes in 8-4-4-4-12 form. IDs of any other length are returned unchanged.
 */
export function formatId(id: string): string {
  const compact = normalizeId(id);
  if (compact.length !== 32) return id;
  return [
    compact.slice(0, 8),
    compact.slice(8, 12),
    compact.slice(12, 16),
    compact.slice(16, 20),
    compact.slice(20),
  ].join('-');
}

/**
 * Directory name for a document title.
 *
 * @example
 * directoryForTitle('SSH – Secure Shell')   // 'ssh-secure-shell'
 * directoryForTitle('Node.js Internals')    // 'nodejs-internals'
 */
export function directoryForTitle(title: string, overrides: Record<string, string> = {}): string {
  const key = title.trim().toLowerCase();
  const override = overrides[key] ?? BUILTIN_DIRECTORY_OVERRIDES[key];
  if (override) return override;

  const slug = title
    .replace(/[–—]/g, '-')
    .replace(/&/g, '-')
    .replace(/[^\p{L}\p{M}\p{N}_\s-]/gu, '')
    .replace(/[\s_]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '')
    .toLowerCase();
  return slug || 'untitled';
}

function envFlag(value: string | undefined): boolean {
  return (value ?? 'false').trim().toLowerCase() === 'true';
}

// One path segment, not hidden
const VALID_DIRECTORY = /^[^./\\][^/\\]*$/;

interface FileSettings {
  indexTitle?: string;
  indexDescription?: string;
  remote?: string;
  branch?: string;
  exclude?: string[];
  directoryOverrides?: Record<string, string>;
}

function readOptionalString(data: Record<string, unknown>, key: string, file: string): string | undefined {
  const value = data[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || !value.trim()) {
    throw new ConfigError(`${file}: "${key}" must be a non-empty string`);
  }
  return value;
}

/**
 * Read the optional per-repository config file.
 */
export function loadFileSettings(repoRoot: string): FileSettings {
  const file = configFilePath(repoRoot);
  if (!fs.existsSync(file)) return {};

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not parse ${file}: ${message}`);
  }
  if (!isRecord(data)) {
    throw new ConfigError(`${file} must contain a JSON object`);
  }

  const settings: FileSettings = {
    indexTitle: readOptionalString(data, 'indexTitle', file),
    indexDescription: readOptionalString(data, 'indexDescription', file),
    remote: readOptionalString(data, 'remote', file),
    branch: readOptionalString(data, 'branch', file),
  };

  const exclude = data['exclude'];
  if (exclude !== undefined) {
    if (!Array.isArray(exclude) || !exclude.every((p): p is string => typeof p === 'string')) {
      throw new ConfigError(`${file}: "exclude" must be an array of glob strings`);
    }
    settings.exclude = exclude;
  }

  const overrides = data['directoryOverrides'];
  if (overrides !== undefined) {
    if (!isRecord(overrides)) {
      throw new ConfigError(`${file}: "directoryOverrides" must be an object`);
    }
    const normalized: Record<string, string> = {};
    for (const [title, directory] of Object.entries(overrides)) {
      if (typeof directory !== 'string' || !VALID_DIRECTORY.test(directory)) {
        throw new ConfigError(`${file}: directory override for "${title}" must be a plain directory name`);
      }
      normalized[title.trim().toLowerCase()] = directory;
    }
    settings.directoryOverrides = normalized;
  }

  return settings;
}

/**
 * The mirror repository: `REPO_ROOT`, or the working directory.
 */
export function resolveRepoRoot(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(env.REPO_ROOT?.trim() || process.cwd());
}

/**
 * Resolve settings from environment variables, `<repoRoot>/.env` and the
 * optional config file. Variables already set in the environment take
 * precedence over the `.env` file.
 * All missing required variables are reported in a single error.
 */
export function loadSettings(processEnv: NodeJS.ProcessEnv = process.env): Settings {
  const repoRoot = resolveRepoRoot(processEnv);
  const env: NodeJS.ProcessEnv = { ...loadEnvFile(path.join(repoRoot, ENV_FILE_NAME)), ...processEnv };

  const missing = REQUIRED_ENV.filter(name => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variable(s): ${missing.join(', ')}`);
  }

  const file = loadFileSettings(repoRoot);

  return {
    notionToken: (env.NOTION_TOKEN ?? '').trim(),
    parentPageId: normalizeId((env.NOTION_PARENT_PAGE_ID ?? '').trim()),
    gitUserName: (env.GIT_USER_NAME ?? '').trim(),
    gitUserEmail: (env.GIT_USER_EMAIL ?? '').trim(),
    githubToken: env.GITHUB_TOKEN?.trim() || null,
    repoRoot,
    debug: envFlag(env.DEBUG),
    dryRun: envFlag(env.DRY_RUN),
    forceSync: envFlag(env.FORCE_SYNC),
    indexTitle: file.indexTitle ?? DEFAULT_INDEX_TITLE,
    indexDescription: file.indexDescription ?? DEFAULT_INDEX_DESCRIPTION,
    remote: file.remote ?? 'origin',
    branch: file.branch ?? 'main',
    exclude: file.exclude ?? [],
    directoryOverrides: file.directoryOverrides ?? {},
  };
}
