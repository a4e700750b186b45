/**
 * Git backend for the sync engine.
 * Shells out to the `git` binary in the repository root; nothing here
 * reads repository internals directly.
 */
import { execFile } from 'node:child_process';
import type { SyncLogger, VersionControl } from './types.js';

const MAX_BUFFER = 16 * 1024 * 1024;

export interface GitResult {
  code: number;
  stdout: string;
  stderr: string;
}

export class GitError extends Error {
  constructor(
    readonly args: string[],
    readonly code: number,
    readonly stderr: string,
  ) {
    super(`git ${args[0] ?? ''} failed (exit ${code})${stderr.trim() ? `: ${stderr.trim()}` : ''}`);
    this.name = 'GitError';
  }
}

export interface GitBackendOptions {
  repoRoot: string;
  userName: string;
  userEmail: string;
  /** Token for pushing to GitHub over HTTPS */
  githubToken?: string | null;
  logger: SyncLogger;
  /** Command runner; defaults to spawning the git binary */
  run?: GitRunner;
}

export type GitRunner = (repoRoot: string, args: string[]) => Promise<GitResult>;

export function runGit(repoRoot: string, args: string[]): Promise<GitResult> {
  return new Promise((resolve, reject) => {
    execFile('git', ['-C', repoRoot, ...args], { maxBuffer: MAX_BUFFER }, (error, stdout, stderr) => {
      if (error && typeof error.code !== 'number') {
        // git could not be started at all (e.g. ENOENT)
        reject(error);
        return;
      }
      resolve({
        code: error && typeof error.code === 'number' ? error.code : 0,
        stdout: String(stdout),
        stderr: String(stderr),
      });
    });
  });
}

function authHeaderArgs(token: string): string[] {
  const basic = Buffer.from(`x-access-token:${token}`, 'utf-8').toString('base64');
  return ['-c', `http.https://github.com/.extraheader=AUTHORIZATION: basic ${basic}`];
}

function describeArgs(args: string[]): string {
  return args.map(arg => (arg.includes('.extraheader=') ? '<auth header>' : arg)).join(' ');
}

export function createGitBackend(options: GitBackendOptions): VersionControl {
  const { repoRoot, logger } = options;
  const run = options.run ?? runGit;

  async function git(args: string[]): Promise<GitResult> {
    logger.debug(`Running: git ${describeArgs(args)}`);
    return run(repoRoot, args);
  }

  async function gitChecked(args: string[]): Promise<GitResult> {
    const result = await git(args);
    if (result.code !== 0) {
      throw new GitError(args, result.code, result.stderr);
    }
    return result;
  }

  return {
    async ensureRepository() {
      const probe = await git(['rev-parse', '--git-dir']);
      if (probe.code !== 0) {
        await gitChecked(['init']);
        logger.status('Initialized new git repository');
      }
    },

    async configureUser() {
      try {
        await gitChecked(['config', 'user.name', options.userName]);
        await gitChecked(['config', 'user.email', options.userEmail]);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn(`Could not configure git user: ${message}`);
      }
    },

    async hasCommits() {
      const result = await git(['rev-parse', '--verify', '--quiet', 'HEAD']);
      return result.code === 0;
    },

    async detectStatus() {
      const result = await git(['status', '--porcelain=v1', '-uall']);
      if (result.code !== 0) {
        logger.warn(`git status failed: ${result.stderr.trim()}`);
        return [];
      }
      // Leading spaces are part of the status code
      return result.stdout.split('\n').filter(line => line.length > 0);
    },

    async stageAll() {
      await gitChecked(['add', '-A']);
    },

    async commit(message) {
      const staged = await git(['diff', '--cached', '--quiet']);
      if (staged.code === 0) {
        logger.debug('No changes to commit');
        return false;
      }
      if (staged.code !== 1) {
        throw new GitError(['diff', '--cached', '--quiet'], staged.code, staged.stderr);
      }
      await gitChecked(['commit', '-m', message]);
      logger.status(`Committed: ${message.split('\n')[0]}`);
      return true;
    },

    async push(remote, branch) {
      const remoteUrl = await git(['remote', 'get-url', remote]);
      if (remoteUrl.code !== 0) {
        logger.warn(`Remote '${remote}' not configured, skipping push`);
        return false;
      }
      const auth = options.githubToken ? authHeaderArgs(options.githubToken) : [];
      const result = await git([...auth, 'push', remote, branch]);
      if (result.code !== 0) {
        logger.error(`Push failed: ${result.stderr.trim()}`);
        return false;
      }
      logger.status(`Pushed to ${remote}/${branch}`);
      return true;
    },
  };
}
