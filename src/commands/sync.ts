import type { Command } from 'commander';
import chalk from 'chalk';
import { loadSettings, resolveRepoRoot, stateFilePath } from '../config.js';
import { createNotionSource } from '../client.js';
import { createAssetResolver } from '../render/assets.js';
import { addGlobalFlags, resolveFlags } from '../utils/flags.js';
import { createOutput, handleError } from '../utils/output.js';
import { createGitBackend } from '../sync/git.js';
import { createStateStore } from '../sync/state.js';
import { runSync, describeStatus, cleanRepository, formatUtc } from '../sync/engine.js';

export function registerSyncCommands(program: Command): void {
  // sync (default command)
  addGlobalFlags(program.command('sync', { isDefault: true })
    .description('Mirror Notion pages into the repository and commit the changes')
    .option('--no-push', 'Commit without pushing to the remote')
    .option('--force', 'Re-render every page, even if unchanged'))
    .action(async (_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts, process.env);
      const out = createOutput(flags);
      try {
        const settings = loadSettings();
        const source = createNotionSource(settings, out);
        const git = createGitBackend({
          repoRoot: settings.repoRoot,
          userName: settings.gitUserName,
          userEmail: settings.gitUserEmail,
          githubToken: settings.githubToken,
          logger: out,
        });
        const state = createStateStore(stateFilePath(settings.repoRoot), {
          onWarning: message => out.warn(message),
        });
        const resolver = createAssetResolver({
          fetchBinary: (url, signal) => source.fetchBinary(url, signal),
          onWarning: message => out.warn(message),
        });
        const dryRun = flags.dryRun || settings.dryRun;

        out.debug(`Repository: ${settings.repoRoot}`);
        out.startSpinner('Syncing from Notion...');
        const result = await runSync(
          settings,
          { source, git, state, resolver, logger: out },
          { push: _opts.push !== false, force: _opts.force === true || settings.forceSync, dryRun },
        );

        if (result.failed.length > 0) {
          out.failSpinner(`Sync finished with ${result.failed.length} failure(s)`);
          for (const failure of result.failed) {
            out.error(`  ${failure.title}: ${failure.error}`);
          }
          process.exitCode = 1;
        } else {
          out.succeedSpinner(dryRun ? 'Dry run complete' : 'Sync complete');
        }

        out.record({
          synced: result.synced.length,
          skipped: result.skipped.length,
          failed: result.failed.length,
          images: result.assetsDownloaded,
          requests: source.requestCount,
          committed: result.commitCreated,
          pushed: result.pushed,
          message: result.message,
        });
      } catch (err) {
        handleError(out, err, 'Sync failed');
      }
    });

  // status
  addGlobalFlags(program.command('status')
    .description('Show the pages tracked in the repository and when they were synced'))
    .action(async (_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts, process.env);
      const out = createOutput(flags);
      try {
        const repoRoot = resolveRepoRoot();
        const report = describeStatus(createStateStore(stateFilePath(repoRoot), {
          onWarning: message => out.warn(message),
        }));

        if (flags.output === 'text') {
          out.status(`Last sync: ${report.lastSyncTime ? formatUtc(report.lastSyncTime) : chalk.dim('never')}`);
        }
        out.list(
          report.documents.map(d => ({
            title: d.title,
            directory: d.directory,
            lastEdited: d.lastEditedTime,
            lastSynced: d.lastSyncedTime,
          })),
          {
            emptyMessage: 'No pages synced yet. Run `notion-mirror sync` first.',
            columns: [
              { key: 'title', header: 'Title' },
              { key: 'directory', header: 'Directory' },
              { key: 'lastEdited', header: 'Last Edited' },
              { key: 'lastSynced', header: 'Last Synced' },
            ],
            textFn: (d) => `${chalk.cyan(String(d.title))} ${chalk.dim(`→ ${String(d.directory)}/`)} (edited ${formatUtc(String(d.lastEdited))})`,
          },
        );
      } catch (err) {
        handleError(out, err);
      }
    });

  // clean --yes
  addGlobalFlags(program.command('clean')
    .description('Delete every synced directory and the index, and reset the sync state')
    .option('--yes', 'Confirm the deletion'))
    .action(async (_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts, process.env);
      const out = createOutput(flags);
      if (_opts.yes !== true && !flags.dryRun) {
        out.error('Refusing to delete synced content without --yes (use --dry-run to preview).');
        process.exitCode = 1;
        return;
      }
      try {
        const repoRoot = resolveRepoRoot();
        const state = createStateStore(stateFilePath(repoRoot), {
          onWarning: message => out.warn(message),
        });
        const removed = cleanRepository(repoRoot, state, { dryRun: flags.dryRun, logger: out });

        if (flags.dryRun) {
          out.list(removed.map(p => ({ path: p })), {
            emptyMessage: 'Nothing to remove.',
            textFn: (item) => `Would remove: ${String(item.path)}`,
          });
        } else {
          out.success(`Removed ${removed.length} path(s) and reset the sync state`, { removed: removed.length });
        }
      } catch (err) {
        handleError(out, err);
      }
    });
}
