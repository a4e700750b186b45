#!/usr/bin/env node
import { Command } from 'commander';
import { registerSyncCommands } from './commands/sync.js';

const program = new Command();
program
  .name('notion-mirror')
  .description('Mirror Notion pages into a git repository as Markdown')
  .version('1.0.0')
  .addHelpText('after', `
GETTING STARTED
  export NOTION_TOKEN=...  NOTION_PARENT_PAGE_ID=...
  export GIT_USER_NAME=...  GIT_USER_EMAIL=...
  notion-mirror                              Sync, commit and push
  notion-mirror sync --dry-run               Write files, print the commit message

COMMON WORKFLOWS
  notion-mirror sync --force                 Re-render every page
  notion-mirror sync --no-push               Commit locally only
  notion-mirror status                       List synced pages
  notion-mirror clean --yes                  Remove synced content and reset state

CONFIGURATION
  .notion-sync/config.json                   Index title, remote, branch, exclude, directory overrides
  .notion-sync-ignore                        Glob patterns of pages to skip`);

registerSyncCommands(program);

try {
  await program.parseAsync(process.argv);
} catch (err) {
  process.stderr.write((err instanceof Error ? err.message : String(err)) + '\n');
  process.exitCode = 1;
}
