import type { Command } from 'commander';
import chalk from 'chalk';

export const OUTPUT_FORMATS = ['text', 'json', 'table'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface GlobalFlags {
  output: OutputFormat;
  verbose: boolean;
  quiet: boolean;
  noColor: boolean;
  dryRun: boolean;
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Add universal flags to a command.
 * Call this on each leaf command (action command) to register the flags.
 */
export function addGlobalFlags(cmd: Command): Command {
  return cmd
    .option('-o, --output <format>', 'Output format: text, json, table (default: auto)')
    .option('-v, --verbose', 'Verbose output (debug info)')
    .option('-q, --quiet', 'Minimal output (errors only)')
    .option('--no-color', 'Disable colored output')
    .option('--dry-run', 'Write files but do not commit or push');
}

/**
 * Resolve global flags from parsed options, applying TTY detection defaults.
 * `env` supplies the DEBUG and DRY_RUN switches when the flags are absent.
 */
export function resolveFlags(
  opts: Record<string, unknown>,
  env: Partial<Pick<NodeJS.ProcessEnv, 'DEBUG' | 'DRY_RUN'>> = {},
): GlobalFlags {
  const isTTY = process.stdout.isTTY ?? false;
  const noColor = opts.noColor === true || opts.color === false;
  const requested = opts.output;
  let format: OutputFormat;
  if (requested === undefined) {
    format = isTTY ? 'text' : 'json';
  } else if (isOutputFormat(requested)) {
    format = requested;
  } else {
    throw new Error(`Invalid output format: ${String(requested)} (expected ${OUTPUT_FORMATS.join(', ')})`);
  }

  if (noColor) {
    chalk.level = 0;
  }

  return {
    output: format,
    verbose: opts.verbose === true || env.DEBUG?.trim().toLowerCase() === 'true',
    quiet: opts.quiet === true,
    noColor,
    dryRun: opts.dryRun === true || env.DRY_RUN?.trim().toLowerCase() === 'true',
  };
}
