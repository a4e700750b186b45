import chalk from 'chalk';
import ora from 'ora';
import type { GlobalFlags } from './flags.js';
import type { SyncLogger } from '../sync/types.js';

/**
 * Column definition for table output.
 */
export interface TableColumn {
  key: string;
  header: string;
}

/**
 * Output helper that centralizes formatting for text, json, and table modes.
 * Status messages go to stderr so stdout stays clean for piping.
 * Doubles as the logger handed to the sync engine and its collaborators.
 */
export class Output implements SyncLogger {
  private flags: GlobalFlags;
  private spinner: ReturnType<typeof ora> | null = null;

  constructor(flags: GlobalFlags) {
    this.flags = flags;
  }

  /**
   * Start a spinner (only shown in text mode, non-quiet, TTY).
   */
  startSpinner(message: string): void {
    if (this.flags.output === 'text' && !this.flags.quiet && process.stderr.isTTY) {
      this.spinner = ora({ text: message, stream: process.stderr }).start();
    }
  }

  /**
   * Stop the spinner without a status symbol.
   */
  stopSpinner(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  /**
   * Stop the spinner with a success message.
   */
  succeedSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else if (this.flags.output === 'text' && !this.flags.quiet) {
      process.stderr.write(chalk.green('✓') + ' ' + message + '\n');
    }
  }

  /**
   * Stop the spinner with a failure message.
   */
  failSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    } else {
      process.stderr.write(chalk.red('✖') + ' ' + message + '\n');
    }
  }

  /**
   * Print a status/info message to stderr (never captured by piping).
   * While a spinner runs, the message becomes its text instead.
   */
  status(message: string): void {
    if (this.flags.quiet) return;
    if (this.spinner) {
      this.spinner.text = message;
    } else {
      process.stderr.write(message + '\n');
    }
  }

  /**
   * Print a verbose/debug message to stderr.
   */
  debug(message: string): void {
    if (this.flags.verbose) {
      this.writeAboveSpinner(chalk.dim('[debug] ' + message));
    }
  }

  /**
   * Print an error message to stderr.
   */
  error(message: string): void {
    this.writeAboveSpinner(chalk.red(message));
  }

  /**
   * Print a warning message to stderr.
   */
  warn(message: string): void {
    if (!this.flags.quiet) {
      this.writeAboveSpinner(chalk.yellow(message));
    }
  }

  /**
   * Output a single record based on the format.
   * - text: prints key-value lines
   * - json: prints a single JSON object
   * - table: prints a single-row table
   */
  record(data: Record<string, unknown>, columns?: TableColumn[]): void {
    switch (this.flags.output) {
      case 'json':
        process.stdout.write(JSON.stringify(data) + '\n');
        break;
      case 'table':
        this.table([data], columns);
        break;
      case 'text':
      default:
        this.printKeyValue(data);
        break;
    }
  }

  /**
   * Output a list of records based on the format.
   * - text: prints each item using textFn, or key-value pairs
   * - json: prints one JSON object per line (JSON Lines)
   * - table: prints an ASCII table
   */
  list(
    data: Record<string, unknown>[],
    options?: {
      columns?: TableColumn[];
      textFn?: (item: Record<string, unknown>) => string;
      emptyMessage?: string;
    },
  ): void {
    if (data.length === 0) {
      if (this.flags.output === 'json') {
        return;
      }
      if (options?.emptyMessage && !this.flags.quiet) {
        this.status(options.emptyMessage);
      }
      return;
    }

    switch (this.flags.output) {
      case 'json':
        for (const item of data) {
          process.stdout.write(JSON.stringify(item) + '\n');
        }
        break;
      case 'table':
        this.table(data, options?.columns);
        break;
      case 'text':
      default:
        if (options?.textFn) {
          for (const item of data) {
            process.stdout.write(options.textFn(item) + '\n');
          }
        } else {
          for (const item of data) {
            this.printKeyValue(item);
            process.stdout.write('\n');
          }
        }
        break;
    }
  }

  /**
   * Print a success result (used for create/update/delete confirmations).
   */
  success(message: string, data?: Record<string, unknown>): void {
    if (this.flags.output === 'json' && data) {
      process.stdout.write(JSON.stringify(data) + '\n');
    } else if (!this.flags.quiet) {
      this.succeedSpinner(message);
      if (data && this.flags.output === 'text') {
        this.printKeyValue(data);
      }
    }
  }

  private writeAboveSpinner(line: string): void {
    if (this.spinner) {
      this.spinner.clear();
      process.stderr.write(line + '\n');
      this.spinner.render();
    } else {
      process.stderr.write(line + '\n');
    }
  }

  private printKeyValue(data: Record<string, unknown>): void {
    const maxKeyLen = Math.max(...Object.keys(data).map(k => k.length));
    for (const [key, value] of Object.entries(data)) {
      const label = key.charAt(0).toUpperCase() + key.slice(1);
      const padding = ' '.repeat(Math.max(0, maxKeyLen - key.length + 1));
      const displayValue = value === null || value === undefined
        ? chalk.dim('none')
        : String(value);
      process.stdout.write(`${label}:${padding}${displayValue}\n`);
    }
  }

  private table(data: Record<string, unknown>[], columns?: TableColumn[]): void {
    if (data.length === 0) return;

    const cols: TableColumn[] = columns ?? Object.keys(data[0]).map(key => ({
      key,
      header: key.charAt(0).toUpperCase() + key.slice(1),
    }));
    const cell = (row: Record<string, unknown>, key: string): string => String(row[key] ?? '');
    const widths = cols.map(col => Math.max(col.header.length, ...data.map(row => cell(row, col.key).length)));

    const border = (left: string, join: string, right: string): string =>
      left + widths.map(w => '─'.repeat(w + 2)).join(join) + right;
    const line = (values: string[]): string =>
      '│' + values.map((value, i) => ` ${value.padEnd(widths[i])} `).join('│') + '│';

    const lines = [
      border('┌', '┬', '┐'),
      line(cols.map(col => col.header)),
      border('├', '┼', '┤'),
      ...data.map(row => line(cols.map(col => cell(row, col.key)))),
      border('└', '┴', '┘'),
    ];
    process.stdout.write(lines.join('\n') + '\n');
  }
}

/**
 * Create an Output instance from global flags.
 */
export function createOutput(flags: GlobalFlags): Output {
  return new Output(flags);
}

/**
 * Standard error handler for commands.
 * Prints error to stderr and sets exit code.
 */
export function handleError(out: Output, err: unknown, spinnerMessage?: string): void {
  if (spinnerMessage) {
    out.failSpinner(spinnerMessage);
  }
  const message = err instanceof Error ? err.message : String(err);
  out.error(message);
  process.exitCode = 1;
}
