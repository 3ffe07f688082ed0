import type { Command } from 'commander';
import chalk from 'chalk';

export type OutputFormat = 'text' | 'json' | 'table';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'table'];

export interface GlobalFlags {
  output: OutputFormat;
  verbose: boolean;
  quiet: boolean;
  noColor: boolean;
  dryRun: boolean;
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
    .option('--dry-run', 'Preview changes without touching the replica');
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Resolve global flags from parsed options, applying TTY detection defaults.
 */
export function resolveFlags(opts: Record<string, unknown>): GlobalFlags {
  const isTTY = process.stdout.isTTY ?? false;
  const noColor = opts.noColor === true || opts.color === false;

  if (opts.output !== undefined && !isOutputFormat(opts.output)) {
    throw new Error(`Invalid output format "${String(opts.output)}". Use one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  const format: OutputFormat = isOutputFormat(opts.output) ? opts.output : (isTTY ? 'text' : 'json');

  if (noColor) {
    chalk.level = 0;
  }

  return {
    output: format,
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    noColor,
    dryRun: opts.dryRun === true,
  };
}
