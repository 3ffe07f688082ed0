import type { Command } from 'commander';
import chalk from 'chalk';
import { addGlobalFlags, resolveFlags, type GlobalFlags } from '../utils/flags.js';
import { createOutput, handleError, type Output } from '../utils/output.js';
import { formatBytes } from '../utils/format.js';
import { buildMirrorConfig, loadSettings, parseInterval } from '../config.js';
import { createMirrorEngine, type MirrorEngine } from '../mirror/engine.js';
import { createScheduler } from '../mirror/scheduler.js';
import { createSourceWatcher } from '../mirror/watcher.js';
import { resolveIgnorePatterns } from '../mirror/ignore.js';
import { formatPlan } from '../mirror/plan.js';
import {
  MirrorLogger,
  combineSinks,
  createFileSink,
  createOutputSink,
  formatTimestamp,
  type LogSink,
} from '../mirror/logger.js';
import type { MirrorConfig, PassResult } from '../mirror/types.js';

interface PassCommandOptions {
  algorithm?: string;
  logFile?: string;
  ignore?: string[];
  continueOnError?: boolean;
  interval?: string;
  onChange?: boolean;
}

/**
 * Build the logger for a command: console output plus the log file, if any.
 */
export function createCommandLogger(out: Output, logFile?: string): MirrorLogger {
  const sinks: LogSink[] = [createOutputSink(out)];
  if (logFile) {
    sinks.push(createFileSink(logFile));
  }
  return new MirrorLogger(combineSinks(...sinks));
}

export function summarizeCounts(result: PassResult): string {
  const { created, updated, deleted, unchanged, bytesCopied } = result.counts;
  const parts = [`${created} created`, `${updated} updated`, `${deleted} deleted`, `${unchanged} unchanged`];
  const copied = result.dryRun ? '' : ` (${formatBytes(bytesCopied)} copied)`;
  return parts.join(', ') + copied;
}

/**
 * Run one pass and report it. Sets a failing exit code when the pass
 * aborted or recorded errors.
 */
export function executePass(
  engine: MirrorEngine,
  out: Output,
  flags: GlobalFlags,
  continueOnError = false,
): PassResult {
  out.startSpinner(flags.dryRun ? 'Planning...' : 'Synchronizing...');
  const result = engine.runOnePass({
    dryRun: flags.dryRun,
    errorPolicy: continueOnError ? 'continue' : 'abort',
  });
  out.stopSpinner();

  if (result.status === 'aborted' || result.errors.length > 0) {
    process.exitCode = 1;
  }

  if (flags.output === 'json') {
    out.record({
      status: result.status,
      dryRun: result.dryRun,
      created: result.counts.created,
      updated: result.counts.updated,
      deleted: result.counts.deleted,
      unchanged: result.counts.unchanged,
      bytesCopied: result.counts.bytesCopied,
      errors: result.errors.length,
      durationMs: result.durationMs,
    });
    return result;
  }

  if (result.dryRun) {
    out.status(chalk.yellow('Dry run — no changes will be made:'));
    out.status(formatPlan(result.plan));
  } else if (flags.verbose && result.plan.entries.length > 0) {
    out.status(formatPlan(result.plan));
  }

  if (result.status === 'aborted') {
    out.failSpinner(`Synchronization aborted after ${summarizeCounts(result)}`);
  } else if (result.errors.length > 0) {
    out.failSpinner(`Synchronization completed with ${result.errors.length} error(s): ${summarizeCounts(result)}`);
    for (const err of result.errors) {
      out.error(`  ${err.path}: ${err.error}`);
    }
  } else if (!result.dryRun) {
    const changes = result.plan.entries.length;
    out.succeedSpinner(changes === 0 ? 'Replica is up to date' : `Synchronization complete: ${summarizeCounts(result)}`);
  }
  return result;
}

function resolveConfig(source: string, replica: string, opts: PassCommandOptions): { config: MirrorConfig; logFile?: string } {
  const settings = loadSettings();
  const config = buildMirrorConfig({
    source,
    replica,
    algorithm: opts.algorithm ?? settings.algorithm,
    ignore: opts.ignore,
  });
  return { config, logFile: opts.logFile ?? settings.logFile };
}

export function registerRunCommands(program: Command): void {
  // run <source> <replica>
  addGlobalFlags(program.command('run')
    .description('Run one synchronization pass from source to replica')
    .argument('<source>', 'Source directory (read-only)')
    .argument('<replica>', 'Replica directory (created if missing)')
    .option('--algorithm <name>', 'Fingerprint hash algorithm (default: md5)')
    .option('--log-file <path>', 'Append log lines to this file')
    .option('--ignore <patterns...>', 'Glob patterns to leave out of the mirror')
    .option('--continue-on-error', 'Skip failing entries instead of aborting the pass')
    .addHelpText('after', `
EXAMPLES
  treemirror run ./source ./replica
  treemirror run ./source ./replica --dry-run
  treemirror run ./source ./replica --algorithm sha256 --log-file sync.log`))
    .action((source: string, replica: string, _opts: Record<string, unknown> & PassCommandOptions) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        const { config, logFile } = resolveConfig(source, replica, _opts);
        const engine = createMirrorEngine(config, { logger: createCommandLogger(out, logFile) });
        out.debug(`Mirroring ${config.sourcePath} -> ${config.replicaPath} (${config.algorithm})`);
        executePass(engine, out, flags, _opts.continueOnError === true);
      } catch (err) {
        handleError(out, err, 'Synchronization failed');
      }
    });

  // watch <source> <replica>
  addGlobalFlags(program.command('watch')
    .description('Synchronize periodically until interrupted')
    .argument('<source>', 'Source directory (read-only)')
    .argument('<replica>', 'Replica directory (created if missing)')
    .option('--interval <interval>', 'Delay between passes, e.g. 30s, 5m, 1h (default: 300s)')
    .option('--algorithm <name>', 'Fingerprint hash algorithm (default: md5)')
    .option('--log-file <path>', 'Append log lines to this file')
    .option('--ignore <patterns...>', 'Glob patterns to leave out of the mirror')
    .option('--continue-on-error', 'Skip failing entries instead of aborting the pass')
    .option('--on-change', 'Also run a pass shortly after the source changes'))
    .action(async (source: string, replica: string, _opts: Record<string, unknown> & PassCommandOptions) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        const { config, logFile } = resolveConfig(source, replica, _opts);
        const interval = _opts.interval ?? loadSettings().interval;
        const intervalMs = parseInterval(interval);
        const logger = createCommandLogger(out, logFile);
        const engine = createMirrorEngine(config, { logger });

        out.status(`Watching ${chalk.cyan(config.sourcePath)}`);
        out.status(`  Replica:   ${config.replicaPath}`);
        out.status(`  Interval:  ${interval}`);
        out.status(`  Algorithm: ${config.algorithm}`);
        if (logFile) out.status(`  Log file:  ${logFile}`);
        out.status('');
        out.status('Press Ctrl+C to stop.');
        out.status('');

        const scheduler = createScheduler(engine, {
          intervalMs,
          logger,
          errorPolicy: _opts.continueOnError ? 'continue' : 'abort',
          onPass: (result) => {
            const time = formatTimestamp(new Date());
            if (result.status === 'aborted') {
              out.error(`[${time}] Pass aborted: ${result.errors.map(e => e.error).join('; ') || 'cancelled'}`);
            } else if (result.plan.entries.length > 0 || result.errors.length > 0) {
              out.status(`[${time}] Pass complete: ${summarizeCounts(result)}`);
            } else {
              out.debug(`[${time}] Pass complete: up to date`);
            }
          },
          onError: (err) => out.error(err.message),
        });

        const sourceWatcher = _opts.onChange
          ? createSourceWatcher(config, {
            ignorePatterns: resolveIgnorePatterns(config.ignore, config.sourcePath),
            onChange: (paths) => {
              out.debug(`Source changed (${paths.length} path(s)), running a pass`);
              scheduler.trigger();
            },
            onError: (err) => out.error(err.message),
          })
          : null;

        await new Promise<void>((resolve) => {
          const shutdown = () => {
            process.off('SIGINT', shutdown);
            process.off('SIGTERM', shutdown);
            out.status('\nStopping...');
            scheduler.stop();
            const closed = sourceWatcher ? sourceWatcher.stop() : Promise.resolve();
            closed
              .catch((err: unknown) => handleError(out, err))
              .finally(() => {
                out.status('Watch stopped.');
                resolve();
              });
          };
          process.on('SIGINT', shutdown);
          process.on('SIGTERM', shutdown);
        });
      } catch (err) {
        handleError(out, err, 'Watch failed');
      }
    });
}
