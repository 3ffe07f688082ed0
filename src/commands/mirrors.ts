import type { Command } from 'commander';
import chalk from 'chalk';
import { addGlobalFlags, resolveFlags } from '../utils/flags.js';
import { createOutput, handleError } from '../utils/output.js';
import { buildMirrorConfig, loadSettings } from '../config.js';
import { loadMirrors, createMirror, deleteMirror, getMirror, updateLastRun } from '../mirror/mirrors.js';
import { createMirrorEngine } from '../mirror/engine.js';
import { createCommandLogger, executePass } from './run.js';

const NEVER = new Date(0).toISOString();

export function registerMirrorCommands(program: Command): void {
  const mirrors = program.command('mirrors').description('Save and manage mirror definitions');

  // mirrors add <source> <replica>
  addGlobalFlags(mirrors.command('add')
    .description('Save a source/replica pair for later runs and the daemon')
    .argument('<source>', 'Source directory')
    .argument('<replica>', 'Replica directory')
    .option('--name <name>', 'Label to refer to the mirror by')
    .option('--algorithm <name>', 'Fingerprint hash algorithm')
    .option('--interval <interval>', 'Daemon interval, e.g. 30s, 5m, 1h')
    .option('--ignore <patterns...>', 'Glob patterns to leave out of the mirror'))
    .action((source: string, replica: string, _opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        const settings = loadSettings();
        const mirror = createMirror({
          sourcePath: source,
          replicaPath: replica,
          name: typeof _opts.name === 'string' ? _opts.name : undefined,
          algorithm: typeof _opts.algorithm === 'string' ? _opts.algorithm : settings.algorithm,
          interval: typeof _opts.interval === 'string' ? _opts.interval : settings.interval,
          ignore: Array.isArray(_opts.ignore) ? _opts.ignore.map(String) : undefined,
        });

        out.success('Mirror saved', {
          id: mirror.id,
          name: mirror.name ?? null,
          source: mirror.sourcePath,
          replica: mirror.replicaPath,
          algorithm: mirror.algorithm,
          interval: mirror.interval,
        });

        if (flags.output === 'text' && !flags.quiet) {
          out.status('');
          out.status(`Run ${chalk.cyan(`treemirror mirrors run ${mirror.id.slice(0, 8)}`)} for a first pass, or ${chalk.cyan('treemirror daemon start')} to keep it in sync.`);
        }
      } catch (err) {
        handleError(out, err, 'Failed to save mirror');
      }
    });

  // mirrors list
  addGlobalFlags(mirrors.command('list')
    .description('List saved mirrors'))
    .action((_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        out.list(
          loadMirrors().map(m => ({
            id: m.id,
            name: m.name ?? '',
            source: m.sourcePath,
            replica: m.replicaPath,
            algorithm: m.algorithm,
            interval: m.interval,
            lastRunAt: m.lastRunAt,
          })),
          {
            emptyMessage: 'No saved mirrors. Run `treemirror mirrors add` to create one.',
            columns: [
              { key: 'id', header: 'ID', width: 36 },
              { key: 'name', header: 'Name' },
              { key: 'source', header: 'Source' },
              { key: 'replica', header: 'Replica' },
              { key: 'interval', header: 'Interval' },
            ],
            textFn: (m) => {
              const title = m.name ? `${String(m.id)} (${String(m.name)})` : String(m.id);
              const lines = [chalk.cyan(`  ${title}`)];
              lines.push(`  Source:    ${String(m.source)}`);
              lines.push(`  Replica:   ${String(m.replica)}`);
              lines.push(`  Algorithm: ${String(m.algorithm)}, every ${String(m.interval)}`);
              if (m.lastRunAt !== NEVER) {
                lines.push(`  Last run:  ${new Date(String(m.lastRunAt)).toLocaleString()}`);
              } else {
                lines.push(`  Last run:  ${chalk.dim('never')}`);
              }
              return lines.join('\n');
            },
          },
        );
      } catch (err) {
        handleError(out, err, 'Failed to list mirrors');
      }
    });

  // mirrors remove <id>
  addGlobalFlags(mirrors.command('remove')
    .description('Forget a saved mirror (the replica is left as it is)')
    .argument('<id>', 'Mirror ID, ID prefix or name'))
    .action((id: string, _opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        const mirror = getMirror(id);
        if (!mirror || !deleteMirror(mirror.id)) {
          out.failSpinner(`Mirror not found: ${id}`);
          process.exitCode = 1;
          return;
        }
        out.success('Mirror removed', { id: mirror.id, removed: true });
      } catch (err) {
        handleError(out, err, 'Failed to remove mirror');
      }
    });

  // mirrors run <id>
  addGlobalFlags(mirrors.command('run')
    .description('Run one pass of a saved mirror')
    .argument('<id>', 'Mirror ID, ID prefix or name')
    .option('--log-file <path>', 'Append log lines to this file')
    .option('--continue-on-error', 'Skip failing entries instead of aborting the pass'))
    .action((id: string, _opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        const mirror = getMirror(id);
        if (!mirror) {
          out.error(`Mirror not found: ${id}`);
          process.exitCode = 1;
          return;
        }

        const config = buildMirrorConfig({
          source: mirror.sourcePath,
          replica: mirror.replicaPath,
          algorithm: mirror.algorithm,
          ignore: mirror.ignore,
        });
        const logFile = typeof _opts.logFile === 'string' ? _opts.logFile : loadSettings().logFile;
        const engine = createMirrorEngine(config, { logger: createCommandLogger(out, logFile) });
        const result = executePass(engine, out, flags, _opts.continueOnError === true);

        if (!result.dryRun && result.status === 'complete') {
          updateLastRun(mirror.id, result.startedAt);
        }
      } catch (err) {
        handleError(out, err, 'Synchronization failed');
      }
    });
}
