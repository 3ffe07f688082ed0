import type { Command } from 'commander';
import chalk from 'chalk';
import { addGlobalFlags, resolveFlags } from '../utils/flags.js';
import { createOutput, handleError } from '../utils/output.js';
import { formatUptime } from '../utils/format.js';
import { startDaemon, stopDaemon, getDaemonStatus } from '../mirror/daemon.js';
import { loadMirrors } from '../mirror/mirrors.js';

export function registerDaemonCommands(program: Command): void {
  const daemon = program.command('daemon').description('Manage the background mirror daemon');

  addGlobalFlags(daemon.command('start')
    .description('Start the daemon; it runs every saved mirror on its interval')
    .option('--log-file <path>', 'Custom log file path'))
    .action((_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        if (loadMirrors().length === 0) {
          out.error('No saved mirrors. Run `treemirror mirrors add` first.');
          process.exitCode = 1;
          return;
        }
        const logFile = typeof _opts.logFile === 'string' ? _opts.logFile : undefined;
        const pid = startDaemon(logFile);
        out.success('Daemon started', { pid, status: 'running' });
      } catch (err) {
        handleError(out, err, 'Failed to start daemon');
      }
    });

  addGlobalFlags(daemon.command('stop')
    .description('Stop the daemon'))
    .action((_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        if (stopDaemon()) {
          out.success('Daemon stopped', { status: 'stopped' });
        } else {
          out.status('Daemon is not running.');
        }
      } catch (err) {
        handleError(out, err, 'Failed to stop daemon');
      }
    });

  addGlobalFlags(daemon.command('status')
    .description('Show daemon status'))
    .action((_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        const status = getDaemonStatus();

        if (flags.output === 'json') {
          out.record({
            running: status.running,
            pid: status.pid,
            logFile: status.logFile,
            uptime: status.uptime,
            startedAt: status.startedAt,
          });
          return;
        }

        if (status.running) {
          out.status(chalk.green('Daemon is running'));
          out.status(`  PID:        ${status.pid}`);
          out.status(`  Log file:   ${status.logFile}`);
          if (status.uptime !== null) {
            out.status(`  Uptime:     ${formatUptime(status.uptime)}`);
          }
          if (status.startedAt) {
            out.status(`  Started at: ${new Date(status.startedAt).toLocaleString()}`);
          }
        } else {
          out.status(chalk.dim('Daemon is not running'));
        }
      } catch (err) {
        handleError(out, err, 'Failed to get daemon status');
      }
    });
}
