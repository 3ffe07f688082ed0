import type { Command } from 'commander';
import chalk from 'chalk';
import { addGlobalFlags, resolveFlags } from '../utils/flags.js';
import { createOutput, handleError } from '../utils/output.js';
import { SETTING_KEYS, configFile, getSetting, isSettingKey, loadSettings, saveSetting } from '../config.js';
import { ConfigurationError } from '../mirror/errors.js';

export function registerConfigCommands(program: Command): void {
  const config = program
    .command('config')
    .description('Manage default settings')
    .addHelpText('after', `
KEYS
  algorithm   Fingerprint hash algorithm (md5, sha1, sha256, ...)
  interval    Delay between passes for watch (30s, 5m, 1h)
  logFile     File that receives log lines

EXAMPLES
  treemirror config set algorithm sha256
  treemirror config set interval 5m
  treemirror config get interval
  treemirror config list`);

  addGlobalFlags(config
    .command('set')
    .description('Set a default in the config file')
    .argument('<key>', `One of: ${SETTING_KEYS.join(', ')}`)
    .argument('<value>', 'Value to store'))
    .action((key: string, value: string, _opts: Record<string, unknown>) => {
      const out = createOutput(resolveFlags(_opts));
      try {
        const stored = saveSetting(key, value);
        out.success(`Set ${chalk.bold(key)} to ${chalk.bold(stored)}`, { key, value: stored });
      } catch (err) {
        handleError(out, err);
      }
    });

  addGlobalFlags(config
    .command('get')
    .description('Print a value from the config file')
    .argument('<key>', `One of: ${SETTING_KEYS.join(', ')}`))
    .action((key: string, _opts: Record<string, unknown>) => {
      const out = createOutput(resolveFlags(_opts));
      try {
        if (!isSettingKey(key)) {
          throw new ConfigurationError(`Unknown setting "${key}". Valid keys: ${SETTING_KEYS.join(', ')}`);
        }
        const value = getSetting(key);
        if (value !== undefined) {
          process.stdout.write(value + '\n');
        } else {
          out.warn(`Key "${key}" is not set in ${configFile()}`);
        }
      } catch (err) {
        handleError(out, err);
      }
    });

  addGlobalFlags(config
    .command('list')
    .description('Show the effective settings (file, environment and defaults)'))
    .action((_opts: Record<string, unknown>) => {
      const out = createOutput(resolveFlags(_opts));
      try {
        const settings = loadSettings();
        out.record({
          algorithm: settings.algorithm,
          interval: settings.interval,
          logFile: settings.logFile ?? null,
        });
      } catch (err) {
        handleError(out, err);
      }
    });
}
