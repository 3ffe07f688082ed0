#!/usr/bin/env node
import { Command } from 'commander';
import { registerRunCommands } from './commands/run.js';
import { registerMirrorCommands } from './commands/mirrors.js';
import { registerDaemonCommands } from './commands/daemon.js';
import { registerConfigCommands } from './commands/config.js';

const program = new Command();
program
  .name('treemirror')
  .description('One-way mirroring of a source directory onto a replica')
  .version('0.1.0')
  .addHelpText('after', `
GETTING STARTED
  treemirror run <source> <replica>              Make the replica match the source once
  treemirror run <source> <replica> --dry-run    Show what a pass would change
  treemirror watch <source> <replica> --interval 5m

SAVED MIRRORS
  treemirror mirrors add <source> <replica>      Save a pair
  treemirror mirrors list                        List saved pairs
  treemirror daemon start                        Keep every saved pair in sync

LEARN MORE
  treemirror <command> --help                    Show help for a command`);

registerRunCommands(program);
registerMirrorCommands(program);
registerDaemonCommands(program);
registerConfigCommands(program);

program.parseAsync().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
