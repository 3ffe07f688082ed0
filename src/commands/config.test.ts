import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { registerConfigCommands } from './config.js';
import { makeTempDir, removeTempDir, spyOutput } from '../__tests__/setup.js';

vi.mock('ora', () => ({
  default: vi.fn(() => ({
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  })),
}));

describe('config commands', () => {
  const originalEnv = process.env;
  let program: Command;
  let outputSpy: ReturnType<typeof spyOutput>;
  let home: string;

  beforeEach(() => {
    home = makeTempDir();
    process.env = { ...originalEnv, TREEMIRROR_HOME: home };
    delete process.env.TREEMIRROR_ALGORITHM;
    delete process.env.TREEMIRROR_INTERVAL;
    delete process.env.TREEMIRROR_LOG_FILE;

    program = new Command();
    program.exitOverride();
    registerConfigCommands(program);
    outputSpy = spyOutput();
    process.exitCode = undefined;
  });

  afterEach(() => {
    outputSpy.restore();
    process.env = originalEnv;
    process.exitCode = undefined;
    removeTempDir(home);
  });

  const stderr = () => outputSpy.stderr.join('');

  describe('config set', () => {
    it('should store a normalized value', async () => {
      await program.parseAsync(['node', 'cli', 'config', 'set', 'algorithm', 'SHA256', '-o', 'json']);

      expect(JSON.parse(outputSpy.stdout.join('').trim())).toEqual({ key: 'algorithm', value: 'sha256' });
      expect(JSON.parse(fs.readFileSync(path.join(home, 'config.json'), 'utf-8'))).toEqual({ algorithm: 'sha256' });
    });

    it('should reject an invalid value', async () => {
      await program.parseAsync(['node', 'cli', 'config', 'set', 'interval', 'often']);

      expect(stderr()).toContain('Configuration error: Invalid interval "often"');
      expect(process.exitCode).toBe(1);
    });

    it('should reject an unknown key', async () => {
      await program.parseAsync(['node', 'cli', 'config', 'set', 'colour', 'blue']);

      expect(stderr()).toContain('Configuration error: Unknown setting "colour". Valid keys: algorithm, interval, logFile');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('config get', () => {
    it('should print a stored value', async () => {
      fs.writeFileSync(path.join(home, 'config.json'), JSON.stringify({ interval: '5m' }));

      await program.parseAsync(['node', 'cli', 'config', 'get', 'interval']);

      expect(outputSpy.stdout).toEqual(['5m\n']);
    });

    it('should warn about an unset key', async () => {
      await program.parseAsync(['node', 'cli', 'config', 'get', 'logFile']);

      expect(stderr()).toContain(`Key "logFile" is not set in ${path.join(home, 'config.json')}`);
      expect(outputSpy.stdout).toEqual([]);
    });
  });

  describe('config list', () => {
    it('should show the effective settings', async () => {
      fs.writeFileSync(path.join(home, 'config.json'), JSON.stringify({ algorithm: 'sha1' }));
      process.env.TREEMIRROR_INTERVAL = '45s';

      await program.parseAsync(['node', 'cli', 'config', 'list', '-o', 'json']);

      expect(JSON.parse(outputSpy.stdout.join('').trim())).toEqual({
        algorithm: 'sha1',
        interval: '45s',
        logFile: null,
      });
    });
  });
});
