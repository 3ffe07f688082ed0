import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  DEFAULT_INTERVAL,
  MAX_INTERVAL_MS,
  assertSeparateTrees,
  buildMirrorConfig,
  configDir,
  configFile,
  getSetting,
  loadSettings,
  parseInterval,
  readSettingsFile,
  saveSetting,
} from './config.js';
import { ConfigurationError } from './mirror/errors.js';
import { makeTempDir, removeTempDir, writeTree } from './__tests__/setup.js';

describe('config', () => {
  const originalEnv = process.env;
  let home: string;

  beforeEach(() => {
    home = makeTempDir();
    process.env = { ...originalEnv, TREEMIRROR_HOME: home };
    delete process.env.TREEMIRROR_ALGORITHM;
    delete process.env.TREEMIRROR_INTERVAL;
    delete process.env.TREEMIRROR_LOG_FILE;
  });

  afterEach(() => {
    process.env = originalEnv;
    removeTempDir(home);
  });

  describe('configDir', () => {
    it('should honor TREEMIRROR_HOME', () => {
      expect(configDir()).toBe(home);
      expect(configFile()).toBe(path.join(home, 'config.json'));
    });

    it('should default to ~/.treemirror', () => {
      delete process.env.TREEMIRROR_HOME;
      expect(configDir()).toBe(path.join(os.homedir(), '.treemirror'));
    });
  });

  describe('parseInterval', () => {
    it('should parse seconds, minutes and hours', () => {
      expect(parseInterval('30s')).toBe(30_000);
      expect(parseInterval('5m')).toBe(300_000);
      expect(parseInterval('1h')).toBe(3_600_000);
    });

    it('should treat a plain number as seconds', () => {
      expect(parseInterval('45')).toBe(45_000);
      expect(parseInterval(' 10 ')).toBe(10_000);
    });

    it('should reject malformed intervals', () => {
      expect(() => parseInterval('soon')).toThrow(
        'Invalid interval "soon". Use e.g. 30s, 5m, 1h or a number of seconds',
      );
      expect(() => parseInterval('1.5m')).toThrow(ConfigurationError);
      expect(() => parseInterval('-5s')).toThrow(ConfigurationError);
    });

    it('should reject a zero interval', () => {
      expect(() => parseInterval('0s')).toThrow('Interval must be greater than zero: "0s"');
    });

    it('should reject intervals a timer cannot wait for', () => {
      expect(parseInterval('596h')).toBe(2_145_600_000);
      expect(parseInterval('2147483s')).toBe(2_147_483_000);
      expect(() => parseInterval('1000h')).toThrow(
        `Interval "1000h" is too long (at most ${MAX_INTERVAL_MS} ms)`,
      );
      expect(() => parseInterval('2147484s')).toThrow(ConfigurationError);
    });
  });

  describe('loadSettings', () => {
    it('should return defaults when nothing is configured', () => {
      expect(loadSettings()).toEqual({ algorithm: 'md5', interval: DEFAULT_INTERVAL });
    });

    it('should read the settings file', () => {
      fs.writeFileSync(configFile(), JSON.stringify({ algorithm: 'sha256', interval: '1m', other: 1 }));
      expect(loadSettings()).toEqual({ algorithm: 'sha256', interval: '1m' });
    });

    it('should let environment variables override the file', () => {
      fs.writeFileSync(configFile(), JSON.stringify({ algorithm: 'sha256', interval: '1m' }));
      process.env.TREEMIRROR_INTERVAL = '10s';
      process.env.TREEMIRROR_LOG_FILE = '/var/log/treemirror.log';

      expect(loadSettings()).toEqual({
        algorithm: 'sha256',
        interval: '10s',
        logFile: '/var/log/treemirror.log',
      });
    });

    it('should reject a corrupt settings file', () => {
      fs.writeFileSync(configFile(), '{ not json');
      expect(() => loadSettings()).toThrow(`Cannot read settings file ${configFile()}`);
    });

    it('should reject a settings file that is not an object', () => {
      fs.writeFileSync(configFile(), '["md5"]');
      expect(() => readSettingsFile()).toThrow(`Settings file ${configFile()} must contain a JSON object`);
    });

    it('should reject non-string setting values', () => {
      fs.writeFileSync(configFile(), JSON.stringify({ interval: 30 }));
      expect(() => readSettingsFile()).toThrow(`Setting "interval" in ${configFile()} must be a string`);
    });
  });

  describe('saveSetting', () => {
    it('should validate, normalize and persist a setting', () => {
      expect(saveSetting('algorithm', 'SHA256')).toBe('sha256');
      expect(saveSetting('interval', ' 5m ')).toBe('5m');

      expect(JSON.parse(fs.readFileSync(configFile(), 'utf-8'))).toEqual({ algorithm: 'sha256', interval: '5m' });
      expect(getSetting('algorithm')).toBe('sha256');
    });

    it('should resolve the log file to an absolute path', () => {
      expect(saveSetting('logFile', 'logs/mirror.log')).toBe(path.resolve('logs/mirror.log'));
    });

    it('should create the config directory', () => {
      process.env.TREEMIRROR_HOME = path.join(home, 'nested', 'dir');
      saveSetting('interval', '30s');
      expect(fs.existsSync(path.join(home, 'nested', 'dir', 'config.json'))).toBe(true);
    });

    it('should reject unknown keys', () => {
      expect(() => saveSetting('colour', 'blue')).toThrow('Unknown setting "colour". Valid keys: algorithm, interval, logFile');
    });

    it('should reject invalid values without writing', () => {
      expect(() => saveSetting('algorithm', 'nope')).toThrow(ConfigurationError);
      expect(() => saveSetting('interval', 'often')).toThrow(ConfigurationError);
      expect(fs.existsSync(configFile())).toBe(false);
    });
  });

  describe('assertSeparateTrees', () => {
    it('should accept sibling trees', () => {
      expect(() => assertSeparateTrees('/data/source', '/data/replica')).not.toThrow();
      expect(() => assertSeparateTrees('/data/source', '/data/source-copy')).not.toThrow();
    });

    it('should reject overlapping trees', () => {
      expect(() => assertSeparateTrees('/data/source', '/data/source/')).toThrow(
        'Source and replica are the same directory: /data/source',
      );
      expect(() => assertSeparateTrees('/data/source', '/data/source/replica')).toThrow(
        'Replica /data/source/replica is inside the source /data/source',
      );
      expect(() => assertSeparateTrees('/data/replica/source', '/data/replica')).toThrow(
        'Source /data/replica/source is inside the replica /data/replica',
      );
    });

    it('should treat a child named with leading dots as inside its parent', () => {
      expect(() => assertSeparateTrees('/data/src', '/data/src/..backup')).toThrow(
        'Replica /data/src/..backup is inside the source /data/src',
      );
      expect(() => assertSeparateTrees('/data/replica/..src', '/data/replica')).toThrow(
        'Source /data/replica/..src is inside the replica /data/replica',
      );
      expect(() => assertSeparateTrees('/data/src', '/data/..src')).not.toThrow();
    });
  });

  describe('buildMirrorConfig', () => {
    it('should resolve paths and normalize the algorithm', () => {
      writeTree(home, { 'source/a.txt': 'a' });

      const config = buildMirrorConfig({
        source: path.join(home, 'source'),
        replica: path.join(home, 'replica'),
        algorithm: 'SHA1',
        ignore: ['*.tmp'],
      });

      expect(config).toEqual({
        sourcePath: path.join(home, 'source'),
        replicaPath: path.join(home, 'replica'),
        algorithm: 'sha1',
        ignore: ['*.tmp'],
      });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it('should default to md5 and no ignore patterns', () => {
      writeTree(home, { 'source': null });
      const config = buildMirrorConfig({ source: path.join(home, 'source'), replica: path.join(home, 'replica') });
      expect(config.algorithm).toBe('md5');
      expect(config.ignore).toEqual([]);
    });

    it('should fail fast on a missing source', () => {
      const source = path.join(home, 'missing');
      expect(() => buildMirrorConfig({ source, replica: path.join(home, 'replica') })).toThrow(
        `Source directory not found: ${source}`,
      );
    });

    it('should reject a source that is a file', () => {
      writeTree(home, { 'source': 'file' });
      const source = path.join(home, 'source');
      expect(() => buildMirrorConfig({ source, replica: path.join(home, 'replica') })).toThrow(
        `Source is not a directory: ${source}`,
      );
    });

    it('should reject a replica that is a file', () => {
      writeTree(home, { 'source': null, 'replica': 'file' });
      const replica = path.join(home, 'replica');
      expect(() => buildMirrorConfig({ source: path.join(home, 'source'), replica })).toThrow(
        `Replica is not a directory: ${replica}`,
      );
    });

    it('should reject an unsupported algorithm', () => {
      writeTree(home, { 'source': null });
      expect(() => buildMirrorConfig({
        source: path.join(home, 'source'),
        replica: path.join(home, 'replica'),
        algorithm: 'rot13',
      })).toThrow(ConfigurationError);
    });
  });
});
