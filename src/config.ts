import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { MirrorConfig } from './mirror/types.js';
import { ConfigurationError } from './mirror/errors.js';
import { DEFAULT_ALGORITHM, resolveAlgorithm } from './mirror/fingerprint.js';

export const DEFAULT_INTERVAL = '300s';
/** Longest delay setTimeout honours; longer ones fire after 1 ms. */
export const MAX_INTERVAL_MS = 2_147_483_647;

export interface CliSettings {
  algorithm: string;
  interval: string;
  logFile?: string;
}

export const SETTING_KEYS = ['algorithm', 'interval', 'logFile'] as const;
export type SettingKey = typeof SETTING_KEYS[number];

/**
 * Directory holding config.json, mirrors.json and the daemon files.
 * TREEMIRROR_HOME overrides the default ~/.treemirror.
 */
export function configDir(): string {
  return process.env.TREEMIRROR_HOME || path.join(os.homedir(), '.treemirror');
}

export function configFile(): string {
  return path.join(configDir(), 'config.json');
}

export function isSettingKey(key: string): key is SettingKey {
  return (SETTING_KEYS as readonly string[]).includes(key);
}

/**
 * Parse a human-readable interval to milliseconds.
 * Supports "30s", "5m", "1h" and plain numbers (seconds).
 */
export function parseInterval(interval: string): number {
  const match = interval.trim().match(/^(\d+)(s|m|h)?$/);
  if (!match) {
    throw new ConfigurationError(`Invalid interval "${interval}". Use e.g. 30s, 5m, 1h or a number of seconds`);
  }
  const value = parseInt(match[1], 10);
  if (value <= 0) {
    throw new ConfigurationError(`Interval must be greater than zero: "${interval}"`);
  }
  let ms: number;
  switch (match[2]) {
    case 'm': ms = value * 60 * 1000; break;
    case 'h': ms = value * 60 * 60 * 1000; break;
    case 's':
    default: ms = value * 1000;
  }
  if (ms > MAX_INTERVAL_MS) {
    throw new ConfigurationError(`Interval "${interval}" is too long (at most ${MAX_INTERVAL_MS} ms)`);
  }
  return ms;
}

/**
 * Validate a single setting value, returning its normalized form.
 */
export function validateSetting(key: SettingKey, value: string): string {
  switch (key) {
    case 'algorithm':
      return resolveAlgorithm(value);
    case 'interval':
      parseInterval(value);
      return value.trim();
    case 'logFile':
      if (!value.trim()) throw new ConfigurationError('logFile must not be empty');
      return path.resolve(value);
  }
}

/**
 * Read the settings file. Missing file means no overrides.
 */
export function readSettingsFile(): Partial<CliSettings> {
  const file = configFile();
  if (!fs.existsSync(file)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read settings file ${file}`, file, err);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Settings file ${file} must contain a JSON object`, file);
  }

  const settings: Partial<CliSettings> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isSettingKey(key)) continue;
    if (typeof value !== 'string') {
      throw new ConfigurationError(`Setting "${key}" in ${file} must be a string`, file);
    }
    settings[key] = value;
  }
  return settings;
}

/**
 * Resolve settings. Priority: env vars > config file > defaults.
 * Command-line flags are applied on top by the commands.
 */
export function loadSettings(): CliSettings {
  const fileSettings = readSettingsFile();
  const settings: CliSettings = {
    algorithm: DEFAULT_ALGORITHM,
    interval: DEFAULT_INTERVAL,
    ...fileSettings,
  };

  if (process.env.TREEMIRROR_ALGORITHM) settings.algorithm = process.env.TREEMIRROR_ALGORITHM;
  if (process.env.TREEMIRROR_INTERVAL) settings.interval = process.env.TREEMIRROR_INTERVAL;
  if (process.env.TREEMIRROR_LOG_FILE) settings.logFile = process.env.TREEMIRROR_LOG_FILE;

  return settings;
}

export function getSetting(key: SettingKey): string | undefined {
  return readSettingsFile()[key];
}

/**
 * Validate and persist one setting in the config file.
 */
export function saveSetting(key: string, value: string): string {
  if (!isSettingKey(key)) {
    throw new ConfigurationError(`Unknown setting "${key}". Valid keys: ${SETTING_KEYS.join(', ')}`);
  }
  const normalized = validateSetting(key, value);
  const settings = { ...readSettingsFile(), [key]: normalized };

  fs.mkdirSync(configDir(), { recursive: true });
  fs.writeFileSync(configFile(), JSON.stringify(settings, null, 2) + '\n');
  return normalized;
}

/**
 * Reject a replica inside the source (a pass would copy the replica into
 * itself) and a source inside the replica (a pass would delete the source).
 */
export function assertSeparateTrees(sourcePath: string, replicaPath: string): void {
  const source = path.resolve(sourcePath);
  const replica = path.resolve(replicaPath);
  if (source === replica) {
    throw new ConfigurationError(`Source and replica are the same directory: ${source}`, source);
  }
  if (isInside(replica, source)) {
    throw new ConfigurationError(`Replica ${replica} is inside the source ${source}`, replica);
  }
  if (isInside(source, replica)) {
    throw new ConfigurationError(`Source ${source} is inside the replica ${replica}`, source);
  }
}

function isInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  const outside = rel === '..' || rel.startsWith(`..${path.sep}`);
  return rel !== '' && !outside && !path.isAbsolute(rel);
}

export interface MirrorConfigInput {
  source: string;
  replica: string;
  algorithm?: string;
  ignore?: string[];
}

/**
 * Build the immutable per-run configuration, failing fast on bad input.
 * The source must exist and be a directory; the replica is created by the first pass.
 */
export function buildMirrorConfig(input: MirrorConfigInput): MirrorConfig {
  const sourcePath = path.resolve(input.source);
  const replicaPath = path.resolve(input.replica);

  let stat: fs.Stats;
  try {
    stat = fs.statSync(sourcePath);
  } catch (err) {
    throw new ConfigurationError(`Source directory not found: ${sourcePath}`, sourcePath, err);
  }
  if (!stat.isDirectory()) {
    throw new ConfigurationError(`Source is not a directory: ${sourcePath}`, sourcePath);
  }
  if (fs.existsSync(replicaPath) && !fs.statSync(replicaPath).isDirectory()) {
    throw new ConfigurationError(`Replica is not a directory: ${replicaPath}`, replicaPath);
  }
  assertSeparateTrees(sourcePath, replicaPath);

  return Object.freeze({
    sourcePath,
    replicaPath,
    algorithm: resolveAlgorithm(input.algorithm ?? DEFAULT_ALGORITHM),
    ignore: [...(input.ignore ?? [])],
  });
}
