/**
 * Saved mirror definitions.
 * Manages ~/.treemirror/mirrors.json — the list of all configured source/replica pairs.
 */
import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import type { SavedMirror, CreateMirrorOptions } from './types.js';
import { configDir, parseInterval, assertSeparateTrees, DEFAULT_INTERVAL } from '../config.js';
import { DEFAULT_ALGORITHM, resolveAlgorithm } from './fingerprint.js';

export function mirrorsFile(): string {
  return path.join(configDir(), 'mirrors.json');
}

/**
 * Read all saved mirrors from disk.
 */
export function loadMirrors(): SavedMirror[] {
  const file = mirrorsFile();
  if (!fs.existsSync(file)) {
    return [];
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (!Array.isArray(parsed)) return [];
    return parsed.filter(isSavedMirror);
  } catch {
    return [];
  }
}

function isSavedMirror(value: unknown): value is SavedMirror {
  if (typeof value !== 'object' || value === null) return false;
  return 'id' in value && typeof value.id === 'string'
    && 'sourcePath' in value && typeof value.sourcePath === 'string'
    && 'replicaPath' in value && typeof value.replicaPath === 'string'
    && 'algorithm' in value && typeof value.algorithm === 'string'
    && 'interval' in value && typeof value.interval === 'string'
    && 'ignore' in value && Array.isArray(value.ignore)
    && 'lastRunAt' in value && typeof value.lastRunAt === 'string';
}

/**
 * Write all saved mirrors to disk.
 */
export function saveMirrors(mirrors: SavedMirror[]): void {
  fs.mkdirSync(configDir(), { recursive: true });
  fs.writeFileSync(mirrorsFile(), JSON.stringify(mirrors, null, 2) + '\n');
}

/**
 * Find a mirror by full ID, unique ID prefix (8+ characters) or name.
 */
export function getMirror(idOrName: string): SavedMirror | undefined {
  const mirrors = loadMirrors();
  const exact = mirrors.find(m => m.id === idOrName || m.name === idOrName);
  if (exact) return exact;
  if (idOrName.length < 8) return undefined;
  const matches = mirrors.filter(m => m.id.startsWith(idOrName));
  return matches.length === 1 ? matches[0] : undefined;
}

/**
 * Save a new mirror definition.
 * Returns the created mirror with a generated ID.
 */
export function createMirror(opts: CreateMirrorOptions): SavedMirror {
  const mirrors = loadMirrors();
  const sourcePath = path.resolve(opts.sourcePath);
  const replicaPath = path.resolve(opts.replicaPath);
  assertSeparateTrees(sourcePath, replicaPath);

  const existing = mirrors.find(m => m.sourcePath === sourcePath && m.replicaPath === replicaPath);
  if (existing) {
    throw new Error(`Mirror already exists for ${sourcePath} -> ${replicaPath} (id: ${existing.id})`);
  }
  if (opts.name && mirrors.some(m => m.name === opts.name)) {
    throw new Error(`A mirror named "${opts.name}" already exists`);
  }

  const interval = opts.interval ?? DEFAULT_INTERVAL;
  parseInterval(interval);

  const mirror: SavedMirror = {
    id: crypto.randomUUID(),
    name: opts.name,
    sourcePath,
    replicaPath,
    algorithm: resolveAlgorithm(opts.algorithm ?? DEFAULT_ALGORITHM),
    interval,
    ignore: opts.ignore ?? [],
    lastRunAt: new Date(0).toISOString(),
  };

  mirrors.push(mirror);
  saveMirrors(mirrors);
  return mirror;
}

/**
 * Delete a saved mirror by ID.
 * Returns true if the mirror was found and deleted.
 */
export function deleteMirror(id: string): boolean {
  const mirrors = loadMirrors();
  const index = mirrors.findIndex(m => m.id === id);
  if (index === -1) return false;
  mirrors.splice(index, 1);
  saveMirrors(mirrors);
  return true;
}

/**
 * Update the lastRunAt timestamp for a saved mirror.
 */
export function updateLastRun(id: string, timestamp?: string): void {
  const mirrors = loadMirrors();
  const mirror = mirrors.find(m => m.id === id);
  if (!mirror) throw new Error(`Mirror not found: ${id}`);
  mirror.lastRunAt = timestamp ?? new Date().toISOString();
  saveMirrors(mirrors);
}
