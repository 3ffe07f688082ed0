/**
 * Replica directory structure.
 */
import fs from 'node:fs';
import { StructureError, isMissingPathError } from './errors.js';
import { resolveRelative } from './walker.js';

export type EnsureResult = 'created' | 'existing';

/**
 * Make sure the replica counterpart of a source directory exists,
 * creating any missing intermediate directories.
 */
export function ensureReplicaDirectory(replicaRoot: string, relativePath: string): EnsureResult {
  const target = resolveRelative(replicaRoot, relativePath);

  let stat: fs.Stats | undefined;
  try {
    stat = fs.statSync(target);
  } catch (err) {
    if (!isMissingPathError(err)) {
      throw new StructureError('inspect directory', target, err);
    }
  }

  if (stat) {
    if (!stat.isDirectory()) {
      throw new StructureError('create directory', target, undefined, `Replica path exists but is not a directory: ${target}`);
    }
    return 'existing';
  }

  try {
    fs.mkdirSync(target, { recursive: true });
  } catch (err) {
    throw new StructureError('create directory', target, err);
  }
  return 'created';
}

/**
 * Whether the replica counterpart of a directory exists as a directory.
 * Used by dry runs, which must not create anything.
 */
export function replicaDirectoryExists(replicaRoot: string, relativePath: string): boolean {
  const target = resolveRelative(replicaRoot, relativePath);
  try {
    return fs.statSync(target).isDirectory();
  } catch (err) {
    if (isMissingPathError(err)) return false;
    throw new StructureError('inspect directory', target, err);
  }
}
