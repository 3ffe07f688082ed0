/**
 * Stale replica entry detection and removal.
 * A replica entry is stale when the corresponding source directory has no
 * entry of the same name and kind.
 */
import fs from 'node:fs';
import path from 'node:path';
import type { DirectoryListing, EntryKind } from './types.js';
import { DeletionError, isMissingPathError } from './errors.js';
import { shouldIgnore } from './ignore.js';
import { joinRelative } from './walker.js';

export interface AuthoritativeNames {
  directories: ReadonlySet<string>;
  files: ReadonlySet<string>;
}

export interface StaleEntry {
  name: string;
  /** Path relative to the replica root, forward slashes */
  relativePath: string;
  absolutePath: string;
  kind: EntryKind | 'other';
  reason: string;
}

/**
 * Build the set-of-names view of a source directory listing.
 */
export function authoritativeNames(listing: DirectoryListing): AuthoritativeNames {
  return {
    directories: new Set(listing.directories),
    files: new Set(listing.files),
  };
}

function kindOf(entry: fs.Dirent): EntryKind | 'other' {
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return 'other';
}

function staleReason(
  name: string,
  kind: EntryKind | 'other',
  names: AuthoritativeNames,
): string | null {
  const inDirs = names.directories.has(name);
  const inFiles = names.files.has(name);
  if (!inDirs && !inFiles) return 'Not in source';
  if (kind === 'directory' && !inDirs) return 'Directory in replica, file in source';
  if (kind === 'file' && !inFiles) return 'File in replica, directory in source';
  if (kind === 'other') return 'Not a regular file or directory';
  return null;
}

/**
 * List the immediate children of a replica directory that have to go.
 * Ignored entries are protected and never reported.
 * A missing replica directory has no stale entries.
 */
export function findStaleEntries(
  replicaDir: string,
  relativePath: string,
  names: AuthoritativeNames,
  ignorePatterns: string[] = [],
): StaleEntry[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(replicaDir, { withFileTypes: true });
  } catch (err) {
    if (isMissingPathError(err)) return [];
    throw new DeletionError('list replica directory', replicaDir, err);
  }

  const stale: StaleEntry[] = [];
  for (const entry of entries) {
    const kind = kindOf(entry);
    const relPath = joinRelative(relativePath, entry.name);
    if (shouldIgnore(relPath, ignorePatterns, kind === 'directory')) continue;

    const reason = staleReason(entry.name, kind, names);
    if (reason) {
      stale.push({
        name: entry.name,
        relativePath: relPath,
        absolutePath: path.join(replicaDir, entry.name),
        kind,
        reason,
      });
    }
  }

  stale.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return stale;
}

/**
 * Delete one stale entry: whole subtree for directories, unlink otherwise.
 * Irreversible.
 */
export function removeStaleEntry(entry: StaleEntry): void {
  try {
    if (entry.kind === 'directory') {
      fs.rmSync(entry.absolutePath, { recursive: true });
    } else {
      fs.unlinkSync(entry.absolutePath);
    }
  } catch (err) {
    throw new DeletionError('delete', entry.absolutePath, err);
  }
}
