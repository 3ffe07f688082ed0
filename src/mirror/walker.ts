/**
 * Top-down traversal of the source tree.
 */
import fs from 'node:fs';
import path from 'node:path';
import type { DirectoryListing } from './types.js';
import { TraversalError } from './errors.js';
import { shouldIgnore } from './ignore.js';

export interface WalkOptions {
  ignorePatterns?: string[];
  /**
   * Called when a subdirectory cannot be listed. The directory and its subtree
   * are skipped. Without it, the error ends the walk.
   */
  onListError?: (err: TraversalError) => void;
}

/**
 * Join a parent relative path and a child name with forward slashes.
 */
export function joinRelative(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}

/**
 * Convert a forward-slash relative path into an absolute path under root.
 */
export function resolveRelative(root: string, relativePath: string): string {
  return relativePath ? path.join(root, ...relativePath.split('/')) : root;
}

/**
 * List one source directory, split into subdirectory and file names.
 * Entries that are neither (symlinks, sockets, FIFOs) are not mirrored.
 */
export function listDirectory(
  root: string,
  relativePath: string,
  ignorePatterns: string[] = [],
): DirectoryListing {
  const absPath = resolveRelative(root, relativePath);
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(absPath, { withFileTypes: true });
  } catch (err) {
    throw new TraversalError('list directory', absPath, err);
  }

  const directories: string[] = [];
  const files: string[] = [];
  for (const entry of entries) {
    const relPath = joinRelative(relativePath, entry.name);
    if (entry.isDirectory()) {
      if (!shouldIgnore(relPath, ignorePatterns, true)) directories.push(entry.name);
    } else if (entry.isFile()) {
      if (!shouldIgnore(relPath, ignorePatterns)) files.push(entry.name);
    }
  }

  directories.sort();
  files.sort();
  return { relativePath, directories, files };
}

/**
 * Walk the tree rooted at root, yielding each directory before its children.
 * Lazy: a subdirectory is listed only when the consumer asks for the next item,
 * so work done for a parent (creating its replica directory) happens first.
 */
export function* walkTree(root: string, options: WalkOptions = {}): Generator<DirectoryListing> {
  const ignorePatterns = options.ignorePatterns ?? [];

  let stat: fs.Stats;
  try {
    stat = fs.statSync(root);
  } catch (err) {
    throw new TraversalError('read source root', root, err);
  }
  if (!stat.isDirectory()) {
    throw new TraversalError('read source root', root, undefined, `Source root is not a directory: ${root}`);
  }

  const pending: string[] = [''];
  while (pending.length > 0) {
    const relativePath = pending.pop() ?? '';
    let listing: DirectoryListing;
    try {
      listing = listDirectory(root, relativePath, ignorePatterns);
    } catch (err) {
      if (!relativePath || !options.onListError || !(err instanceof TraversalError)) throw err;
      options.onListError(err);
      continue;
    }
    yield listing;
    // Reverse so that children are visited in sorted order
    for (let i = listing.directories.length - 1; i >= 0; i--) {
      pending.push(joinRelative(relativePath, listing.directories[i]));
    }
  }
}
