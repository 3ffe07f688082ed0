/**
 * Ignore pattern matching for mirror passes.
 * Supports a .mirrorignore file at the source root and patterns from the configuration.
 */
import fs from 'node:fs';
import path from 'node:path';
import { minimatch } from 'minimatch';

export const IGNORE_FILE = '.mirrorignore';

/**
 * Load ignore patterns from the source root's .mirrorignore file.
 * Returns empty array if file doesn't exist.
 */
export function loadIgnoreFile(sourcePath: string): string[] {
  const ignoreFile = path.join(sourcePath, IGNORE_FILE);
  if (!fs.existsSync(ignoreFile)) return [];
  const content = fs.readFileSync(ignoreFile, 'utf-8');
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Combine configured patterns with the .mirrorignore patterns, without duplicates.
 */
export function resolveIgnorePatterns(configIgnore: string[], sourcePath: string): string[] {
  return [...new Set([...configIgnore, ...loadIgnoreFile(sourcePath)])];
}

/**
 * Check if an entry should be ignored.
 * relPath is relative to the tree root with forward slashes; directories are
 * matched with isDirectory so that patterns ending in '/' apply to them only.
 */
export function shouldIgnore(relPath: string, patterns: string[], isDirectory = false): boolean {
  if (patterns.length === 0) return false;
  const basename = path.posix.basename(relPath);

  for (const pattern of patterns) {
    if (pattern.endsWith('/')) {
      const dirPattern = pattern.slice(0, -1);
      // Contents of an ignored directory are ignored too
      if (relPath.startsWith(dirPattern + '/')) return true;
      if (!isDirectory) continue;
      if (relPath === dirPattern || minimatch(relPath, dirPattern, { dot: true })) return true;
      if (!dirPattern.includes('/') && minimatch(basename, dirPattern, { dot: true })) return true;
      continue;
    }
    if (minimatch(relPath, pattern, { dot: true })) return true;
    // Slash-free patterns match at any depth (".DS_Store" matches "sub/.DS_Store")
    if (!pattern.includes('/') && minimatch(basename, pattern, { dot: true })) return true;
  }
  return false;
}
