/**
 * Source tree watcher.
 * Uses chokidar to notice source changes so the scheduler can run a pass early.
 */
import path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import type { MirrorConfig } from './types.js';
import { shouldIgnore } from './ignore.js';

export interface SourceWatcherOptions {
  ignorePatterns: string[];
  /** Called once per burst of changes */
  onChange: (changedPaths: string[]) => void;
  onError?: (error: Error) => void;
  /** Quiet period before onChange fires (default: 1000) */
  debounceMs?: number;
}

/**
 * Start watching the source tree of a mirror.
 * Returns the watcher and a function that stops it.
 */
export function createSourceWatcher(
  config: MirrorConfig,
  options: SourceWatcherOptions,
): { watcher: FSWatcher; stop: () => Promise<void> } {
  const { ignorePatterns, onChange, onError, debounceMs = 1000 } = options;
  const changed = new Set<string>();
  let timer: ReturnType<typeof setTimeout> | null = null;

  function toRelPath(absPath: string): string {
    return path.relative(config.sourcePath, absPath).split(path.sep).join('/');
  }

  function queue(absPath: string): void {
    changed.add(toRelPath(absPath));
    if (timer) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = null;
      const paths = [...changed].sort();
      changed.clear();
      onChange(paths);
    }, debounceMs);
  }

  const watcher = watch(config.sourcePath, {
    ignoreInitial: true,
    persistent: true,
    ignored: (filePath: string) => {
      const rel = toRelPath(filePath);
      if (!rel || rel === '.') return false;
      return shouldIgnore(rel, ignorePatterns);
    },
  });

  for (const event of ['add', 'change', 'unlink', 'addDir', 'unlinkDir'] as const) {
    watcher.on(event, (absPath: string) => queue(absPath));
  }

  watcher.on('error', (err: unknown) => {
    onError?.(err instanceof Error ? err : new Error(String(err)));
  });

  return {
    watcher,
    stop: async () => {
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      changed.clear();
      await watcher.close();
    },
  };
}
