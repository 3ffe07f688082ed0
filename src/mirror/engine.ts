/**
 * Core mirror engine — runs one reconciliation pass over a source/replica pair.
 *
 * For every source directory, in top-down walk order:
 *   1. make sure the replica directory exists,
 *   2. delete replica children the source no longer has,
 *   3. create or update replica files whose fingerprints differ.
 * Directories must be processed in this order: deletions and copies need
 * their target directory, and a stale replica directory is removed wholesale
 * while its parent is processed.
 */
import path from 'node:path';
import type {
  DirectoryListing,
  MirrorConfig,
  MirrorPlan,
  PassCounts,
  PassError,
  PassResult,
  PlanEntry,
  RunPassOptions,
} from './types.js';
import { ConfigurationError, TraversalError, errorMessage, isMirrorError } from './errors.js';
import { createFingerprinter, type Fingerprinter } from './fingerprint.js';
import { resolveIgnorePatterns } from './ignore.js';
import { MirrorLogger, nullSink } from './logger.js';
import { emptyPlan } from './plan.js';
import { ensureReplicaDirectory, replicaDirectoryExists } from './structure.js';
import { authoritativeNames, findStaleEntries, removeStaleEntry, type StaleEntry } from './stale.js';
import { decideFile, reconcileFile, type FileDecision } from './reconcile.js';
import { joinRelative, resolveRelative, walkTree } from './walker.js';
import { assertSeparateTrees } from '../config.js';

export interface MirrorEngineDeps {
  logger?: MirrorLogger;
}

export interface MirrorEngine {
  readonly config: MirrorConfig;
  readonly fingerprinter: Fingerprinter;
  /** Run a complete pass. Never throws for filesystem failures: see PassResult.status. */
  runOnePass(options?: RunPassOptions): PassResult;
  /** Compute the decisions of a pass without touching the replica. */
  plan(): MirrorPlan;
}

function emptyCounts(): PassCounts {
  return { created: 0, updated: 0, deleted: 0, unchanged: 0, bytesCopied: 0 };
}

/**
 * Create an engine for a validated configuration.
 * Throws ConfigurationError for relative or overlapping paths and for an
 * unsupported fingerprint algorithm.
 */
export function createMirrorEngine(config: MirrorConfig, deps: MirrorEngineDeps = {}): MirrorEngine {
  if (!path.isAbsolute(config.sourcePath) || !path.isAbsolute(config.replicaPath)) {
    throw new ConfigurationError(
      `Source and replica paths must be absolute (got ${config.sourcePath}, ${config.replicaPath})`,
      config.sourcePath,
    );
  }
  assertSeparateTrees(config.sourcePath, config.replicaPath);
  const fingerprinter = createFingerprinter(config.algorithm);
  const logger = deps.logger ?? new MirrorLogger(nullSink);

  function runOnePass(options: RunPassOptions = {}): PassResult {
    const { dryRun = false, errorPolicy = 'abort', signal, onProgress } = options;
    const startedAt = new Date();
    const counts = emptyCounts();
    const errors: PassError[] = [];
    const plan = emptyPlan();
    let directoriesVisited = 0;
    let cancelled = false;

    const record = (entry: PlanEntry): void => {
      plan.entries.push(entry);
      plan.totalBytes += entry.sizeBytes;
      if (entry.action === 'create') counts.created++;
      else if (entry.action === 'update') counts.updated++;
      else counts.deleted++;
      if (!dryRun) counts.bytesCopied += entry.sizeBytes;
    };

    const toPassError = (err: unknown): PassError => isMirrorError(err)
      ? { path: err.path, operation: err.operation, error: err.message }
      : { path: '', operation: 'pass', error: errorMessage(err) };

    /** Under the 'continue' policy, log and collect; otherwise end the pass. */
    const fail = (err: unknown): void => {
      if (errorPolicy === 'continue' && isMirrorError(err)) {
        errors.push(toPassError(err));
        logger.error('error', err.message, err.path);
        return;
      }
      throw err;
    };

    const mirrorStructure = (listing: DirectoryListing): boolean => {
      const rel = listing.relativePath;
      const replicaDir = resolveRelative(config.replicaPath, rel);
      try {
        const missing = dryRun
          ? !replicaDirectoryExists(config.replicaPath, rel)
          : ensureReplicaDirectory(config.replicaPath, rel) === 'created';
        if (missing) {
          record({ path: rel || '.', kind: 'directory', action: 'create', sizeBytes: 0, reason: 'New directory' });
          if (!dryRun) logger.info('create', `Created: ${replicaDir}`, replicaDir);
        }
        return true;
      } catch (err) {
        fail(err);
        return false;
      }
    };

    const removeStale = (listing: DirectoryListing, ignorePatterns: string[]): Set<string> => {
      const replicaDir = resolveRelative(config.replicaPath, listing.relativePath);
      const removed = new Set<string>();
      let stale: StaleEntry[];
      try {
        stale = findStaleEntries(replicaDir, listing.relativePath, authoritativeNames(listing), ignorePatterns);
      } catch (err) {
        fail(err);
        return removed;
      }

      for (const entry of stale) {
        try {
          if (!dryRun) {
            removeStaleEntry(entry);
            logger.info('delete', `Deleted: ${entry.absolutePath}`, entry.absolutePath);
          }
          removed.add(entry.name);
          record({ path: entry.relativePath, kind: entry.kind, action: 'delete', sizeBytes: 0, reason: entry.reason });
        } catch (err) {
          fail(err);
        }
      }
      return removed;
    };

    const reconcileFiles = (listing: DirectoryListing, removed: Set<string>): void => {
      for (const name of listing.files) {
        const rel = joinRelative(listing.relativePath, name);
        const sourceFile = resolveRelative(config.sourcePath, rel);
        const replicaFile = resolveRelative(config.replicaPath, rel);
        try {
          let result: FileDecision;
          if (!dryRun) {
            result = reconcileFile(sourceFile, replicaFile, fingerprinter);
          } else if (removed.has(name)) {
            // Planned for deletion above, so it will be copied fresh
            result = decideFile(sourceFile, replicaFile, fingerprinter, { assumeMissing: true });
          } else {
            result = decideFile(sourceFile, replicaFile, fingerprinter);
          }

          if (result.decision === 'unchanged') {
            counts.unchanged++;
            plan.unchanged++;
            continue;
          }
          if (result.decision === 'create') {
            record({ path: rel, kind: 'file', action: 'create', sizeBytes: result.sizeBytes, reason: 'New file' });
            if (!dryRun) logger.info('create', `Created: ${replicaFile}`, replicaFile);
          } else {
            record({ path: rel, kind: 'file', action: 'update', sizeBytes: result.sizeBytes, reason: 'Content differs' });
            if (!dryRun) logger.info('update', `Updated: ${sourceFile} -> ${replicaFile}`, replicaFile);
          }
        } catch (err) {
          fail(err);
        }
      }
    };

    logger.info('start', dryRun ? 'Dry run started' : 'Synchronization started', config.sourcePath);

    let status: PassResult['status'] = 'complete';
    try {
      const ignorePatterns = loadIgnorePatterns(config);
      const walker = walkTree(config.sourcePath, {
        ignorePatterns,
        onListError: errorPolicy === 'continue' ? fail : undefined,
      });

      for (const listing of walker) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }
        if (mirrorStructure(listing)) {
          const removed = removeStale(listing, ignorePatterns);
          reconcileFiles(listing, removed);
        }
        directoriesVisited++;
        onProgress?.({ directory: listing.relativePath, directoriesVisited, counts: { ...counts } });
      }
    } catch (err) {
      status = 'aborted';
      errors.push(toPassError(err));
      logger.error('abort', `Synchronization failed: ${errorMessage(err)}`, isMirrorError(err) ? err.path : undefined);
    }

    if (cancelled) {
      status = 'aborted';
      logger.warn('abort', 'Synchronization cancelled');
    } else if (status === 'complete') {
      const label = dryRun ? 'Dry run complete' : 'Synchronization complete';
      if (errors.length > 0) {
        logger.warn('complete', `${label} with ${errors.length} error(s)`);
      } else {
        logger.info('complete', label);
      }
    }

    return {
      status,
      counts,
      errors,
      plan,
      dryRun,
      startedAt: startedAt.toISOString(),
      durationMs: Date.now() - startedAt.getTime(),
    };
  }

  return {
    config,
    fingerprinter,
    runOnePass,
    plan: () => runOnePass({ dryRun: true }).plan,
  };
}

function loadIgnorePatterns(config: MirrorConfig): string[] {
  try {
    return resolveIgnorePatterns(config.ignore, config.sourcePath);
  } catch (err) {
    throw new TraversalError('read ignore file', config.sourcePath, err);
  }
}
