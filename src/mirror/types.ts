/**
 * Type definitions for the mirror engine.
 */

export type EntryKind = 'directory' | 'file';
export type ReconcileDecision = 'create' | 'update' | 'delete' | 'unchanged';
export type ErrorPolicy = 'abort' | 'continue';
export type PassStatus = 'complete' | 'aborted';

/**
 * Immutable per-run configuration for one source/replica pair.
 * Built and validated once by buildMirrorConfig().
 */
export interface MirrorConfig {
  /** Absolute path of the source tree (read-only) */
  sourcePath: string;
  /** Absolute path of the replica tree */
  replicaPath: string;
  /** Lowercase node:crypto hash name used for fingerprints */
  algorithm: string;
  /** Glob patterns excluded from mirroring (relative to the tree roots) */
  ignore: string[];
}

/**
 * One directory yielded by the tree walker.
 */
export interface DirectoryListing {
  /** Path relative to the tree root, forward slashes, '' for the root */
  relativePath: string;
  /** Immediate subdirectory names, sorted */
  directories: string[];
  /** Immediate file names, sorted */
  files: string[];
}

/**
 * A single reconciliation decision taken (or planned) during a pass.
 */
export interface PlanEntry {
  /** Replica-relative path, forward slashes */
  path: string;
  kind: EntryKind | 'other';
  action: Exclude<ReconcileDecision, 'unchanged'>;
  /** Bytes to copy (0 for deletions and directories) */
  sizeBytes: number;
  /** Human-readable reason for this change */
  reason: string;
}

export interface MirrorPlan {
  entries: PlanEntry[];
  /** Files whose fingerprints already match */
  unchanged: number;
  totalBytes: number;
}

export interface PassCounts {
  created: number;
  updated: number;
  deleted: number;
  unchanged: number;
  bytesCopied: number;
}

export interface PassError {
  path: string;
  operation: string;
  error: string;
}

export interface PassResult {
  status: PassStatus;
  counts: PassCounts;
  errors: PassError[];
  /** Decisions taken, in the order they were applied */
  plan: MirrorPlan;
  dryRun: boolean;
  startedAt: string;
  durationMs: number;
}

export interface PassProgress {
  /** Directory just processed, relative to the roots */
  directory: string;
  directoriesVisited: number;
  counts: PassCounts;
}

export type ProgressCallback = (progress: PassProgress) => void;

export interface RunPassOptions {
  /** Compute decisions without touching the replica */
  dryRun?: boolean;
  /** 'abort' stops at the first failure; 'continue' collects failures per entry */
  errorPolicy?: ErrorPolicy;
  /** Checked between directories */
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

/**
 * Persisted definition of a mirror.
 * Stored in ~/.treemirror/mirrors.json.
 */
export interface SavedMirror {
  /** Unique identifier for this mirror */
  id: string;
  /** Optional human-friendly label */
  name?: string;
  sourcePath: string;
  replicaPath: string;
  algorithm: string;
  /** Scheduler interval (e.g., '30s', '5m', '1h') */
  interval: string;
  ignore: string[];
  /** ISO 8601 timestamp of the last completed pass */
  lastRunAt: string;
}

/**
 * Options for saving a new mirror definition.
 */
export interface CreateMirrorOptions {
  sourcePath: string;
  replicaPath: string;
  name?: string;
  algorithm?: string;
  interval?: string;
  ignore?: string[];
}
