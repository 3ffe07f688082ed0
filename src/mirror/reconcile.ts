/**
 * File content reconciliation.
 * Decides whether a replica file has to be created or replaced, and writes it
 * through a temporary sibling so a replica file is never left half-written.
 */
import fs from 'node:fs';
import path from 'node:path';
import { randomBytes } from 'node:crypto';
import type { Fingerprinter } from './fingerprint.js';
import { ReconcileError, isMissingPathError } from './errors.js';

export interface FileDecision {
  decision: 'create' | 'update' | 'unchanged';
  /** Size of the source file in bytes */
  sizeBytes: number;
  sourceFingerprint?: string;
  replicaFingerprint?: string;
}

function replicaExists(replicaFile: string): boolean {
  try {
    fs.lstatSync(replicaFile);
    return true;
  } catch (err) {
    if (isMissingPathError(err)) return false;
    throw new ReconcileError('inspect replica file', replicaFile, err);
  }
}

export interface DecideOptions {
  /** Treat the replica file as absent (it is about to be removed) */
  assumeMissing?: boolean;
}

/**
 * Compare a source file with its replica counterpart without writing anything.
 */
export function decideFile(
  sourceFile: string,
  replicaFile: string,
  fingerprinter: Fingerprinter,
  options: DecideOptions = {},
): FileDecision {
  let sizeBytes: number;
  try {
    sizeBytes = fs.statSync(sourceFile).size;
  } catch (err) {
    throw new ReconcileError('read source file', sourceFile, err);
  }

  if (options.assumeMissing || !replicaExists(replicaFile)) {
    return { decision: 'create', sizeBytes };
  }

  let sourceFingerprint: string;
  try {
    sourceFingerprint = fingerprinter.fingerprintFile(sourceFile);
  } catch (err) {
    throw new ReconcileError('fingerprint source file', sourceFile, err);
  }

  let replicaFingerprint: string;
  try {
    replicaFingerprint = fingerprinter.fingerprintFile(replicaFile);
  } catch (err) {
    throw new ReconcileError('fingerprint replica file', replicaFile, err);
  }

  return {
    decision: sourceFingerprint === replicaFingerprint ? 'unchanged' : 'update',
    sizeBytes,
    sourceFingerprint,
    replicaFingerprint,
  };
}

export const TMP_PREFIX = '.treemirror-';

/**
 * Copy a file to targetPath via a temporary file + rename.
 * Either the previous target content or the complete new content is visible.
 */
export function copyFileAtomic(sourceFile: string, targetPath: string): void {
  // Fixed-length name: the target's own name may already be at NAME_MAX
  const tmpFile = path.join(path.dirname(targetPath), `${TMP_PREFIX}${randomBytes(4).toString('hex')}.tmp`);
  try {
    fs.copyFileSync(sourceFile, tmpFile);
    fs.renameSync(tmpFile, targetPath);
  } catch (err) {
    try {
      fs.rmSync(tmpFile, { force: true });
    } catch {
      // A leftover temp file is stale and goes on the next pass
    }
    throw new ReconcileError('copy', targetPath, err);
  }
}

/**
 * Converge one replica file to its source: create it if absent, replace it if
 * the fingerprints differ, leave it alone otherwise.
 */
export function reconcileFile(
  sourceFile: string,
  replicaFile: string,
  fingerprinter: Fingerprinter,
): FileDecision {
  const result = decideFile(sourceFile, replicaFile, fingerprinter);
  if (result.decision !== 'unchanged') {
    copyFileAtomic(sourceFile, replicaFile);
  }
  return result;
}
