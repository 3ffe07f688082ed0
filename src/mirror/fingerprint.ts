/**
 * Content fingerprints.
 * A fingerprint is the hex digest of a file's full content under the configured hash.
 */
import fs from 'node:fs';
import crypto from 'node:crypto';
import { ConfigurationError } from './errors.js';

export const DEFAULT_ALGORITHM = 'md5';

const CHUNK_SIZE = 64 * 1024;

export interface Fingerprinter {
  readonly algorithm: string;
  /** Digest of the whole file, read in chunks. */
  fingerprintFile(filePath: string): string;
  fingerprintContent(content: string | Buffer): string;
}

/**
 * Hash algorithms node:crypto can compute on this platform.
 */
export function listAlgorithms(): string[] {
  return crypto.getHashes();
}

/**
 * Normalize and validate an algorithm name.
 * Throws ConfigurationError if node:crypto cannot produce a digest with it.
 */
export function resolveAlgorithm(name: string): string {
  const wanted = name.trim().toLowerCase();
  const available = listAlgorithms();
  // Names are matched case-insensitively; the lowercase spelling wins when both exist
  const algorithm = available.includes(wanted)
    ? wanted
    : available.find(candidate => candidate.toLowerCase() === wanted);
  if (!wanted || algorithm === undefined) {
    throw new ConfigurationError(
      `Unsupported fingerprint algorithm "${name}". Available: ${available.join(', ')}`,
    );
  }
  try {
    crypto.createHash(algorithm).update('').digest();
  } catch (err) {
    throw new ConfigurationError(`Fingerprint algorithm "${name}" cannot be used`, '', err);
  }
  return algorithm;
}

export function createFingerprinter(name: string = DEFAULT_ALGORITHM): Fingerprinter {
  const algorithm = resolveAlgorithm(name);

  return {
    algorithm,

    fingerprintFile(filePath: string): string {
      const hash = crypto.createHash(algorithm);
      const fd = fs.openSync(filePath, 'r');
      try {
        const buffer = Buffer.alloc(CHUNK_SIZE);
        let bytesRead = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null);
        while (bytesRead > 0) {
          hash.update(buffer.subarray(0, bytesRead));
          bytesRead = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null);
        }
      } finally {
        fs.closeSync(fd);
      }
      return hash.digest('hex');
    },

    fingerprintContent(content: string | Buffer): string {
      return crypto.createHash(algorithm).update(content).digest('hex');
    },
  };
}
