/**
 * Error kinds raised by the mirror engine.
 * Every per-pass error carries the path, the operation and the underlying cause.
 */

export type MirrorErrorKind =
  | 'traversal'
  | 'structure'
  | 'deletion'
  | 'reconcile'
  | 'configuration';

export class MirrorError extends Error {
  readonly kind: MirrorErrorKind;
  readonly path: string;
  readonly operation: string;

  constructor(
    kind: MirrorErrorKind,
    operation: string,
    path: string,
    cause?: unknown,
    message?: string,
  ) {
    super(message ?? `${operation} failed for ${path}${describeCause(cause)}`, { cause });
    this.name = 'MirrorError';
    this.kind = kind;
    this.path = path;
    this.operation = operation;
  }
}

/** The source tree (or one of its directories) could not be listed. */
export class TraversalError extends MirrorError {
  constructor(operation: string, path: string, cause?: unknown, message?: string) {
    super('traversal', operation, path, cause, message);
    this.name = 'TraversalError';
  }
}

/** A replica directory could not be created or is not a directory. */
export class StructureError extends MirrorError {
  constructor(operation: string, path: string, cause?: unknown, message?: string) {
    super('structure', operation, path, cause, message);
    this.name = 'StructureError';
  }
}

/** A stale replica entry could not be removed. */
export class DeletionError extends MirrorError {
  constructor(operation: string, path: string, cause?: unknown, message?: string) {
    super('deletion', operation, path, cause, message);
    this.name = 'DeletionError';
  }
}

/** A replica file could not be created or updated. */
export class ReconcileError extends MirrorError {
  constructor(operation: string, path: string, cause?: unknown, message?: string) {
    super('reconcile', operation, path, cause, message);
    this.name = 'ReconcileError';
  }
}

/** Invalid paths or an unsupported fingerprint algorithm. Fatal at startup. */
export class ConfigurationError extends MirrorError {
  constructor(message: string, path = '', cause?: unknown) {
    super('configuration', 'configure', path, cause, message);
    this.name = 'ConfigurationError';
  }
}

export function isMirrorError(err: unknown): err is MirrorError {
  return err instanceof MirrorError;
}

/**
 * Extract the errno code (ENOENT, EACCES, ...) from a Node.js system error.
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * True for errors meaning "nothing at this path" (ENOENT, or a path segment
 * that is a file: ENOTDIR).
 */
export function isMissingPathError(err: unknown): boolean {
  const code = errnoCode(err);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return '';
  const code = errnoCode(cause);
  const message = errorMessage(cause);
  if (code && !message.startsWith(code)) {
    return `: ${code}: ${message}`;
  }
  return `: ${message}`;
}
