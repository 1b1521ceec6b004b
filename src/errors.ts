/**
 * Error taxonomy shared by the archive engine
 */

export type ArchiveErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'DIGEST_MISMATCH'
  | 'IO_FAILURE'
  | 'CODEC_FAILURE'
  | 'TASK_FAILURE'
  | 'INVALID_STATE';

/**
 * Base class for every failure raised by the engine.
 * `code` is stable and safe to branch on.
 */
export class ArchiveError extends Error {
  constructor(
    readonly code: ArchiveErrorCode,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options?.cause !== undefined ? {cause: options.cause} : undefined);
    this.name = 'ArchiveError';
  }
}

export class UnsupportedFormatError extends ArchiveError {
  constructor(readonly filename: string) {
    super(
      'UNSUPPORTED_FORMAT',
      `could not determine archive format from ${filename} suffix`
    );
    this.name = 'UnsupportedFormatError';
  }
}

export class DigestMismatchError extends ArchiveError {
  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(
      'DIGEST_MISMATCH',
      `digest mismatch: expected: ${expected} actual: ${actual}`
    );
    this.name = 'DigestMismatchError';
  }
}

export type IOOperation =
  | 'open'
  | 'stat'
  | 'read'
  | 'write'
  | 'mkdir'
  | 'remove'
  | 'readlink'
  | 'symlink'
  | 'readdir';

export class IOFailureError extends ArchiveError {
  constructor(
    readonly operation: IOOperation,
    readonly path: string,
    cause?: unknown
  ) {
    super('IO_FAILURE', `${operation} failed: ${path}: ${describeCause(cause)}`, {
      cause,
    });
    this.name = 'IOFailureError';
  }
}

export class CodecFailureError extends ArchiveError {
  constructor(
    readonly format: string,
    message: string,
    cause?: unknown
  ) {
    super(
      'CODEC_FAILURE',
      cause === undefined
        ? `${format}: ${message}`
        : `${format}: ${message}: ${describeCause(cause)}`,
      {cause}
    );
    this.name = 'CodecFailureError';
  }
}

export class TaskFailureError extends ArchiveError {
  constructor(
    readonly task: string,
    message: string,
    cause?: unknown
  ) {
    super('TASK_FAILURE', `background task '${task}' ${message}`, {cause});
    this.name = 'TaskFailureError';
  }
}

export class ArchiveStateError extends ArchiveError {
  constructor(
    readonly operation: string,
    readonly state: string
  ) {
    super('INVALID_STATE', `cannot ${operation}: archive is ${state}`);
    this.name = 'ArchiveStateError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause === undefined) return 'unknown error';
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Node system errors (ENOENT, EACCES, ...) carry the failing syscall
 */
export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'syscall' in error;
}

/**
 * Run a filesystem call, re-raising failures with the path attached
 */
export async function withIO<T>(
  operation: IOOperation,
  path: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ArchiveError) throw error;
    throw new IOFailureError(operation, path, error);
  }
}
