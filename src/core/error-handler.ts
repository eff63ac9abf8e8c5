/**
 * Thrown error classes.
 *
 * Most expected failures travel as `_tag` data (see `src/errors`). These
 * classes cover the cases that must be thrown: constructor argument checks,
 * and failures crossing the archive producer/consumer boundary, where a
 * rejected promise is the only channel available.
 */

export enum ArchiveErrorCodes {
  VALIDATION_ERROR = 1001,
  FILESYSTEM_ERROR = 1002,
  COMPRESSION_ERROR = 1003,
  STREAM_CLOSED = 1004,
  STREAM_FAILED = 1005,
}

export class ArchiveError extends Error {
  public readonly code: number;
  public readonly data?: unknown;

  constructor(code: number, message: string, data?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ArchiveError';
    this.code = code;
    this.data = data;
  }
}

export class ValidationError extends ArchiveError {
  constructor(message: string, field?: string) {
    super(ArchiveErrorCodes.VALIDATION_ERROR, message, { field });
    this.name = 'ValidationError';
  }
}

/** Walking or reading the tree failed. `errno` carries the Node error code. */
export class FilesystemError extends ArchiveError {
  public readonly errno: string | undefined;
  public readonly path: string;

  constructor(message: string, path: string, errno: string | undefined, cause?: unknown) {
    super(ArchiveErrorCodes.FILESYSTEM_ERROR, message, { path, errno }, { cause });
    this.name = 'FilesystemError';
    this.path = path;
    this.errno = errno;
  }
}

export class CompressionError extends ArchiveError {
  constructor(message: string, cause?: unknown) {
    super(ArchiveErrorCodes.COMPRESSION_ERROR, message, undefined, { cause });
    this.name = 'CompressionError';
  }
}

/** The tar writer or the byte pipeline broke for a reason other than the tree. */
export class StreamFailedError extends ArchiveError {
  constructor(message: string, cause?: unknown) {
    super(ArchiveErrorCodes.STREAM_FAILED, message, undefined, { cause });
    this.name = 'StreamFailedError';
  }
}

export class StreamAlreadyClosedError extends ArchiveError {
  constructor() {
    super(ArchiveErrorCodes.STREAM_CLOSED, 'Archive stream was already closed');
    this.name = 'StreamAlreadyClosedError';
  }
}

export function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  const code = 'code' in e ? e.code : undefined;
  return typeof code === 'string' ? code : undefined;
}

/**
 * Wraps anything thrown by fs into a {@link FilesystemError}, leaving archive
 * errors untouched.
 */
export function toFilesystemError(e: unknown, path: string): ArchiveError {
  if (e instanceof ArchiveError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new FilesystemError(message, path, nodeErrorCode(e), e);
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && e.name === 'AbortError';
}
