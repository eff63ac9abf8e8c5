import type { ResultAsync } from 'neverthrow';
import type { AlreadyExistsError, FilesystemFailedError, NotFoundError } from '../../errors/app-error.js';

export type FsError = NotFoundError | AlreadyExistsError | FilesystemFailedError;

export type FsEntryKind = 'directory' | 'file' | 'symlink' | 'other';

export interface FsStat {
  readonly kind: FsEntryKind;
  readonly size: number;
  readonly mtimeMs: number;
}

/**
 * Filesystem operations the browse service performs, as values.
 * Paths are absolute and already confined by PathGuard.
 */
export interface FileSystemPort {
  /** Does not follow a final symlink. */
  lstat(absPath: string): ResultAsync<FsStat, FsError>;
  /** Follows symlinks. */
  stat(absPath: string): ResultAsync<FsStat, FsError>;
  realpath(absPath: string): ResultAsync<string, FsError>;
  /** Entry names, unsorted. */
  readdir(absPath: string): ResultAsync<readonly string[], FsError>;
  exists(absPath: string): Promise<boolean>;
  /** Whole file contents; meant for small text files. */
  readFile(absPath: string): ResultAsync<Buffer, FsError>;
  mkdir(absPath: string): ResultAsync<void, FsError>;
  /** Recursive for directories. */
  remove(absPath: string): ResultAsync<void, FsError>;
  /** Recursive copy; symlinks are copied as links. Fails if `to` exists. */
  copy(from: string, to: string): ResultAsync<void, FsError>;
  /** Rename, falling back to copy + remove across devices. */
  move(from: string, to: string): ResultAsync<void, FsError>;
}
