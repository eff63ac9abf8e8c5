import fs from 'fs/promises';
import type { Stats } from 'fs';
import { singleton } from 'tsyringe';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, errAsync } from 'neverthrow';
import type { FileSystemPort, FsError, FsStat } from '../../application/ports/file-system.port.js';
import { Err } from '../../errors/factories.js';
import { nodeErrorCode } from '../../core/error-handler.js';

export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT' || code === 'ENOTDIR') return Err.notFound(filePath);
  if (code === 'EEXIST' || code === 'ENOTEMPTY' || code === 'ERR_FS_CP_EEXIST') return Err.alreadyExists(filePath);
  const detail = e instanceof Error ? e.message : String(e);
  return Err.filesystem(filePath, code, `Filesystem error at ${filePath}: ${detail}`);
}

function toFsStat(stats: Stats): FsStat {
  const kind = stats.isDirectory()
    ? 'directory'
    : stats.isFile()
      ? 'file'
      : stats.isSymbolicLink()
        ? 'symlink'
        : 'other';
  return { kind, size: stats.size, mtimeMs: stats.mtimeMs };
}

@singleton()
export class NodeFileSystem implements FileSystemPort {
  lstat(absPath: string): ResultAsync<FsStat, FsError> {
    return RA.fromPromise(fs.lstat(absPath), (e) => mapFsError(e, absPath)).map(toFsStat);
  }

  stat(absPath: string): ResultAsync<FsStat, FsError> {
    return RA.fromPromise(fs.stat(absPath), (e) => mapFsError(e, absPath)).map(toFsStat);
  }

  realpath(absPath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.realpath(absPath), (e) => mapFsError(e, absPath));
  }

  readdir(absPath: string): ResultAsync<readonly string[], FsError> {
    return RA.fromPromise(fs.readdir(absPath), (e) => mapFsError(e, absPath));
  }

  async exists(absPath: string): Promise<boolean> {
    return this.lstat(absPath).match(
      () => true,
      () => false
    );
  }

  readFile(absPath: string): ResultAsync<Buffer, FsError> {
    return RA.fromPromise(fs.readFile(absPath), (e) => mapFsError(e, absPath));
  }

  mkdir(absPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(absPath), (e) => mapFsError(e, absPath)).map(() => undefined);
  }

  remove(absPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rm(absPath, { recursive: true }), (e) => mapFsError(e, absPath));
  }

  copy(from: string, to: string): ResultAsync<void, FsError> {
    return RA.fromPromise(
      fs.cp(from, to, { recursive: true, force: false, errorOnExist: true, verbatimSymlinks: true }),
      (e) => mapFsError(e, nodeErrorCode(e) === 'ERR_FS_CP_EEXIST' ? to : from)
    );
  }

  move(from: string, to: string): ResultAsync<void, FsError> {
    // rename() silently replaces an existing file
    return RA.fromSafePromise(this.exists(to)).andThen((taken): ResultAsync<void, FsError> => {
      if (taken) return errAsync(Err.alreadyExists(to));
      return RA.fromPromise(fs.rename(from, to), (e) => e).orElse(
        (e): ResultAsync<void, FsError> =>
          nodeErrorCode(e) === 'EXDEV' ? this.copy(from, to).andThen(() => this.remove(from)) : errAsync(mapFsError(e, from))
      );
    });
  }
}
