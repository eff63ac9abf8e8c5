import { createReadStream } from 'fs';
import fs from 'fs/promises';
import type { Stats } from 'fs';
import { once } from 'events';
import path from 'path';
import type { Headers, Pack } from 'tar-stream';
import { FilesystemError, isAbortError, toFilesystemError } from '../../core/error-handler.js';
import type { Logger } from '../../core/logging/index.js';

/**
 * Returns `true` for entries to leave out of the archive. An excluded
 * directory is not descended into.
 */
export type ExcludePredicate = (absolutePath: string, isDirectory: boolean) => boolean;

export interface WalkOptions {
  readonly rootPath: string;
  readonly exclude?: ExcludePredicate;
  readonly signal: AbortSignal;
  readonly logger: Logger;
}

export interface WalkStats {
  directories: number;
  files: number;
  symlinks: number;
  skipped: number;
}

/**
 * Writes `rootPath`'s tree into `pack`, depth first, sorted by name within
 * each directory. Entry names are relative to the root and `/`-separated;
 * the root itself has no entry. Symlinks are stored as links, never
 * followed. Fifos, sockets and devices are skipped.
 *
 * Does not finalize `pack`; the caller owns that. Failures reading the tree
 * are thrown as a `FilesystemError` naming the offending path; failures of
 * the pack itself (torn down, size mismatch) are rethrown unchanged.
 */
export async function walkDirectoryIntoPack(pack: Pack, options: WalkOptions): Promise<WalkStats> {
  const stats: WalkStats = { directories: 0, files: 0, symlinks: 0, skipped: 0 };
  await walk(pack, options, options.rootPath, '', stats);
  return stats;
}

async function walk(pack: Pack, options: WalkOptions, dir: string, prefix: string, stats: WalkStats): Promise<void> {
  const names = await fs.readdir(dir).catch((e: unknown) => {
    throw toFilesystemError(e, dir);
  });
  names.sort();

  for (const name of names) {
    options.signal.throwIfAborted();

    const absolute = path.join(dir, name);
    const entryName = prefix ? `${prefix}/${name}` : name;
    const stat = await fs.lstat(absolute).catch((e: unknown) => {
      throw toFilesystemError(e, absolute);
    });

    if (options.exclude?.(absolute, stat.isDirectory())) {
      stats.skipped++;
      continue;
    }

    if (stat.isDirectory()) {
      await addEntry(pack, { ...baseHeader(stat), name: `${entryName}/`, type: 'directory' });
      stats.directories++;
      await walk(pack, options, absolute, entryName, stats);
    } else if (stat.isFile()) {
      await addFile(pack, options.signal, absolute, entryName, stat);
      stats.files++;
    } else if (stat.isSymbolicLink()) {
      const target = await fs.readlink(absolute).catch((e: unknown) => {
        throw toFilesystemError(e, absolute);
      });
      await addEntry(pack, { ...baseHeader(stat), name: entryName, type: 'symlink', linkname: target });
      stats.symlinks++;
    } else {
      options.logger.debug({ path: absolute }, 'skipping special file');
      stats.skipped++;
    }
  }
}

function baseHeader(stat: Stats): { mode: number; mtime: Date; uid: number; gid: number } {
  return { mode: stat.mode & 0o7777, mtime: stat.mtime, uid: stat.uid, gid: stat.gid };
}

function addEntry(pack: Pack, header: Headers): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const entry = pack.entry(header, (e) => {
      if (e) reject(e);
      else resolve();
    });
    // tar-stream destroys the open entry when the pack goes down.
    entry.on('error', reject);
  });
}

/**
 * Streams the file body into its entry. The header size comes from `lstat`;
 * bytes a growing file gains are left out, and a file that shrinks fails.
 */
async function addFile(pack: Pack, signal: AbortSignal, absolute: string, entryName: string, stat: Stats): Promise<void> {
  let entryError: Error | undefined;
  let onEntryDone: (e?: Error | null) => void = () => undefined;
  const entryDone = new Promise<Error | null | undefined>((resolve) => {
    onEntryDone = resolve;
  });
  const entry = pack.entry({ ...baseHeader(stat), name: entryName, type: 'file', size: stat.size }, (e) => onEntryDone(e));
  entry.on('error', (e: Error) => {
    entryError = e;
    onEntryDone(e);
  });

  try {
    let written = 0;
    if (stat.size > 0) {
      const source = createReadStream(absolute, { start: 0, end: stat.size - 1 });
      try {
        for await (const chunk of source) {
          signal.throwIfAborted();
          written += chunk.length;
          if (!entry.write(chunk)) {
            await once(entry, 'drain', { signal });
          }
        }
      } finally {
        source.destroy();
      }
    }
    if (written !== stat.size) {
      throw new FilesystemError(`${absolute} shrank while being archived`, absolute, undefined);
    }
    entry.end();
  } catch (e) {
    const failure = isAbortError(e) || entryError ? e : toFilesystemError(e, absolute);
    entry.destroy(failure instanceof Error ? failure : undefined);
    throw failure;
  }

  const failure = await entryDone;
  if (failure) throw failure;
}
