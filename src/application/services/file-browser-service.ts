import path from 'path';
import { inject, singleton } from 'tsyringe';
import { lookup as lookupMimetype } from 'mime-types';
import type { Result } from 'neverthrow';
import { ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { BrowseError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { FileSystemPort, FsStat } from '../ports/file-system.port.js';
import type { JailRoot } from '../../utils/path-guard.js';
import { isWithin, relativize, resolve } from '../../utils/path-guard.js';
import { chooseNonCollidingName, sanitizeFilename } from '../../utils/filename.js';
import { formatSize } from '../../utils/format-size.js';
import type { DirectoryArchiveStream } from '../../infrastructure/archive/directory-archive-stream.js';
import { createDirectoryArchiveStream } from '../../infrastructure/archive/directory-archive-stream.js';
import type { ExclusionPolicy } from './exclusion-policy.js';
import type { ListingSort } from './listing-sort.js';
import { DEFAULT_SORT, formatSort, sortListing } from './listing-sort.js';
import type { PlaylistItem } from './playlist.js';
import {
  audioMimetype,
  decodePlaylist,
  isRemoteLocation,
  parsePlaylist,
  playlistFormat,
  remoteAudioMimetype,
} from './playlist.js';

export const DIRECTORY_MIMETYPE = 'inode/directory';
export const FALLBACK_MIMETYPE = 'application/octet-stream';
export const MAX_PLAYLIST_BYTES = 1024 * 1024;

export interface FileNode {
  readonly name: string;
  /** `/`-separated, relative to the base directory; `""` is the base itself. */
  readonly urlPath: string;
  readonly kind: 'directory' | 'file';
  readonly size: number;
  readonly sizeLabel: string;
  /** ISO 8601 */
  readonly modified: string;
  readonly mimetype: string;
  readonly canDownload: boolean;
  readonly canRemove: boolean;
  readonly canUpload: boolean;
}

export interface DirectoryListing {
  readonly directory: FileNode;
  /** `null` at the base directory. */
  readonly parent: string | null;
  readonly sort: string;
  readonly entries: readonly FileNode[];
}

export interface UploadedFile {
  /** Name as sent by the client; sanitized before use. */
  readonly originalName: string;
  /** Where the upload was spooled; moved into place on success. */
  readonly tempPath: string;
}

export type PasteMode = 'copy' | 'cut';

export interface PasteFailure {
  readonly urlPath: string;
  readonly error: BrowseError;
}

export interface PasteOutcome {
  readonly pasted: readonly string[];
  readonly failures: readonly PasteFailure[];
}

export type PlaylistEntry =
  | {
      readonly kind: 'file';
      readonly urlPath: string;
      readonly title: string;
      /** Seconds; `null` when unknown. */
      readonly duration: number | null;
      readonly mimetype: string;
    }
  | {
      readonly kind: 'remote';
      readonly url: string;
      readonly title: string;
      readonly duration: number | null;
      readonly mimetype: string;
    };

export interface Playlist {
  readonly source: FileNode;
  readonly entries: readonly PlaylistEntry[];
}

interface Located {
  readonly absolutePath: string;
  readonly urlPath: string;
  readonly stat: FsStat;
}

/**
 * Everything the HTTP layer can do to the served tree.
 *
 * Every operation starts from a request path, goes through PathGuard and the
 * exclusion policy, and ends as a `ResultAsync` whose error is a
 * {@link BrowseError}. Excluded and out-of-jail nodes are reported exactly
 * like missing ones.
 */
@singleton()
export class FileBrowserService {
  private readonly logger: Logger;
  private readonly base: JailRoot;

  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Infra.FileSystem) private readonly fileSystem: FileSystemPort,
    @inject(DI.Services.Exclusion) private readonly exclusion: ExclusionPolicy,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('FileBrowserService');
    this.base = config.paths.base;
  }

  /** Request path of the configured start directory. */
  get startPath(): string {
    const rel = relativize(this.base, this.config.paths.initial);
    return rel.kind === 'ok' ? rel.value : '';
  }

  stat(urlPath: string): ResultAsync<FileNode, BrowseError> {
    return this.locate(urlPath).map((node) => this.toFileNode(node));
  }

  list(urlPath: string, sort: ListingSort): ResultAsync<DirectoryListing, BrowseError> {
    return this.locateDirectory(urlPath).andThen((dir) =>
      this.fileSystem
        .readdir(dir.absolutePath)
        .andThen((names) => ResultAsync.fromSafePromise(this.listChildren(dir, names)))
        .map((children): DirectoryListing => {
          const sorted = sortListing(
            children.map((child) => ({
              node: child,
              name: path.basename(child.absolutePath),
              isDirectory: child.stat.kind === 'directory',
              size: child.stat.size,
              mtimeMs: child.stat.mtimeMs,
            })),
            sort
          );
          return {
            directory: this.toFileNode(dir),
            parent: dir.urlPath === '' ? null : parentUrlPath(dir.urlPath),
            sort: formatSort(sort),
            entries: sorted.map((item) => this.toFileNode(item.node)),
          };
        })
    );
  }

  /**
   * Archive of a whole directory, not yet started. The caller must pull it to
   * the end or close it.
   */
  openArchive(urlPath: string): ResultAsync<DirectoryArchiveStream, BrowseError> {
    if (!this.config.archive.enabled) {
      return errAsync(Err.forbidden(urlPath, 'download'));
    }
    return this.locateDirectory(urlPath).map((dir) => {
      const { compression, compressionLevel, bufferSize } = this.config.archive;
      this.logger.info({ path: dir.urlPath, compression }, 'directory download');
      return createDirectoryArchiveStream({
        rootPath: dir.absolutePath,
        bufferSize,
        compression,
        compressionLevel,
        exclude: this.exclusion.toPredicate(),
        logger: this.logger,
      });
    });
  }

  /** Absolute path of a servable regular file. */
  resolveFile(urlPath: string): ResultAsync<FileNode & { readonly absolutePath: string }, BrowseError> {
    return this.locate(urlPath).andThen((node): ResultAsync<FileNode & { readonly absolutePath: string }, BrowseError> =>
      node.stat.kind === 'file'
        ? okAsync({ ...this.toFileNode(node), absolutePath: node.absolutePath })
        : errAsync(Err.notFound(urlPath))
    );
  }

  /** Removes a file or a whole directory; resolves to the parent's path. */
  remove(urlPath: string): ResultAsync<string, BrowseError> {
    return this.locate(urlPath).andThen((node): ResultAsync<string, BrowseError> => {
      if (!this.canRemove(node.absolutePath)) {
        return errAsync(Err.forbidden(node.urlPath, 'remove'));
      }
      this.logger.info({ path: node.urlPath }, 'removing');
      return this.fileSystem.remove(node.absolutePath).map(() => parentUrlPath(node.urlPath));
    });
  }

  /** Stores every file under a sanitized, non-colliding name. */
  upload(urlPath: string, files: readonly UploadedFile[]): ResultAsync<readonly string[], BrowseError> {
    return this.locateDirectory(urlPath).andThen((dir): ResultAsync<readonly string[], BrowseError> => {
      if (!this.canUpload(dir)) {
        return errAsync(Err.forbidden(dir.urlPath, 'upload'));
      }
      if (files.length === 0) {
        return errAsync(Err.invalidRequest('No files were uploaded'));
      }
      const names: string[] = [];
      for (const file of files) {
        const name = sanitizeFilename(file.originalName);
        if (name === '') return errAsync(Err.invalidFilename(file.originalName));
        names.push(name);
      }
      return new ResultAsync(this.storeUploads(dir, files, names));
    });
  }

  createDirectory(urlPath: string, rawName: string): ResultAsync<string, BrowseError> {
    return this.locateDirectory(urlPath).andThen((dir): ResultAsync<string, BrowseError> => {
      if (!this.canUpload(dir)) {
        return errAsync(Err.forbidden(dir.urlPath, 'upload'));
      }
      const name = sanitizeFilename(rawName);
      if (name === '') {
        return errAsync(Err.invalidFilename(rawName));
      }
      const target = path.join(dir.absolutePath, name);
      return this.fileSystem
        .mkdir(target)
        .mapErr((e): BrowseError => (e._tag === 'AlreadyExists' ? Err.alreadyExists(joinUrlPath(dir.urlPath, name)) : e))
        .map(() => joinUrlPath(dir.urlPath, name));
    });
  }

  /**
   * Copies or moves each item into the directory at `urlPath`. Items fail
   * independently; the outcome lists both sides.
   */
  paste(urlPath: string, mode: PasteMode, items: readonly string[]): ResultAsync<PasteOutcome, BrowseError> {
    return this.locateDirectory(urlPath).andThen((dir): ResultAsync<PasteOutcome, BrowseError> => {
      if (!this.canUpload(dir)) {
        return errAsync(Err.forbidden(dir.urlPath, 'paste'));
      }
      return ResultAsync.fromSafePromise(this.pasteItems(dir, mode, items));
    });
  }

  /**
   * What a browser can play from `urlPath`: the audio files of a directory,
   * the entries of an m3u, m3u8 or pls file, or a single audio file.
   * Playlist entries that are missing, excluded, outside the base directory
   * or not audio are dropped. A directory without audio is `NotFound`.
   */
  playlist(urlPath: string): ResultAsync<Playlist, BrowseError> {
    return this.locate(urlPath).andThen((node): ResultAsync<Playlist, BrowseError> => {
      const source = this.toFileNode(node);
      if (node.stat.kind === 'directory') {
        return this.directoryPlaylist(node).andThen((entries): ResultAsync<Playlist, BrowseError> =>
          entries.length === 0 ? errAsync(Err.notFound(node.urlPath)) : okAsync({ source, entries })
        );
      }

      const single = this.fileEntry(node, null, null);
      if (single !== null) return okAsync({ source, entries: [single] });

      const format = playlistFormat(node.absolutePath);
      if (format === null) return errAsync(Err.notFound(node.urlPath));
      if (node.stat.size > MAX_PLAYLIST_BYTES) {
        return errAsync(Err.invalidRequest(`Playlist ${node.urlPath} is larger than ${MAX_PLAYLIST_BYTES} bytes`));
      }
      return this.fileSystem
        .readFile(node.absolutePath)
        .andThen((bytes) =>
          ResultAsync.fromSafePromise(this.playlistEntries(node, parsePlaylist(format, decodePlaylist(format, bytes))))
        )
        .map((entries): Playlist => ({ source, entries }));
    });
  }

  // ---------------------------------------------------------------------------

  private locate(urlPath: string): ResultAsync<Located, BrowseError> {
    const resolved = resolve(this.base, urlPath);
    if (resolved.kind === 'err') {
      return errAsync(resolved.error);
    }
    const absolutePath = resolved.value;
    const rel = relativize(this.base, absolutePath);
    const normalized = rel.kind === 'ok' ? rel.value : urlPath;

    return this.fileSystem
      .stat(absolutePath)
      .mapErr((e): BrowseError => (e._tag === 'NotFound' ? Err.notFound(normalized) : e))
      .andThen((stat): ResultAsync<Located, BrowseError> => {
        if (stat.kind !== 'file' && stat.kind !== 'directory') {
          return errAsync(Err.notFound(normalized));
        }
        return ResultAsync.fromSafePromise(
          this.exclusion.isExcludedFollowingLinks(absolutePath, this.fileSystem, stat.kind === 'directory')
        ).andThen((excluded): ResultAsync<Located, BrowseError> =>
          excluded ? errAsync(Err.notFound(normalized)) : okAsync({ absolutePath, urlPath: normalized, stat })
        );
      });
  }

  private locateDirectory(urlPath: string): ResultAsync<Located, BrowseError> {
    return this.locate(urlPath).andThen((node): ResultAsync<Located, BrowseError> =>
      node.stat.kind === 'directory' ? okAsync(node) : errAsync(Err.notFound(node.urlPath))
    );
  }

  private async listChildren(dir: Located, names: readonly string[]): Promise<Located[]> {
    const children: Located[] = [];
    for (const name of names) {
      const child = await this.locate(joinUrlPath(dir.urlPath, name));
      if (child.isOk()) {
        children.push(child.value);
      } else {
        this.logger.debug({ path: joinUrlPath(dir.urlPath, name), reason: child.error._tag }, 'entry hidden');
      }
    }
    return children;
  }

  private directoryPlaylist(dir: Located): ResultAsync<PlaylistEntry[], BrowseError> {
    return this.fileSystem
      .readdir(dir.absolutePath)
      .andThen((names) =>
        ResultAsync.fromSafePromise(this.listChildren(dir, names.filter((name) => audioMimetype(name) !== null)))
      )
      .map((children) =>
        sortListing(
          children.map((child) => ({
            node: child,
            name: path.basename(child.absolutePath),
            isDirectory: child.stat.kind === 'directory',
            size: child.stat.size,
            mtimeMs: child.stat.mtimeMs,
          })),
          DEFAULT_SORT
        ).flatMap((item) => this.fileEntry(item.node, null, null) ?? [])
      );
  }

  private async playlistEntries(playlist: Located, items: readonly PlaylistItem[]): Promise<PlaylistEntry[]> {
    const folder = path.dirname(playlist.absolutePath);
    const entries: PlaylistEntry[] = [];

    for (const item of items) {
      if (isRemoteLocation(item.location)) {
        const mimetype = remoteAudioMimetype(item.location);
        if (mimetype !== null) {
          entries.push({ kind: 'remote', url: item.location, title: item.title ?? item.location, duration: item.duration, mimetype });
        }
        continue;
      }

      // Relative locations are relative to the playlist's own directory.
      const rel = relativize(this.base, path.resolve(folder, item.location));
      const located = rel.kind === 'ok' ? await this.locate(rel.value) : null;
      const entry = located !== null && located.isOk() ? this.fileEntry(located.value, item.title, item.duration) : null;
      if (entry !== null) {
        entries.push(entry);
      } else {
        this.logger.debug({ playlist: playlist.urlPath, location: item.location }, 'playlist entry dropped');
      }
    }
    return entries;
  }

  private fileEntry(node: Located, title: string | null, duration: number | null): PlaylistEntry | null {
    const mimetype = audioMimetype(node.absolutePath);
    if (node.stat.kind !== 'file' || mimetype === null) return null;
    return { kind: 'file', urlPath: node.urlPath, title: title ?? path.basename(node.absolutePath), duration, mimetype };
  }

  private async storeUploads(
    dir: Located,
    files: readonly UploadedFile[],
    names: readonly string[]
  ): Promise<Result<readonly string[], BrowseError>> {
    const stored: string[] = [];
    for (const [index, file] of files.entries()) {
      const desired = names[index] ?? file.originalName;
      const name = await chooseNonCollidingName((candidate) => this.fileSystem.exists(path.join(dir.absolutePath, candidate)), desired);
      const moved = await this.fileSystem.move(file.tempPath, path.join(dir.absolutePath, name));
      if (moved.isErr()) {
        this.logger.error({ path: dir.urlPath, name, error: moved.error }, 'upload failed');
        return err(moved.error);
      }
      stored.push(joinUrlPath(dir.urlPath, name));
    }
    this.logger.info({ path: dir.urlPath, count: stored.length }, 'upload stored');
    return ok(stored);
  }

  private async pasteItems(dir: Located, mode: PasteMode, items: readonly string[]): Promise<PasteOutcome> {
    const pasted: string[] = [];
    const failures: PasteFailure[] = [];

    for (const item of items) {
      const outcome = await this.pasteOne(dir, mode, item);
      if (outcome.isOk()) {
        pasted.push(outcome.value);
      } else {
        failures.push({ urlPath: item, error: outcome.error });
      }
    }

    this.logger.info({ path: dir.urlPath, mode, pasted: pasted.length, failed: failures.length }, 'paste done');
    return { pasted, failures };
  }

  private async pasteOne(dir: Located, mode: PasteMode, item: string): Promise<Result<string, BrowseError>> {
    const located = await this.locate(item);
    if (located.isErr()) return err(located.error);
    const source = located.value;

    if (mode === 'cut') {
      if (!this.canRemove(source.absolutePath)) return err(Err.forbidden(source.urlPath, 'remove'));
      if (path.dirname(source.absolutePath) === dir.absolutePath) return ok(source.urlPath);
    }
    if (source.stat.kind === 'directory' && isWithin(source.absolutePath, dir.absolutePath)) {
      return err(Err.invalidRequest(`Cannot paste ${source.urlPath} into itself`));
    }

    const name = await chooseNonCollidingName(
      (candidate) => this.fileSystem.exists(path.join(dir.absolutePath, candidate)),
      path.basename(source.absolutePath)
    );
    const target = path.join(dir.absolutePath, name);
    const done =
      mode === 'cut'
        ? await this.fileSystem.move(source.absolutePath, target)
        : await this.fileSystem.copy(source.absolutePath, target);
    return done.map(() => joinUrlPath(dir.urlPath, name));
  }

  private canRemove(absolutePath: string): boolean {
    const root = this.config.paths.removable;
    return root !== null && absolutePath !== root && isWithin(root, absolutePath);
  }

  private canUpload(node: Located): boolean {
    const root = this.config.paths.upload;
    return node.stat.kind === 'directory' && root !== null && isWithin(root, node.absolutePath);
  }

  private toFileNode(node: Located): FileNode {
    const isDirectory = node.stat.kind === 'directory';
    const name = node.urlPath === '' ? path.basename(this.base) : path.basename(node.absolutePath);
    const size = isDirectory ? 0 : node.stat.size;
    return {
      name,
      urlPath: node.urlPath,
      kind: isDirectory ? 'directory' : 'file',
      size,
      sizeLabel: isDirectory ? '' : formatSize(size, this.config.display.binaryUnits),
      modified: new Date(node.stat.mtimeMs).toISOString(),
      mimetype: isDirectory ? DIRECTORY_MIMETYPE : lookupMimetype(name) || FALLBACK_MIMETYPE,
      canDownload: isDirectory ? this.config.archive.enabled : true,
      canRemove: this.canRemove(node.absolutePath),
      canUpload: this.canUpload(node),
    };
  }
}

export function joinUrlPath(parent: string, name: string): string {
  return parent === '' ? name : `${parent}/${name}`;
}

export function parentUrlPath(urlPath: string): string {
  const i = urlPath.lastIndexOf('/');
  return i < 0 ? '' : urlPath.slice(0, i);
}
