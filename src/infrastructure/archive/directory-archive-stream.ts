import path from 'path';
import { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import * as tarStream from 'tar-stream';
import {
  ArchiveError,
  StreamAlreadyClosedError,
  StreamFailedError,
  ValidationError,
  isAbortError,
} from '../../core/error-handler.js';
import type { Logger } from '../../core/logging/index.js';
import { createBootstrapLogger } from '../../core/logging/index.js';
import { BoundedByteBuffer } from './bounded-byte-buffer.js';
import type { CompressionMode } from './compression.js';
import {
  ARCHIVE_EXTENSIONS,
  TAR_BLOCK_SIZE,
  createCompressor,
  isCompressionMode,
  validateCompressionLevel,
} from './compression.js';
import type { ExcludePredicate } from './directory-walker.js';
import { walkDirectoryIntoPack } from './directory-walker.js';

export const DEFAULT_ARCHIVE_BUFFER_SIZE = 10240;

export interface DirectoryArchiveStreamOptions {
  readonly rootPath: string;
  readonly bufferSize?: number;
  readonly exclude?: ExcludePredicate;
  readonly compression?: CompressionMode;
  readonly compressionLevel?: number;
  readonly logger?: Logger;
}

export type PullResult =
  | { readonly kind: 'data'; readonly bytes: Buffer }
  | { readonly kind: 'end' };

export type ArchiveStreamState = 'idle' | 'running' | 'draining' | 'finished' | 'aborted';

const END: PullResult = { kind: 'end' };

/**
 * A directory tree served as a tar archive, produced on demand.
 *
 * A background producer walks the tree into a tar writer, through the
 * compressor, into a {@link BoundedByteBuffer}; the consumer pulls chunks of
 * at most `bufferSize` bytes. Memory stays bounded by the buffer plus the
 * streams' own high-water marks, whatever the tree size.
 *
 * ```ts
 * const archive = createDirectoryArchiveStream({ rootPath: '/srv/photos' });
 * for await (const bytes of archive) res.write(bytes);
 * ```
 */
export class DirectoryArchiveStream implements AsyncIterable<Buffer> {
  readonly name: string;
  readonly contentType = 'application/octet-stream';
  readonly rootPath: string;
  readonly bufferSize: number;
  readonly compression: CompressionMode;

  private readonly compressionLevel: number | undefined;
  private readonly exclude: ExcludePredicate | undefined;
  private readonly logger: Logger;
  private readonly buffer: BoundedByteBuffer;
  private readonly producerAbort = new AbortController();

  private _state: ArchiveStreamState = 'idle';
  private failure: ArchiveError | undefined;
  private closeRequested = false;
  private producing: Promise<void> | undefined;
  private closing: Promise<void> | undefined;

  constructor(options: DirectoryArchiveStreamOptions) {
    const compression = options.compression ?? 'gzip';
    if (!isCompressionMode(compression)) {
      throw new ValidationError(`Unknown compression mode: ${String(compression)}`, 'compression');
    }
    const bufferSize = options.bufferSize ?? DEFAULT_ARCHIVE_BUFFER_SIZE;
    if (!Number.isInteger(bufferSize) || bufferSize <= 0) {
      throw new ValidationError(`bufferSize must be a positive integer, got ${bufferSize}`, 'bufferSize');
    }
    if (compression !== 'none' && bufferSize % TAR_BLOCK_SIZE !== 0) {
      throw new ValidationError(
        `bufferSize must be a multiple of ${TAR_BLOCK_SIZE} when compressing, got ${bufferSize}`,
        'bufferSize'
      );
    }
    validateCompressionLevel(compression, options.compressionLevel);

    this.rootPath = path.resolve(options.rootPath);
    this.bufferSize = bufferSize;
    this.compression = compression;
    this.compressionLevel = options.compressionLevel;
    this.exclude = options.exclude;
    this.logger = (options.logger ?? createBootstrapLogger('DirectoryArchiveStream')).child({ root: this.rootPath });
    this.buffer = new BoundedByteBuffer(bufferSize);
    this.name = `${path.basename(this.rootPath) || 'archive'}.${ARCHIVE_EXTENSIONS[compression]}`;
  }

  get state(): ArchiveStreamState {
    return this._state;
  }

  get peakBufferedBytes(): number {
    return this.buffer.peakBufferedBytes;
  }

  /** Starts the producer; `pull()` does this implicitly. */
  start(): void {
    if (this._state !== 'idle' || this.closeRequested) return;
    this._state = 'running';
    this.logger.debug({ compression: this.compression, bufferSize: this.bufferSize }, 'archive started');
    this.producing = this.produce();
  }

  /**
   * Next chunk of archive bytes (at most `bufferSize`), or `end` once the
   * archive is complete. Rejects with the producer's failure, the same error
   * on every call.
   */
  async pull(): Promise<PullResult> {
    if (this.closeRequested) throw new StreamAlreadyClosedError();
    this.start();

    const bytes = await this.buffer.read();
    if (bytes !== null) return { kind: 'data', bytes };

    if (this._state === 'draining') {
      this._state = 'finished';
      this.logger.debug('archive delivered');
    }
    return END;
  }

  /**
   * Stops the producer, kills any compressor process and resolves once
   * everything has stopped. Idempotent.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Buffer, void, undefined> {
    try {
      for (;;) {
        const result = await this.pull();
        if (result.kind === 'end') return;
        yield result.bytes;
      }
    } finally {
      if (this._state !== 'finished') {
        await this.close();
      }
    }
  }

  private async shutdown(): Promise<void> {
    this.closeRequested = true;
    if (this._state !== 'finished') {
      if (this._state !== 'aborted') this.logger.debug('archive closed by consumer');
      this._state = 'aborted';
    }
    this.buffer.abort(new StreamAlreadyClosedError());
    this.producerAbort.abort();
    await this.producing;
  }

  /**
   * Runs the tar writer and the compression pipeline side by side. Never
   * rejects: the outcome lands in the buffer (end or failure).
   */
  private async produce(): Promise<void> {
    const signal = this.producerAbort.signal;
    const codec = createCompressor(this.compression, this.compressionLevel);
    const pack = tarStream.pack();
    pack.on('error', (e: Error) => this.logger.debug({ err: e }, 'tar pack stopped'));
    const source = Readable.from(pack);
    const buffer = this.buffer;
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        buffer.write(chunk).then(
          () => callback(),
          (e: unknown) => callback(e instanceof Error ? e : new Error(String(e)))
        );
      },
    });

    let pipelineError: unknown;

    const walking = walkDirectoryIntoPack(pack, {
      rootPath: this.rootPath,
      exclude: this.exclude,
      signal,
      logger: this.logger,
    }).then(
      (stats) => {
        this.logger.debug({ ...stats }, 'tree walked');
        pack.finalize();
      },
      (e: unknown) => {
        // Tree failures are causes. Anything else (abort, a pack torn down by
        // the pipeline) is a consequence; the pipeline reports the cause.
        if (e instanceof ArchiveError) {
          this.recordFailure(e);
        } else {
          this.logger.debug({ err: e }, 'walk stopped');
        }
        pack.destroy(e instanceof Error ? e : new Error(String(e)));
      }
    );

    const piping = pipeline([source, ...codec.transforms, sink], { signal }).catch((e: unknown) => {
      pipelineError = e;
      this.producerAbort.abort();
    });

    try {
      await Promise.all([walking, piping]);

      if (pipelineError !== undefined || this.failure || this.closeRequested) {
        codec.dispose();
      }
      const exitError = await codec.exited;

      if (pipelineError !== undefined && !isAbortError(pipelineError)) {
        this.recordFailure(exitError ?? toArchiveError(pipelineError));
      } else if (exitError) {
        this.recordFailure(exitError);
      }
    } catch (e) {
      codec.dispose();
      this.recordFailure(toArchiveError(e));
    }

    this.settle();
  }

  private recordFailure(error: ArchiveError): void {
    if (this.closeRequested || this.failure) return;
    this.failure = error;
  }

  private settle(): void {
    if (this.closeRequested) return;
    if (this.failure) {
      this.logger.error({ err: this.failure }, 'archive failed');
      this._state = 'aborted';
      this.buffer.fail(this.failure);
      return;
    }
    this._state = 'draining';
    this.buffer.end();
  }
}

function toArchiveError(e: unknown): ArchiveError {
  if (e instanceof ArchiveError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new StreamFailedError(message, e);
}

export function createDirectoryArchiveStream(options: DirectoryArchiveStreamOptions): DirectoryArchiveStream {
  return new DirectoryArchiveStream(options);
}
