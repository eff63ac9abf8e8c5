import { spawn } from 'child_process';
import { Duplex } from 'stream';
import zlib from 'zlib';
import { CompressionError, ValidationError } from '../../core/error-handler.js';
import { assertNever } from '../../runtime/assert-never.js';

export const COMPRESSION_MODES = ['none', 'gzip', 'bzip2', 'xz'] as const;

/** tar block size; compressed output is only flushed in whole blocks. */
export const TAR_BLOCK_SIZE = 512;

export type CompressionMode = (typeof COMPRESSION_MODES)[number];

export const ARCHIVE_EXTENSIONS: Readonly<Record<CompressionMode, string>> = {
  none: 'tar',
  gzip: 'tgz',
  bzip2: 'tar.bz2',
  xz: 'tar.xz',
};

const LEVEL_RANGE: Readonly<Record<CompressionMode, readonly [number, number]>> = {
  none: [0, 0],
  gzip: [0, 9],
  bzip2: [1, 9],
  xz: [0, 9],
};

export function isCompressionMode(value: string): value is CompressionMode {
  return COMPRESSION_MODES.some((mode) => mode === value);
}

/**
 * A compression stage spliced between the tar writer and the byte buffer.
 *
 * `exited` resolves once any external process is gone, carrying a
 * {@link CompressionError} when it exited badly on its own (a kill from
 * `dispose` is not a failure). It never rejects, so
 * it can sit unobserved while the pipeline runs. `dispose` kills whatever is
 * still running and is safe to call more than once.
 */
export interface Compressor {
  readonly mode: CompressionMode;
  readonly transforms: readonly Duplex[];
  readonly exited: Promise<CompressionError | undefined>;
  dispose(): void;
}

export function validateCompressionLevel(mode: CompressionMode, level: number | undefined): void {
  if (level === undefined || mode === 'none') return;
  const [min, max] = LEVEL_RANGE[mode];
  if (!Number.isInteger(level) || level < min || level > max) {
    throw new ValidationError(`${mode} compression level must be an integer in [${min}, ${max}], got ${level}`, 'compressionLevel');
  }
}

export function createCompressor(mode: CompressionMode, level?: number): Compressor {
  validateCompressionLevel(mode, level);
  switch (mode) {
    case 'none':
      return { mode, transforms: [], exited: Promise.resolve(undefined), dispose: () => undefined };
    case 'gzip': {
      const gzip = zlib.createGzip(level === undefined ? {} : { level });
      return {
        mode,
        transforms: [gzip],
        exited: Promise.resolve(undefined),
        dispose: () => {
          gzip.destroy();
        },
      };
    }
    case 'bzip2':
      return spawnCompressor(mode, 'bzip2', level);
    case 'xz':
      return spawnCompressor(mode, 'xz', level);
    default:
      return assertNever(mode);
  }
}

/**
 * Runs `bzip2 -zc` / `xz -zc` and streams through its stdin/stdout.
 */
function spawnCompressor(mode: CompressionMode, command: string, level: number | undefined): Compressor {
  const args = ['-z', '-c', ...(level === undefined ? [] : [`-${level}`])];
  const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'ignore'] });

  let killed = false;
  const exited = new Promise<CompressionError | undefined>((resolve) => {
    child.once('error', (e) => {
      resolve(new CompressionError(`${command} could not be started: ${e.message}`, e));
    });
    child.once('close', (code, signal) => {
      if (code === 0 || killed) resolve(undefined);
      else resolve(new CompressionError(`${command} exited with ${signal ?? `code ${code}`}`));
    });
  });

  const duplex = Duplex.from({ writable: child.stdin, readable: child.stdout });

  return {
    mode,
    transforms: [duplex],
    exited,
    dispose: () => {
      duplex.destroy();
      if (child.exitCode === null && child.signalCode === null) {
        killed = true;
        child.kill('SIGTERM');
      }
    },
  };
}
