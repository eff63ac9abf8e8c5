export { BoundedByteBuffer } from './bounded-byte-buffer.js';
export type { BufferState } from './bounded-byte-buffer.js';
export {
  ARCHIVE_EXTENSIONS,
  COMPRESSION_MODES,
  TAR_BLOCK_SIZE,
  createCompressor,
  isCompressionMode,
} from './compression.js';
export type { CompressionMode, Compressor } from './compression.js';
export { walkDirectoryIntoPack } from './directory-walker.js';
export type { ExcludePredicate, WalkStats } from './directory-walker.js';
export {
  DEFAULT_ARCHIVE_BUFFER_SIZE,
  DirectoryArchiveStream,
  createDirectoryArchiveStream,
} from './directory-archive-stream.js';
export type { ArchiveStreamState, DirectoryArchiveStreamOptions, PullResult } from './directory-archive-stream.js';
