// DI Container exports
export { initializeContainer, container, resetContainer, isInitialized } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Configuration
export { loadConfig, createValidatedConfig, CONFIG_DEFAULTS } from './config/app-config.js';
export type { AppConfig, ConfigOverrides, ValidatedConfig } from './config/app-config.js';

// Errors
export * from './errors/index.js';
export {
  ArchiveError,
  ArchiveErrorCodes,
  CompressionError,
  FilesystemError,
  StreamAlreadyClosedError,
  StreamFailedError,
  ValidationError,
} from './core/error-handler.js';

// Core
export { toJailRoot, resolve, relativize, isWithin } from './utils/path-guard.js';
export type { JailRoot } from './utils/path-guard.js';
export { sanitizeFilename, chooseNonCollidingName } from './utils/filename.js';
export { formatSize } from './utils/format-size.js';
export * from './infrastructure/archive/index.js';

// Services
export { FileBrowserService } from './application/services/file-browser-service.js';
export type {
  DirectoryListing,
  FileNode,
  PasteMode,
  PasteOutcome,
  Playlist,
  PlaylistEntry,
} from './application/services/file-browser-service.js';
export { ExclusionPolicy } from './application/services/exclusion-policy.js';
export { HttpServer } from './infrastructure/http/HttpServer.js';
