import type { Logger } from './types.js';
import { parseLogLevel } from './types.js';
import { createRootLogger } from './create-logger.js';

/**
 * Logger for code that runs before the container exists (config loading,
 * container initialization). Reads FILEPANE_LOG_LEVEL directly.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger(parseLogLevel(process.env['FILEPANE_LOG_LEVEL'], 'info'));
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
