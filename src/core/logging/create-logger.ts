import pino from 'pino';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { AppConfig } from '../../config/app-config.js';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Root pino logger: JSON lines on stderr, ISO timestamps, errors serialized
 * with their stack. Stdout stays free for the CLI's human-facing output.
 */
export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.App) config: AppConfig) {
    this._root = createRootLogger(config.logLevel);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
