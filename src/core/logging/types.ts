/**
 * The logging surface components depend on.
 *
 * Follows pino's data-first idiom and is satisfied structurally by a pino
 * `Logger`, so production code passes pino loggers straight through while
 * tests hand in a fake without casting:
 *
 *   logger.info({ path }, 'archive started');
 *   logger.error({ err }, 'archive failed');
 */
export interface LogFn {
  (obj: object, msg?: string): void;
  (msg: string): void;
}

export interface Logger {
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  child(bindings: Record<string, unknown>): Logger;
}

export interface ILoggerFactory {
  /** Child logger tagged with `component`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  const wanted = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? fallback;
}
