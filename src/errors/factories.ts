import type {
  AlreadyExistsError,
  AppError,
  ConfigInvalidError,
  ConfigIssue,
  FilesystemFailedError,
  ForbiddenError,
  InvalidFilenameError,
  InvalidRequestError,
  NotFoundError,
  OutsideJailError,
  StartupFailedError,
  UnexpectedError,
} from './app-error.js';

export const Err = {
  outsideJail: (path: string): OutsideJailError => ({
    _tag: 'OutsideJail',
    path,
    message: `Path is outside the served directory: ${path}`,
  }),

  notFound: (path: string): NotFoundError => ({
    _tag: 'NotFound',
    path,
    message: `No such file or directory: ${path}`,
  }),

  forbidden: (path: string, action: ForbiddenError['action']): ForbiddenError => ({
    _tag: 'Forbidden',
    path,
    action,
    message: `Cannot ${action} ${path || '/'}`,
  }),

  invalidFilename: (filename: string): InvalidFilenameError => ({
    _tag: 'InvalidFilename',
    filename,
    message: `Invalid filename: ${JSON.stringify(filename)}`,
  }),

  alreadyExists: (path: string): AlreadyExistsError => ({
    _tag: 'AlreadyExists',
    path,
    message: `Already exists: ${path}`,
  }),

  invalidRequest: (message: string): InvalidRequestError => ({
    _tag: 'InvalidRequest',
    message,
  }),

  filesystem: (path: string, code: string | undefined, message: string): FilesystemFailedError => ({
    _tag: 'Filesystem',
    path,
    code,
    message,
  }),

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  startupFailed: (phase: string, message: string, cause?: unknown): StartupFailedError => ({
    _tag: 'StartupFailed',
    phase,
    message,
    cause,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
