import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

/** A relative path resolved to somewhere outside the jail root. */
export type OutsideJailError = Readonly<{
  readonly _tag: 'OutsideJail';
  readonly path: string;
  readonly message: string;
}>;

export type NotFoundError = Readonly<{
  readonly _tag: 'NotFound';
  readonly path: string;
  readonly message: string;
}>;

/** The node exists but the requested action is not allowed on it. */
export type ForbiddenError = Readonly<{
  readonly _tag: 'Forbidden';
  readonly path: string;
  readonly action: 'download' | 'remove' | 'upload' | 'paste';
  readonly message: string;
}>;

export type InvalidFilenameError = Readonly<{
  readonly _tag: 'InvalidFilename';
  readonly filename: string;
  readonly message: string;
}>;

export type AlreadyExistsError = Readonly<{
  readonly _tag: 'AlreadyExists';
  readonly path: string;
  readonly message: string;
}>;

export type InvalidRequestError = Readonly<{
  readonly _tag: 'InvalidRequest';
  readonly message: string;
}>;

export type FilesystemFailedError = Readonly<{
  readonly _tag: 'Filesystem';
  readonly path: string;
  readonly code: string | undefined;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: string;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

/** Errors a browse operation can end with. */
export type BrowseError =
  | OutsideJailError
  | NotFoundError
  | ForbiddenError
  | InvalidFilenameError
  | AlreadyExistsError
  | InvalidRequestError
  | FilesystemFailedError;

export type AppError = BrowseError | ConfigInvalidError | StartupFailedError | UnexpectedError;

/**
 * Config that has been through `loadConfig`; callers can demand it
 * without re-validating.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
