export type {
  AlreadyExistsError,
  AppError,
  BrowseError,
  ConfigIssue,
  ConfigInvalidError,
  FilesystemFailedError,
  ForbiddenError,
  InvalidFilenameError,
  InvalidRequestError,
  NotFoundError,
  OutsideJailError,
  StartupFailedError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
export { httpStatusFor } from './http-status.js';
