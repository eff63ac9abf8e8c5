import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * Path problems surface as 404 so a client cannot probe what lies outside the
 * jail or what it may not touch.
 */
export function httpStatusFor(error: AppError): number {
  switch (error._tag) {
    case 'OutsideJail':
    case 'NotFound':
    case 'Forbidden':
      return 404;
    case 'InvalidFilename':
    case 'InvalidRequest':
      return 400;
    case 'AlreadyExists':
      return 409;
    case 'Filesystem':
    case 'ConfigInvalid':
    case 'StartupFailed':
    case 'Unexpected':
      return 500;
    default:
      return assertNever(error);
  }
}
