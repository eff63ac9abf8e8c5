/**
 * Fields pino replaces with a censor before writing.
 *
 * Log call sites pass request fragments and error objects; credentials that
 * end up in them are censored.
 */
export const REDACTION_CONFIG = {
  paths: [
    'password',
    'secret',
    'token',
    '*.password',
    '*.secret',
    '*.token',
    'headers.authorization',
    'headers.Authorization',
    'headers.cookie',
    'headers.Cookie',
    'req.headers.authorization',
    'req.headers.cookie',
  ],
  censor: '[REDACTED]',
};
