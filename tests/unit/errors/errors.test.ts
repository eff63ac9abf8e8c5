import { describe, it, expect } from 'vitest';
import { Err, formatAppError, httpStatusFor } from '../../../src/errors/index.js';

describe('httpStatusFor', () => {
  it('hides path problems behind 404', () => {
    expect(httpStatusFor(Err.outsideJail('../x'))).toBe(404);
    expect(httpStatusFor(Err.notFound('a'))).toBe(404);
    expect(httpStatusFor(Err.forbidden('a', 'remove'))).toBe(404);
  });

  it('maps client mistakes to 4xx', () => {
    expect(httpStatusFor(Err.invalidFilename('..'))).toBe(400);
    expect(httpStatusFor(Err.invalidRequest('bad'))).toBe(400);
    expect(httpStatusFor(Err.alreadyExists('a'))).toBe(409);
  });

  it('maps everything else to 500', () => {
    expect(httpStatusFor(Err.filesystem('a', 'EACCES', 'denied'))).toBe(500);
    expect(httpStatusFor(Err.unexpected('boom', new Error('x')))).toBe(500);
  });
});

describe('formatAppError', () => {
  it('lists every config issue', () => {
    const text = formatAppError(
      Err.configInvalid([
        { path: 'port', message: 'Port must be <= 65535' },
        { path: 'upload', message: '/up is not inside /srv' },
      ])
    );
    expect(text).toBe('Invalid configuration\n\n  - port: Port must be <= 65535\n  - upload: /up is not inside /srv');
  });

  it('appends the errno code of filesystem failures', () => {
    expect(formatAppError(Err.filesystem('a', 'EACCES', 'Permission denied'))).toBe('Permission denied (EACCES)');
  });

  it('renders causes', () => {
    expect(formatAppError(Err.startupFailed('listen', 'port busy', new Error('EADDRINUSE')))).toBe(
      'Startup failed during listen: port busy\nCause: Error: EADDRINUSE'
    );
  });

  it('describes forbidden actions on the root as /', () => {
    expect(formatAppError(Err.forbidden('', 'upload'))).toBe('Cannot upload /');
  });
});
