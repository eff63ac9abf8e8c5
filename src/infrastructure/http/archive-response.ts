import { once } from 'events';
import type { Response } from 'express';
import type { DirectoryArchiveStream } from '../archive/directory-archive-stream.js';
import { StreamAlreadyClosedError, isAbortError } from '../../core/error-handler.js';
import type { Logger } from '../../core/logging/index.js';

/**
 * Pumps an archive into an HTTP response.
 *
 * Status and headers go out with the first chunk, so a failure before any
 * byte is written still becomes a 500. Afterwards the only way to signal a
 * broken archive is to drop the connection. A client disconnect closes the
 * archive, which stops the producer.
 */
export async function sendArchive(archive: DirectoryArchiveStream, res: Response, logger: Logger): Promise<void> {
  const disconnected = new AbortController();
  const onClose = (): void => {
    if (res.writableFinished) return;
    disconnected.abort();
    logger.info({ archive: archive.name }, 'client disconnected during download');
    // Wakes a pull waiting on the producer; the same promise is awaited in `finally`.
    void archive.close();
  };
  res.once('close', onClose);

  res.status(200);
  res.attachment(archive.name);
  res.setHeader('Content-Type', archive.contentType);

  let bytesSent = 0;
  try {
    while (!disconnected.signal.aborted) {
      const next = await archive.pull();
      if (next.kind === 'end') break;
      bytesSent += next.bytes.length;
      if (!res.write(next.bytes)) {
        await once(res, 'drain', { signal: disconnected.signal });
      }
    }
    if (!disconnected.signal.aborted) {
      res.end();
      logger.debug({ archive: archive.name, bytes: bytesSent }, 'archive sent');
    }
  } catch (e) {
    if (isAbortError(e) || e instanceof StreamAlreadyClosedError) {
      logger.debug({ archive: archive.name, bytes: bytesSent }, 'archive download aborted');
    } else if (!res.headersSent) {
      logger.error({ err: e, archive: archive.name }, 'archive failed before first byte');
      res.removeHeader('Content-Disposition');
      res.status(500).json({ error: 'Unexpected', message: 'Archive could not be created' });
    } else {
      logger.error({ err: e, archive: archive.name, bytes: bytesSent }, 'archive failed mid-stream');
      res.destroy();
    }
  } finally {
    res.off('close', onClose);
    await archive.close();
  }
}
