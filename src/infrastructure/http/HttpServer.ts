import express from 'express';
import type { Application, NextFunction, Request, RequestHandler, Response } from 'express';
import { createServer } from 'http';
import type { Server as HttpServerType } from 'http';
import os from 'os';
import fs from 'fs/promises';
import cors from 'cors';
import multer from 'multer';
import { z } from 'zod';
import type { ResultAsync } from 'neverthrow';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { AppError, BrowseError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import { httpStatusFor } from '../../errors/http-status.js';
import type { FileBrowserService, UploadedFile } from '../../application/services/file-browser-service.js';
import { parseSort } from '../../application/services/listing-sort.js';
import { ARCHIVE_EXTENSIONS } from '../archive/compression.js';
import { sendArchive } from './archive-response.js';

const MkdirBodySchema = z.object({
  name: z.string({ required_error: 'name is required' }),
});

const PasteBodySchema = z.object({
  mode: z.enum(['copy', 'cut']),
  items: z.array(z.string()).min(1, 'items must not be empty'),
});

/** Encodes each segment, keeping `/` separators. */
export function encodeUrlPath(urlPath: string): string {
  return urlPath.split('/').map(encodeURIComponent).join('/');
}

/**
 * HTTP surface of the file browser.
 *
 * Routes:
 * - GET  /                                   -> redirect to the start directory
 * - GET  /browse[/path]?sort=                -> directory listing (JSON)
 * - GET  /open/path                          -> file, inline
 * - GET  /download/file/path                 -> file, as attachment
 * - GET  /download/directory[/path].<ext>    -> streamed tar archive
 * - POST /remove/path                        -> remove file or directory
 * - POST /upload[/path]                      -> multipart upload
 * - POST /actions/mkdir[/path]               -> { name }
 * - POST /actions/paste[/path]               -> { mode, items }
 * - GET  /api/health                         -> liveness
 *
 * Wildcard params arrive URL-decoded from express. Path problems (outside
 * the jail, excluded, missing, not permitted) all answer 404.
 */
@singleton()
export class HttpServer {
  private readonly app: Application;
  private server: HttpServerType | null = null;
  private baseUrl = '';
  private port: number;
  private readonly logger: Logger;
  private readonly upload: RequestHandler;

  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Services.FileBrowser) private readonly browser: FileBrowserService,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('HttpServer');
    this.port = config.server.port;
    this.upload = multer({ dest: os.tmpdir() }).any();
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /** The express app, for mounting or in-process testing. */
  get application(): Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(
      cors({
        origin: '*',
        methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
      })
    );
    this.app.disable('x-powered-by');
    this.app.use(express.json({ limit: '1mb' }));

    this.app.use((req, res, next) => {
      const start = Date.now();
      res.on('finish', () => {
        this.logger.info(
          { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - start },
          'request'
        );
      });
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/api/health', (_req, res) => {
      res.json({ status: 'ok' });
    });

    this.app.get('/', (_req, res) => {
      const start = this.browser.startPath;
      res.redirect(start === '' ? '/browse' : `/browse/${encodeUrlPath(start)}`);
    });

    this.app.get(
      ['/browse', '/browse/*'],
      this.route(async (req, res) => {
        const sort = parseSort(typeof req.query['sort'] === 'string' ? req.query['sort'] : undefined);
        await this.respond(res, this.browser.list(wildcard(req), sort), (listing) => {
          res.json(listing);
        });
      })
    );

    this.app.get(
      '/open/*',
      this.route(async (req, res, next) => {
        await this.respond(res, this.browser.resolveFile(wildcard(req)), (file) => {
          res.setHeader('Content-Disposition', 'inline');
          res.sendFile(file.absolutePath, { dotfiles: 'allow', headers: { 'Content-Type': file.mimetype } }, (e) => {
            if (e) this.fileSendFailed(e, res, next);
          });
        });
      })
    );

    this.app.get(
      '/download/file/*',
      this.route(async (req, res, next) => {
        await this.respond(res, this.browser.resolveFile(wildcard(req)), (file) => {
          res.download(file.absolutePath, file.name, { dotfiles: 'allow' }, (e) => {
            if (e) this.fileSendFailed(e, res, next);
          });
        });
      })
    );

    this.app.get(
      '/download/directory*',
      this.route(async (req, res) => {
        const urlPath = this.archiveUrlPath(wildcard(req));
        if (urlPath === null) {
          this.sendError(res, Err.notFound(req.path));
          return;
        }
        const opened = await this.browser.openArchive(urlPath);
        if (opened.isErr()) {
          this.sendError(res, opened.error);
          return;
        }
        await sendArchive(opened.value, res, this.logger);
      })
    );

    this.app.get(
      ['/play', '/play/*'],
      this.route(async (req, res) => {
        await this.respond(res, this.browser.playlist(wildcard(req)), (playlist) => {
          res.json(playlist);
        });
      })
    );

    this.app.post(
      '/remove/*',
      this.route(async (req, res) => {
        const urlPath = wildcard(req);
        await this.respond(res, this.browser.remove(urlPath), (parent) => {
          res.json({ removed: urlPath, parent });
        });
      })
    );

    this.app.post(
      ['/upload', '/upload/*'],
      this.upload,
      this.route(async (req, res) => {
        const files = uploadedFiles(req);
        try {
          await this.respond(res, this.browser.upload(wildcard(req), files), (stored) => {
            res.status(201).json({ stored });
          });
        } finally {
          await this.discardTempFiles(files);
        }
      })
    );

    this.app.post(
      ['/actions/mkdir', '/actions/mkdir/*'],
      this.route(async (req, res) => {
        const body = MkdirBodySchema.safeParse(req.body);
        if (!body.success) {
          this.sendError(res, Err.invalidRequest(zodMessage(body.error)));
          return;
        }
        await this.respond(res, this.browser.createDirectory(wildcard(req), body.data.name), (created) => {
          res.status(201).json({ created });
        });
      })
    );

    this.app.post(
      ['/actions/paste', '/actions/paste/*'],
      this.route(async (req, res) => {
        const body = PasteBodySchema.safeParse(req.body);
        if (!body.success) {
          this.sendError(res, Err.invalidRequest(zodMessage(body.error)));
          return;
        }
        await this.respond(res, this.browser.paste(wildcard(req), body.data.mode, body.data.items), (outcome) => {
          res.json({
            pasted: outcome.pasted,
            failures: outcome.failures.map((f) => ({ path: f.urlPath, error: f.error._tag, message: f.error.message })),
          });
        });
      })
    );

    this.app.use((req, res) => {
      this.sendError(res, Err.notFound(req.path));
    });

    this.app.use((e: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(e);
        return;
      }
      if (e instanceof multer.MulterError) {
        this.sendError(res, Err.invalidRequest(e.message));
        return;
      }
      if (e instanceof SyntaxError) {
        this.sendError(res, Err.invalidRequest('Malformed JSON body'));
        return;
      }
      this.sendError(res, Err.unexpected('Unhandled request error', e));
    });
  }

  /**
   * Maps the `.<ext>` suffix of a directory download to a request path, or
   * `null` when it does not name the configured archive format.
   */
  private archiveUrlPath(raw: string): string | null {
    const suffix = `.${ARCHIVE_EXTENSIONS[this.config.archive.compression]}`;
    if (!raw.endsWith(suffix)) return null;
    const rest = raw.slice(0, raw.length - suffix.length);
    if (rest === '') return '';
    return rest.startsWith('/') ? rest.slice(1) : null;
  }

  private route(handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler {
    return (req, res, next) => {
      handler(req, res, next).catch(next);
    };
  }

  private async respond<T>(res: Response, pending: ResultAsync<T, BrowseError>, onOk: (value: T) => void): Promise<void> {
    const result = await pending;
    if (result.isOk()) {
      onOk(result.value);
    } else {
      this.sendError(res, result.error);
    }
  }

  private sendError(res: Response, error: AppError): void {
    const status = httpStatusFor(error);
    if (status >= 500) {
      this.logger.error({ error }, 'request failed');
      res.status(status).json({ error: error._tag, message: 'Internal server error' });
      return;
    }
    res.status(status).json({ error: error._tag, message: error.message });
  }

  private fileSendFailed(e: Error, res: Response, next: NextFunction): void {
    if (res.headersSent) {
      this.logger.warn({ err: e }, 'file transfer interrupted');
      return;
    }
    next(e);
  }

  private async discardTempFiles(files: readonly UploadedFile[]): Promise<void> {
    for (const file of files) {
      await fs.rm(file.tempPath, { force: true }).catch((e: unknown) => {
        this.logger.warn({ err: e, path: file.tempPath }, 'could not remove upload spool file');
      });
    }
  }

  /**
   * Start listening. Resolves to the base URL (port 0 picks a free one).
   */
  async start(): Promise<string> {
    if (this.server) return this.baseUrl;

    const server = createServer(this.app);
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.config.server.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = server.address();
    if (address !== null && typeof address === 'object') {
      this.port = address.port;
    }
    this.server = server;
    const host = this.config.server.host.includes(':') ? `[${this.config.server.host}]` : this.config.server.host;
    this.baseUrl = `http://${host}:${this.port}`;
    this.logger.info({ url: this.baseUrl, base: this.config.paths.base }, 'serving');
    return this.baseUrl;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve) => {
      // Idle keep-alive sockets would hold close() open.
      const closeTimeout = setTimeout(() => {
        this.logger.warn('server close timeout after 5s, dropping connections');
        server.closeAllConnections();
        resolve();
      }, 5000);

      server.close(() => {
        clearTimeout(closeTimeout);
        this.logger.info('server stopped');
        resolve();
      });
      server.closeIdleConnections();
    });
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  getPort(): number {
    return this.port;
  }
}

function wildcard(req: Request): string {
  return req.params[0] ?? '';
}

function uploadedFiles(req: Request): UploadedFile[] {
  const files = req.files;
  const list = Array.isArray(files) ? files : files ? Object.values(files).flat() : [];
  return list.map((f) => ({ originalName: f.originalname, tempPath: f.path }));
}

function zodMessage(error: z.ZodError): string {
  return error.errors.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}
