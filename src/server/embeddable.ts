// WebDAV middleware factory and standalone server on top of Express

import express from 'express';
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { open, rm } from 'fs/promises';
import { STATUS_CODES, type IncomingHttpHeaders, type Server } from 'http';
import os from 'os';
import path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../logging/logger.js';
import { WebDAVServer, type WebDAVServerOptions } from '../webdav/server.js';
import type { DavHeaders, DavRequest, DavResponse } from '../webdav/types.js';

/**
 * Either an existing protocol engine, or the options to create one.
 */
export type WebDAVMiddlewareOptions = { server: WebDAVServer } | WebDAVServerOptions;

const BUFFERED_METHODS = ['PROPFIND', 'LOCK', 'MKCOL'];

/**
 * Create WebDAV middleware that can be used with app.use()
 *
 * @returns Array of Express middleware functions, ending with an error handler
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { createWebDAVMiddleware } from 'folderdav';
 *
 * const app = express();
 * app.use('/dav', ...createWebDAVMiddleware({
 *   uploadDirectory: '/srv/dav',
 *   config: { storage: { allowedFileExtensions: ['txt', 'md'] } },
 * }));
 * ```
 */
export function createWebDAVMiddleware(options: WebDAVMiddlewareOptions): Array<RequestHandler | ErrorRequestHandler> {
  const server = 'server' in options ? options.server : new WebDAVServer(options);
  const config = server.config;
  const logger = new Logger(config.logging);
  const temporaryDirectory = config.storage.temporaryDirectory ?? os.tmpdir();

  logger.info('WebDAV middleware created', {
    uploadDirectory: server.uploadDirectory,
    allowedFileExtensions: config.storage.allowedFileExtensions,
    allowHiddenItems: config.storage.allowHiddenItems,
  });

  const middleware: Array<RequestHandler | ErrorRequestHandler> = [];

  // Timeout middleware - uploads get longer than other requests
  middleware.push((req: Request, res: Response, next: NextFunction) => {
    const isUpload = req.method === 'PUT';
    const timeout = isUpload ? config.timeouts.upload : config.timeouts.request;

    req.setTimeout(timeout, () => {
      logger.warn(`⏱️ Request timeout (${timeout}ms)`, {
        method: req.method,
        path: req.path,
        isUpload,
      });
      if (!res.headersSent) {
        res.status(408).send('Request Timeout');
      }
    });

    next();
  });

  // Request logging middleware
  if (config.logging.requests) {
    middleware.push((req: Request, _res: Response, next: NextFunction) => {
      logger.trace('requests', `📥 ${req.method} ${req.originalUrl}`, {
        headers: req.headers,
        contentLength: req.headers['content-length'],
      });
      next();
    });
  }

  // XML bodies are small: buffer them. PUT bodies are streamed to disk by the handler below
  middleware.push((req: Request, res: Response, next: NextFunction) => {
    if (BUFFERED_METHODS.includes(req.method)) {
      return express.raw({
        type: () => true,
        limit: config.performance.maxRequestSize
      })(req, res, next);
    }
    next();
  });

  // Custom headers middleware
  if (Object.keys(config.response.customHeaders).length > 0) {
    middleware.push((_req: Request, res: Response, next: NextFunction) => {
      res.set(config.response.customHeaders);
      next();
    });
  }

  // Protocol handler
  middleware.push((req: Request, res: Response, next: NextFunction) => {
    if (!server.supports(req.method)) {
      next();
      return;
    }
    dispatch(server, temporaryDirectory, logger, req, res).catch(next);
  });

  // Body parser and adapter failures: status and a plain message only
  middleware.push((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = httpStatusOf(error);
    if (status >= 500) {
      logger.error(`${req.method} ${req.originalUrl} failed`, error);
    } else {
      logger.warn(`${req.method} ${req.originalUrl} rejected with ${status}`, error);
    }
    res.status(status).type('text/plain').send(status >= 500 ? 'Internal Server Error' : STATUS_CODES[status] ?? 'Bad Request');
  });

  logger.info('✅ WebDAV middleware ready');
  return middleware;
}

async function dispatch(
  server: WebDAVServer,
  temporaryDirectory: string,
  logger: Logger,
  req: Request,
  res: Response
): Promise<void> {
  const davRequest: DavRequest = {
    method: req.method,
    path: req.path,
    mountPath: req.baseUrl,
    headers: toDavHeaders(req.headers),
    body: Buffer.isBuffer(req.body) ? req.body : undefined,
  };

  if (davRequest.method === 'PUT') {
    davRequest.bodyFile = await spoolBody(req, temporaryDirectory);
  }

  const response = await server.handle(davRequest);
  if (!response) {
    res.status(405).end();
    return;
  }
  await sendResponse(response, res, logger);
}

function toDavHeaders(headers: IncomingHttpHeaders): DavHeaders {
  const result: DavHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

async function spoolBody(req: Request, directory: string): Promise<string> {
  const file = path.join(directory, `folderdav-${uuidv4()}.upload`);
  // Open first: a failed open must not destroy the request stream
  const output = await open(file, 'w');
  try {
    await pipeline(req, output.createWriteStream());
  } catch (error) {
    await rm(file, { force: true });
    throw error;
  }
  return file;
}

function httpStatusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null) {
    const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
    if (typeof status === 'number' && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}

async function sendResponse(response: DavResponse, res: Response, logger: Logger): Promise<void> {
  res.status(response.status);
  res.set(response.headers);

  if (response.body === undefined) {
    res.end();
    return;
  }
  if (typeof response.body === 'string') {
    res.send(response.body);
    return;
  }

  const body: Readable = response.body;
  try {
    await pipeline(body, res);
  } catch (error) {
    logger.warn('Response stream aborted', error);
    res.destroy();
  }
}

/**
 * Express app serving one upload directory, for standalone use and the CLI.
 */
export class StandaloneWebDAVServer {
  readonly dav: WebDAVServer;
  private app: express.Express;
  private server: Server | null = null;

  constructor(options: WebDAVServerOptions) {
    this.dav = new WebDAVServer(options);
    this.app = express();
    this.app.use('/', ...createWebDAVMiddleware({ server: this.dav }));
  }

  async start(): Promise<Server> {
    const { port, host } = this.dav.config.server;
    return new Promise((resolve, reject) => {
      const httpServer = this.app.listen(port, host, () => {
        resolve(httpServer);
      });
      httpServer.on('error', reject);
      this.server = httpServer;
    });
  }

  async stop(): Promise<void> {
    this.dav.destroy();
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }
}
