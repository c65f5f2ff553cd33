import path from 'path';
import { mergeConfig, type WebDAVConfig, type WebDAVConfigOverrides } from '../config/types.js';
import { Logger } from '../logging/logger.js';
import { LocalStorage } from '../storage/local-storage.js';
import type { StorageLayer } from '../storage/types.js';
import { DavError } from './errors.js';
import { handleCopy, handleMove } from './handlers/copy-move.js';
import type { HandlerContext, MethodHandler } from './handlers/context.js';
import { handleDelete } from './handlers/delete.js';
import { handleGet } from './handlers/get.js';
import { handleLock, handleUnlock } from './handlers/lock.js';
import { handleMkCol } from './handlers/mkcol.js';
import { handleOptions } from './handlers/options.js';
import { handlePropFind } from './handlers/propfind.js';
import { handlePut } from './handlers/put.js';
import {
  NotificationDispatcher,
  resolveAuthorizationHooks,
  type AuthorizationHooks,
  type NotificationHooks,
} from './hooks.js';
import { LockManager } from './lock-manager.js';
import { PropfindWalker } from './propfind.js';
import { SecurityGate } from './security.js';
import type { DavRequest, DavResponse } from './types.js';
import { WebDAVXML } from './xml.js';

export interface WebDAVServerOptions {
  /** Root of everything the server exposes. Fixed for the server's lifetime. */
  uploadDirectory: string;
  config?: WebDAVConfigOverrides;
  authorization?: Partial<AuthorizationHooks>;
  notifications?: Partial<NotificationHooks>;
  storage?: StorageLayer;
  logger?: Logger;
}

const HANDLERS: Record<string, MethodHandler> = {
  OPTIONS: handleOptions,
  GET: handleGet,
  HEAD: handleGet,
  PUT: handlePut,
  DELETE: handleDelete,
  MKCOL: handleMkCol,
  COPY: handleCopy,
  MOVE: handleMove,
  PROPFIND: handlePropFind,
  LOCK: handleLock,
  UNLOCK: handleUnlock,
};

/**
 * WebDAV protocol engine: turns parsed requests into responses for the files
 * below one upload directory. Independent of the HTTP server that feeds it.
 */
export class WebDAVServer {
  readonly uploadDirectory: string;
  readonly config: WebDAVConfig;
  private context: HandlerContext;

  constructor(options: WebDAVServerOptions) {
    if (!options.uploadDirectory) {
      throw new Error('An upload directory is required');
    }
    this.uploadDirectory = path.resolve(options.uploadDirectory);
    this.config = mergeConfig(options.config ?? {});

    const logger = options.logger ?? new Logger(this.config.logging);
    const storage = options.storage ?? new LocalStorage(logger);
    const xml = new WebDAVXML();
    const gate = new SecurityGate(storage, {
      uploadDirectory: this.uploadDirectory,
      allowedFileExtensions: this.config.storage.allowedFileExtensions,
      allowHiddenItems: this.config.storage.allowHiddenItems,
    });

    this.context = {
      config: this.config,
      storage,
      gate,
      xml,
      logger,
      locks: new LockManager(
        {
          defaultTimeout: this.config.webdav.defaultLockTimeout,
          maxTimeout: this.config.webdav.maxLockTimeout,
          sweepInterval: this.config.webdav.lockSweepInterval,
        },
        logger
      ),
      propfind: new PropfindWalker(storage, gate, xml, logger),
      hooks: resolveAuthorizationHooks(options.authorization),
      notifier: new NotificationDispatcher(options.notifications ?? {}, logger),
    };
  }

  /** Whether {@link handle} answers this method; others belong to the HTTP engine. */
  supports(method: string): boolean {
    return Object.hasOwn(HANDLERS, method.toUpperCase());
  }

  /**
   * Dispatch a request to its method handler. Resolves to null for methods
   * this server does not implement.
   */
  async handle(req: DavRequest): Promise<DavResponse | null> {
    const method = req.method.toUpperCase();
    const handler = Object.hasOwn(HANDLERS, method) ? HANDLERS[method] : undefined;
    if (!handler) {
      return null;
    }

    try {
      const response = await handler({ ...req, method }, this.context);
      this.context.logger.trace('responses', `📤 ${method} ${req.path} → ${response.status}`);
      return response;
    } catch (error) {
      return this.toErrorResponse(method, req.path, error);
    }
  }

  get locks(): LockManager {
    return this.context.locks;
  }

  /** Resolves once all pending notifications have been delivered. */
  idle(): Promise<void> {
    return this.context.notifier.idle();
  }

  destroy(): void {
    this.context.locks.destroy();
  }

  private toErrorResponse(method: string, requestPath: string, error: unknown): DavResponse {
    if (error instanceof DavError) {
      this.context.logger.debug(`${method} ${requestPath} → ${error.status} ${error.message}`);
      if (error.condition) {
        return {
          status: error.status,
          headers: { 'Content-Type': 'application/xml; charset=utf-8' },
          body: this.context.xml.createErrorBody(error.condition),
        };
      }
      return {
        status: error.status,
        headers: { 'Content-Type': 'text/plain; charset=utf-8' },
        body: error.message,
      };
    }

    this.context.logger.error(`${method} ${requestPath} failed`, error);
    return {
      status: 500,
      headers: { 'Content-Type': 'text/plain; charset=utf-8' },
      body: 'Internal Server Error',
    };
  }
}
