import path from 'path';
import type { WebDAVConfig } from '../../config/types.js';
import type { Logger } from '../../logging/logger.js';
import type { StorageLayer } from '../../storage/types.js';
import { AuthorizationDeniedError, ConflictError } from '../errors.js';
import type { AuthorizationHooks, NotificationDispatcher } from '../hooks.js';
import type { LockManager } from '../lock-manager.js';
import type { PropfindWalker } from '../propfind.js';
import type { SecurityGate } from '../security.js';
import type { AuthorizedPath, DavRequest, DavResponse } from '../types.js';
import type { WebDAVXML } from '../xml.js';

/** Collaborators shared by every method handler of one server. */
export interface HandlerContext {
  config: WebDAVConfig;
  storage: StorageLayer;
  gate: SecurityGate;
  locks: LockManager;
  xml: WebDAVXML;
  propfind: PropfindWalker;
  hooks: AuthorizationHooks;
  notifier: NotificationDispatcher;
  logger: Logger;
}

export type MethodHandler = (req: DavRequest, ctx: HandlerContext) => Promise<DavResponse>;

export function emptyResponse(status: number, headers: Record<string, string> = {}): DavResponse {
  return { status, headers };
}

export async function requireParentCollection(ctx: HandlerContext, target: AuthorizedPath): Promise<void> {
  const parent = await ctx.storage.stat(path.dirname(target.absolute));
  if (!parent || parent.kind !== 'collection') {
    throw new ConflictError('Missing intermediate collection(s)');
  }
}

export async function requireApproval(decision: boolean | Promise<boolean>, operation: string): Promise<void> {
  if (!(await decision)) {
    throw new AuthorizationDeniedError(operation);
  }
}
