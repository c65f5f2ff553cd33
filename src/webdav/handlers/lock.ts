import { BadRequestError, ConflictError, PreconditionFailedError } from '../errors.js';
import { extractIfToken, extractLockToken, parseDepth, parseTimeout } from '../headers.js';
import { encodeHref } from '../properties.js';
import type { DavRequest, DavResponse } from '../types.js';
import { emptyResponse, requireParentCollection, type HandlerContext } from './context.js';

/**
 * Grants or refreshes an advisory lock. See {@link LockManager} for why the
 * grant never depends on other clients' locks.
 */
export async function handleLock(req: DavRequest, ctx: HandlerContext): Promise<DavResponse> {
  const depth = parseDepth(req.headers['depth']);
  if (depth === '1') {
    throw new BadRequestError('LOCK only supports Depth 0 or infinity');
  }

  const target = await ctx.gate.authorize(req.path);
  const info = await ctx.storage.stat(target.absolute);
  if (info?.kind !== 'collection') {
    ctx.gate.checkFileExtension(target);
  }
  if (!info) {
    // Clients lock a name before their first PUT to it
    await requireParentCollection(ctx, target);
  }

  const body = req.body ? req.body.toString('utf8').trim() : '';
  const presentedToken = extractIfToken(req.headers);
  if (!body && !presentedToken) {
    throw new BadRequestError('Lock request body required');
  }
  ctx.logger.trace('xml', '🔒 LOCK request body', body);
  const lockInfo = body ? ctx.xml.parseLockRequest(body) : undefined;

  const lock = ctx.locks.lock(target.relative, {
    timeout: parseTimeout(req.headers['timeout']),
    presentedToken,
    owner: lockInfo?.owner,
    scope: lockInfo?.scope,
    depth,
  });

  const lockRoot = encodeHref(req.mountPath, target.relative, info?.kind === 'collection');
  return {
    status: 200,
    headers: {
      'Content-Type': 'application/xml; charset=utf-8',
      'Lock-Token': `<${lock.token}>`,
    },
    body: ctx.xml.createLockResponse(lock, lockRoot),
  };
}

export async function handleUnlock(req: DavRequest, ctx: HandlerContext): Promise<DavResponse> {
  const token = extractLockToken(req.headers);
  if (!token) {
    throw new BadRequestError('Lock-Token header required');
  }

  const target = await ctx.gate.authorize(req.path);
  const result = ctx.locks.unlock(target.relative, token);
  if (!result.ok) {
    if (result.reason === 'not-locked') {
      throw new ConflictError('Resource is not locked');
    }
    throw new PreconditionFailedError('Lock token does not match', 'lock-token-matches-request-uri');
  }

  return emptyResponse(204);
}
