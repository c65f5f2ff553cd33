import { errorCode } from '../../storage/local-storage.js';
import { MethodNotAllowedError, UnsupportedRequestError } from '../errors.js';
import type { DavRequest, DavResponse } from '../types.js';
import { emptyResponse, requireApproval, requireParentCollection, type HandlerContext } from './context.js';

export async function handleMkCol(req: DavRequest, ctx: HandlerContext): Promise<DavResponse> {
  if (req.body && req.body.length > 0) {
    throw new UnsupportedRequestError(415, 'MKCOL request bodies are not supported');
  }

  const target = await ctx.gate.authorize(req.path);
  if (target.relative === '/' || (await ctx.storage.stat(target.absolute))) {
    throw new MethodNotAllowedError('Resource already exists');
  }
  await requireParentCollection(ctx, target);
  await requireApproval(ctx.hooks.shouldCreateDirectoryAtPath(target.absolute), 'Creating directory');

  try {
    await ctx.storage.createDirectory(target.absolute);
  } catch (error) {
    // Lost a race against another request creating the same path
    if (errorCode(error) === 'EEXIST') {
      throw new MethodNotAllowedError('Resource already exists');
    }
    throw error;
  }
  ctx.notifier.notify({ type: 'create-directory', path: target.absolute });

  return emptyResponse(201);
}
