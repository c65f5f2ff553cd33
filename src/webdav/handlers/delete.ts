import { BadRequestError, NotFoundError, PathRejectedError } from '../errors.js';
import { parseDepth } from '../headers.js';
import type { DavRequest, DavResponse } from '../types.js';
import { emptyResponse, requireApproval, type HandlerContext } from './context.js';

export async function handleDelete(req: DavRequest, ctx: HandlerContext): Promise<DavResponse> {
  if (parseDepth(req.headers['depth']) !== 'infinity') {
    throw new BadRequestError('DELETE only supports Depth: infinity');
  }

  if (ctx.gate.resolve(req.path).relative === '/') {
    throw new PathRejectedError('The root collection cannot be deleted');
  }
  const target = await ctx.gate.authorize(req.path);

  const info = await ctx.storage.stat(target.absolute);
  if (!info) {
    throw new NotFoundError(target.relative);
  }
  if (info.kind === 'file') {
    ctx.gate.checkFileExtension(target);
  }

  await requireApproval(ctx.hooks.shouldDeleteItemAtPath(target.absolute), 'Deleting item');

  await ctx.storage.remove(target.absolute);
  ctx.locks.release(target.relative);
  ctx.notifier.notify({ type: 'delete', path: target.absolute });

  return emptyResponse(204);
}
