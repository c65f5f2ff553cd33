import { BadRequestError, NotFoundError, PathRejectedError, PreconditionFailedError } from '../errors.js';
import { parseDepth, parseDestination, parseOverwrite } from '../headers.js';
import type { DavRequest, DavResponse } from '../types.js';
import { emptyResponse, requireApproval, requireParentCollection, type HandlerContext } from './context.js';

export function handleCopy(req: DavRequest, ctx: HandlerContext): Promise<DavResponse> {
  return copyOrMove(req, ctx, false);
}

export function handleMove(req: DavRequest, ctx: HandlerContext): Promise<DavResponse> {
  return copyOrMove(req, ctx, true);
}

async function copyOrMove(req: DavRequest, ctx: HandlerContext, isMove: boolean): Promise<DavResponse> {
  const depth = parseDepth(req.headers['depth']);
  if (depth === '1' || (isMove && depth !== 'infinity')) {
    throw new BadRequestError(`Unsupported Depth header for ${req.method}`);
  }
  const destinationPath = parseDestination(req.headers['destination'], req.mountPath);
  const overwrite = parseOverwrite(req.headers['overwrite']);

  const source = await ctx.gate.authorize(req.path);
  const destination = await ctx.gate.authorize(destinationPath);
  if (
    source.relative === '/' ||
    destination.relative === '/' ||
    destination.relative === source.relative ||
    destination.relative.startsWith(source.relative + '/') ||
    source.relative.startsWith(destination.relative + '/')
  ) {
    throw new PathRejectedError('Source and destination must be distinct, non-nested and below the root');
  }

  const sourceInfo = await ctx.storage.stat(source.absolute);
  if (!sourceInfo) {
    throw new NotFoundError(source.relative);
  }
  if (sourceInfo.kind === 'file') {
    ctx.gate.checkFileExtension(source);
    ctx.gate.checkFileExtension(destination);
  }

  await requireParentCollection(ctx, destination);
  const existing = await ctx.storage.stat(destination.absolute);
  if (existing && !overwrite) {
    throw new PreconditionFailedError('Destination exists and Overwrite is F');
  }

  if (isMove) {
    await requireApproval(ctx.hooks.shouldMoveItem(source.absolute, destination.absolute), 'Moving item');
  } else {
    await requireApproval(ctx.hooks.shouldCopyItem(source.absolute, destination.absolute), 'Copying item');
  }

  if (existing) {
    await ctx.storage.remove(destination.absolute);
    ctx.locks.release(destination.relative);
  }

  if (isMove) {
    await ctx.storage.move(source.absolute, destination.absolute);
    ctx.locks.transfer(source.relative, destination.relative);
    ctx.notifier.notify({ type: 'move', fromPath: source.absolute, toPath: destination.absolute });
  } else {
    if (sourceInfo.kind === 'collection' && depth === '0') {
      await ctx.storage.createDirectory(destination.absolute);
    } else {
      await ctx.storage.copy(source.absolute, destination.absolute);
    }
    ctx.notifier.notify({ type: 'copy', fromPath: source.absolute, toPath: destination.absolute });
  }

  return emptyResponse(existing ? 204 : 201);
}
