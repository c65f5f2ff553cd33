import { BadRequestError, MethodNotAllowedError } from '../errors.js';
import type { DavRequest, DavResponse } from '../types.js';
import { emptyResponse, requireApproval, requireParentCollection, type HandlerContext } from './context.js';

/**
 * Moves the body the HTTP engine spooled to disk over the destination.
 * The spooled file is removed whenever the upload does not go through.
 */
export async function handlePut(req: DavRequest, ctx: HandlerContext): Promise<DavResponse> {
  const temporaryPath = req.bodyFile;
  if (!temporaryPath) {
    throw new BadRequestError('Missing request body');
  }

  try {
    // Extension is known from the path alone: reject before touching the disk
    ctx.gate.checkFileExtension(ctx.gate.resolve(req.path));
    const target = await ctx.gate.authorize(req.path);

    const existing = await ctx.storage.stat(target.absolute);
    if (existing?.kind === 'collection') {
      throw new MethodNotAllowedError('PUT is not allowed on an existing collection');
    }
    await requireParentCollection(ctx, target);
    await requireApproval(ctx.hooks.shouldUploadFileAtPath(target.absolute, temporaryPath), 'Uploading file');

    await ctx.storage.commitUpload(temporaryPath, target.absolute);
    ctx.notifier.notify({ type: 'upload', path: target.absolute });
    ctx.logger.trace('filesystem', `📤 Uploaded ${target.relative}`);

    return emptyResponse(existing ? 204 : 201);
  } catch (error) {
    await ctx.storage.discard(temporaryPath).catch((discardError: unknown) => {
      ctx.logger.warn('Could not remove rejected upload', discardError);
    });
    throw error;
  }
}
