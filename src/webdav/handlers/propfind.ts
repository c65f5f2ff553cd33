import { parseDepth } from '../headers.js';
import { assertFiniteDepth } from '../propfind.js';
import { toPropertyRequest } from '../properties.js';
import type { DavRequest, DavResponse } from '../types.js';
import type { HandlerContext } from './context.js';

export async function handlePropFind(req: DavRequest, ctx: HandlerContext): Promise<DavResponse> {
  const depth = parseDepth(req.headers['depth']);
  assertFiniteDepth(depth);

  const body = req.body ? req.body.toString('utf8').trim() : '';
  ctx.logger.trace('xml', '📋 PROPFIND request body', body);
  const request = toPropertyRequest(body ? ctx.xml.parsePropFind(body) : { allprop: true });

  return ctx.propfind.walk(req.path, req.mountPath, depth, request);
}
