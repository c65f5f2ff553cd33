import { davComplianceFor, detectClientQuirk } from '../client-quirks.js';
import type { DavRequest, DavResponse } from '../types.js';
import { emptyResponse, type HandlerContext } from './context.js';

export const SUPPORTED_METHODS = [
  'OPTIONS', 'GET', 'HEAD', 'PUT', 'DELETE', 'MKCOL', 'COPY', 'MOVE', 'PROPFIND', 'LOCK', 'UNLOCK',
] as const;

export async function handleOptions(req: DavRequest, ctx: HandlerContext): Promise<DavResponse> {
  const quirk = detectClientQuirk(req.headers);
  ctx.logger.trace('requests', `🔧 OPTIONS capabilities for ${quirk} client`);

  return emptyResponse(200, {
    'DAV': davComplianceFor(quirk),
    'Allow': SUPPORTED_METHODS.join(', '),
    'MS-Author-Via': 'DAV',
    'Accept-Ranges': 'bytes',
    'Cache-Control': 'no-cache',
  });
}
