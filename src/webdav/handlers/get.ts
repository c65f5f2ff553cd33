import path from 'path';
import type { ResourceInfo } from '../../storage/types.js';
import { MethodNotAllowedError, NotFoundError } from '../errors.js';
import { parseRangeHeader } from '../headers.js';
import { encodeHref, guessMimeType } from '../properties.js';
import type { AuthorizedPath, DavRequest, DavResponse } from '../types.js';
import { emptyResponse, type HandlerContext } from './context.js';

export function etagOf(info: ResourceInfo): string {
  return `"${info.size.toString(16)}-${info.lastModified.getTime().toString(16)}"`;
}

/** GET and HEAD. */
export async function handleGet(req: DavRequest, ctx: HandlerContext): Promise<DavResponse> {
  const isHead = req.method === 'HEAD';
  const target = await ctx.gate.authorize(req.path);
  const info = await ctx.storage.stat(target.absolute);
  if (!info) {
    throw new NotFoundError(target.relative);
  }

  if (info.kind === 'collection') {
    return directoryListing(req, ctx, target, isHead);
  }

  ctx.gate.checkFileExtension(target);

  const headers: Record<string, string> = {
    'Content-Type': guessMimeType(path.basename(target.absolute)),
    'Last-Modified': info.lastModified.toUTCString(),
    'ETag': etagOf(info),
    'Accept-Ranges': 'bytes',
  };

  let range: { start: number; end: number } | undefined;
  const rangeHeader = req.headers['range'];
  if (rangeHeader) {
    const parsed = parseRangeHeader(rangeHeader, info.size);
    if (parsed === 'unsatisfiable') {
      return emptyResponse(416, { 'Content-Range': `bytes */${info.size}`, 'Accept-Ranges': 'bytes' });
    }
    if (parsed !== 'ignore') {
      range = parsed;
      headers['Content-Range'] = `bytes ${parsed.start}-${parsed.end}/${info.size}`;
    }
  }
  headers['Content-Length'] = String(range ? range.end - range.start + 1 : info.size);
  const status = range ? 206 : 200;

  if (isHead) {
    return emptyResponse(status, headers);
  }

  const stream = ctx.storage.createReadStream(target.absolute, range);
  stream.once('end', () => {
    ctx.notifier.notify({ type: 'download', path: target.absolute });
  });
  return { status, headers, body: stream };
}

async function directoryListing(
  req: DavRequest,
  ctx: HandlerContext,
  target: AuthorizedPath,
  isHead: boolean
): Promise<DavResponse> {
  if (!ctx.config.response.enableDirectoryListing) {
    throw new MethodNotAllowedError('GET is not supported on collections');
  }

  const entries: { name: string; href: string }[] = [];
  for (const name of await ctx.storage.list(target.absolute)) {
    const absolute = path.join(target.absolute, name);
    const info = await ctx.storage.stat(absolute);
    if (info && ctx.gate.isVisibleChild(name, info.kind) && (await ctx.gate.isContainedChild(absolute))) {
      const childPath = path.posix.join(target.relative, name);
      entries.push({
        name: info.kind === 'collection' ? `${name}/` : name,
        href: encodeHref(req.mountPath, childPath, info.kind === 'collection'),
      });
    }
  }

  const html = generateDirectoryListing(target.relative, entries);
  const headers = { 'Content-Type': 'text/html; charset=utf-8' };
  return isHead ? emptyResponse(200, headers) : { status: 200, headers, body: html };
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function generateDirectoryListing(resourcePath: string, entries: { name: string; href: string }[]): string {
  const title = escapeHtml(`Directory listing for ${resourcePath}`);
  const rows = entries
    .map(entry => `<tr><td><a href="${escapeHtml(entry.href)}">${escapeHtml(entry.name)}</a></td></tr>`)
    .join('\n');

  return `
<!DOCTYPE html>
<html>
<head>
    <title>${title}</title>
    <style>
        body { font-family: Arial, sans-serif; margin: 40px; }
        table { border-collapse: collapse; width: 100%; }
        th, td { text-align: left; padding: 8px; border-bottom: 1px solid #ddd; }
        a { text-decoration: none; color: #0066cc; }
        a:hover { text-decoration: underline; }
    </style>
</head>
<body>
    <h1>${title}</h1>
    <table>
        <thead>
            <tr><th>Name</th></tr>
        </thead>
        <tbody>
            ${rows}
        </tbody>
    </table>
</body>
</html>`;
}
