import { BadRequestError, PathRejectedError } from './errors.js';
import type { Depth, DavHeaders } from './types.js';

export function parseDepth(header: string | undefined, fallback: Depth = 'infinity'): Depth {
  if (header === undefined) return fallback;
  const value = header.trim().toLowerCase();
  if (value === '0' || value === '1' || value === 'infinity') {
    return value;
  }
  throw new BadRequestError(`Unsupported Depth header: ${header}`);
}

/** `Overwrite: F` disables overwriting; anything else keeps the default of T. */
export function parseOverwrite(header: string | undefined): boolean {
  return header?.trim().toUpperCase() !== 'F';
}

/**
 * Path of a `Destination` header below the mount point, still percent-encoded.
 * Accepts absolute URLs and absolute paths.
 */
export function parseDestination(header: string | undefined, mountPath: string): string {
  if (!header) {
    throw new BadRequestError('Destination header required');
  }

  let pathname: string;
  try {
    pathname = new URL(header, 'http://localhost').pathname;
  } catch {
    throw new BadRequestError('Invalid destination URL');
  }

  if (mountPath === '' || mountPath === '/') {
    return pathname;
  }
  if (pathname === mountPath) {
    return '/';
  }
  if (pathname.startsWith(mountPath + '/')) {
    return pathname.slice(mountPath.length);
  }
  throw new PathRejectedError('Destination outside of the WebDAV share');
}

/**
 * Seconds requested by a `Timeout` header (`Second-600`, `Infinite`, or a
 * comma separated list of both, first usable entry wins).
 */
export function parseTimeout(header: string | undefined): number | undefined {
  if (!header) return undefined;

  for (const entry of header.split(',')) {
    const value = entry.trim();
    if (/^infinite$/i.test(value)) {
      return Infinity;
    }
    const match = value.match(/^Second-(\d+)$/i);
    if (match && match[1]) {
      return parseInt(match[1], 10);
    }
  }
  return undefined;
}

/** First state token of an `If` header: `(<opaquelocktoken:…>)` or a tagged list. */
export function extractIfToken(headers: DavHeaders): string | null {
  const ifHeader = headers['if'];
  if (!ifHeader) return null;
  const match = ifHeader.match(/\(\s*(?:Not\s+)?<([^>]+)>/i);
  return match && match[1] ? match[1] : null;
}

export function extractLockToken(headers: DavHeaders): string | null {
  const lockTokenHeader = headers['lock-token'];
  if (!lockTokenHeader) return null;
  const match = lockTokenHeader.match(/<([^>]+)>/);
  if (match && match[1]) {
    return match[1];
  }
  const bare = lockTokenHeader.trim();
  return bare.length > 0 ? bare : null;
}

export type RangeResult = { start: number; end: number } | 'ignore' | 'unsatisfiable';

/**
 * Single byte range of a `Range` header. Malformed headers, other units and
 * multi-range requests are ignored, so the whole file is sent.
 */
export function parseRangeHeader(rangeHeader: string, fileSize: number): RangeResult {
  const match = /^bytes=(\d*)-(\d*)$/.exec(rangeHeader.trim());
  if (!match) return 'ignore';
  const [, first = '', last = ''] = match;
  if (first === '' && last === '') return 'ignore';

  if (first === '') {
    // Suffix range: "-500" (last 500 bytes)
    const suffix = parseInt(last, 10);
    if (suffix === 0 || fileSize === 0) return 'unsatisfiable';
    return { start: Math.max(0, fileSize - suffix), end: fileSize - 1 };
  }

  const start = parseInt(first, 10);
  const end = last === '' ? Infinity : parseInt(last, 10);
  if (end < start) return 'ignore';
  if (start >= fileSize) return 'unsatisfiable';
  return { start, end: Math.min(end, fileSize - 1) };
}
