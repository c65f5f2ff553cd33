import type { Readable } from 'stream';

/** Lower-cased header names, as Node delivers them. */
export type DavHeaders = Record<string, string | undefined>;

/**
 * A parsed request, as handed over by the HTTP engine.
 */
export interface DavRequest {
  method: string;
  /** Percent-encoded path below the mount point, starting with `/`. */
  path: string;
  /** Where the server is mounted in the URL space (`''` for the site root). */
  mountPath: string;
  headers: DavHeaders;
  /** Buffered body of XML methods (PROPFIND, LOCK) and MKCOL. */
  body?: Buffer;
  /** PUT body, already fully spooled to disk by the HTTP engine. */
  bodyFile?: string;
}

export interface DavResponse {
  status: number;
  headers: Record<string, string>;
  body?: string | Readable;
}

export type Depth = '0' | '1' | 'infinity';

export type LockScope = 'exclusive' | 'shared';

export interface WebDAVLock {
  token: string;
  /** Resource path below the upload directory, `/`-separated. */
  path: string;
  owner: string;
  scope: LockScope;
  depth: '0' | 'infinity';
  /** Seconds granted on the last LOCK or refresh. */
  timeout: number;
  expiresAt: Date;
}

/** Validated location of a resource. */
export interface AuthorizedPath {
  /** Decoded path below the upload directory: `/` or `/dir/file.txt`. */
  relative: string;
  /** Absolute filesystem path inside the upload directory. */
  absolute: string;
}
