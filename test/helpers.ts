import { strict as assert } from 'node:assert';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { createSilentLogger } from '../src/logging/logger.js';
import { WebDAVServer, type WebDAVServerOptions } from '../src/webdav/server.js';
import type { DavHeaders, DavResponse } from '../src/webdav/types.js';

export interface RequestOptions {
  headers?: DavHeaders;
  body?: string;
  mountPath?: string;
}

export interface Fixture {
  /** Upload directory served by {@link server}, named `share`. */
  root: string;
  /** Where request bodies are spooled before a PUT. */
  spool: string;
  /** Scratch space next to the upload directory. */
  outside: string;
  server: WebDAVServer;
  request(method: string, requestPath: string, options?: RequestOptions): Promise<DavResponse>;
  put(requestPath: string, content: string, headers?: DavHeaders): Promise<DavResponse>;
  cleanup(): Promise<void>;
}

export type FixtureOptions = Omit<WebDAVServerOptions, 'uploadDirectory'>;

export async function createTempDirectory(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'folderdav-test-'));
}

export async function createFixture(options: FixtureOptions = {}): Promise<Fixture> {
  const base = await createTempDirectory();
  const root = path.join(base, 'share');
  const spool = path.join(base, 'spool');
  const outside = path.join(base, 'outside');
  await Promise.all([fs.mkdir(root), fs.mkdir(spool), fs.mkdir(outside)]);

  const server = new WebDAVServer({
    logger: createSilentLogger(),
    ...options,
    uploadDirectory: root,
    config: {
      ...options.config,
      webdav: { lockSweepInterval: 0, ...options.config?.webdav },
    },
  });

  async function request(method: string, requestPath: string, requestOptions: RequestOptions = {}): Promise<DavResponse> {
    const response = await server.handle({
      method,
      path: requestPath,
      mountPath: requestOptions.mountPath ?? '',
      headers: requestOptions.headers ?? {},
      body: requestOptions.body !== undefined ? Buffer.from(requestOptions.body) : undefined,
    });
    assert.ok(response, `${method} was not handled`);
    return response;
  }

  async function put(requestPath: string, content: string, headers: DavHeaders = {}): Promise<DavResponse> {
    const bodyFile = path.join(spool, `${uuidv4()}.upload`);
    await fs.writeFile(bodyFile, content);
    const response = await server.handle({ method: 'PUT', path: requestPath, mountPath: '', headers, bodyFile });
    assert.ok(response, 'PUT was not handled');
    return response;
  }

  async function cleanup(): Promise<void> {
    server.destroy();
    await server.idle();
    await fs.rm(base, { recursive: true, force: true });
  }

  return { root, spool, outside, server, request, put, cleanup };
}

export async function readBody(response: DavResponse): Promise<string> {
  if (response.body === undefined) {
    return '';
  }
  if (typeof response.body === 'string') {
    return response.body;
  }
  const chunks: Buffer[] = [];
  for await (const chunk of response.body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

/** Every file below a directory, keyed by its `/`-separated relative path. */
export async function readTree(directory: string, prefix = ''): Promise<Record<string, string>> {
  const tree: Record<string, string> = {};
  const entries = await fs.readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    const relative = `${prefix}/${entry.name}`;
    const absolute = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      tree[`${relative}/`] = '';
      Object.assign(tree, await readTree(absolute, relative));
    } else {
      tree[relative] = await fs.readFile(absolute, 'utf8');
    }
  }
  return tree;
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
}

export function countResponses(xml: string): number {
  return (xml.match(/<d:response>/g) ?? []).length;
}

export const PROPFIND_CONTENT_LENGTH = `<?xml version="1.0" encoding="utf-8"?>
<d:propfind xmlns:d="DAV:">
  <d:prop><d:getcontentlength/></d:prop>
</d:propfind>`;

export const LOCK_EXCLUSIVE = `<?xml version="1.0" encoding="utf-8"?>
<D:lockinfo xmlns:D="DAV:">
  <D:lockscope><D:exclusive/></D:lockscope>
  <D:locktype><D:write/></D:locktype>
  <D:owner><D:href>mailto:editor@example.com</D:href></D:owner>
</D:lockinfo>`;
