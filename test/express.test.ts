import { after, before, describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import express from 'express';
import fs from 'fs/promises';
import type { Server } from 'http';
import path from 'path';
import { createSilentLogger } from '../src/logging/logger.js';
import { createWebDAVMiddleware, StandaloneWebDAVServer } from '../src/server/embeddable.js';
import { WebDAVServer } from '../src/webdav/server.js';
import { createTempDirectory, PROPFIND_CONTENT_LENGTH } from './helpers.js';

function urlOf(server: Server): string {
  const address = server.address();
  assert.ok(address && typeof address === 'object', 'server is not listening on a TCP port');
  return `http://127.0.0.1:${address.port}`;
}

describe('Express middleware', () => {
  let base: string;
  let root: string;
  let spool: string;
  let dav: WebDAVServer;
  let server: Server;
  let url: string;

  before(async () => {
    base = await createTempDirectory();
    root = path.join(base, 'share');
    spool = path.join(base, 'spool');
    await fs.mkdir(root);
    await fs.mkdir(spool);

    dav = new WebDAVServer({
      uploadDirectory: root,
      logger: createSilentLogger(),
      config: {
        logging: { enabled: false },
        storage: { temporaryDirectory: spool },
        webdav: { lockSweepInterval: 0 },
      },
    });

    const app = express();
    app.use('/dav', ...createWebDAVMiddleware({ server: dav }));
    app.use((_req, res) => {
      res.status(501).send('not handled');
    });

    server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
      listening.on('error', reject);
    });
    url = `${urlOf(server)}/dav`;
  });

  after(async () => {
    dav.destroy();
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    await fs.rm(base, { recursive: true, force: true });
  });

  it('stores uploaded bodies', async () => {
    const response = await fetch(`${url}/a.txt`, { method: 'PUT', body: 'hello' });
    assert.equal(response.status, 201);
    assert.equal(await fs.readFile(path.join(root, 'a.txt'), 'utf8'), 'hello');
    assert.deepStrictEqual(await fs.readdir(spool), []);
  });

  it('answers PROPFIND with hrefs below the mount path', async () => {
    const response = await fetch(`${url}/a.txt`, {
      method: 'PROPFIND',
      headers: { depth: '0', 'content-type': 'application/xml' },
      body: PROPFIND_CONTENT_LENGTH,
    });
    assert.equal(response.status, 207);
    const xml = await response.text();
    assert.ok(xml.includes('<d:href>/dav/a.txt</d:href>'));
    assert.ok(xml.includes('<d:getcontentlength>5</d:getcontentlength>'));
  });

  it('streams downloads and ranges', async () => {
    const full = await fetch(`${url}/a.txt`);
    assert.equal(full.status, 200);
    assert.ok(full.headers.get('content-type')?.startsWith('text/plain'));
    assert.equal(await full.text(), 'hello');

    const partial = await fetch(`${url}/a.txt`, { headers: { range: 'bytes=1-3' } });
    assert.equal(partial.status, 206);
    assert.equal(await partial.text(), 'ell');
  });

  it('moves files into new collections', async () => {
    assert.equal((await fetch(`${url}/sub`, { method: 'MKCOL' })).status, 201);
    const response = await fetch(`${url}/a.txt`, { method: 'MOVE', headers: { destination: `${url}/sub/a.txt` } });
    assert.equal(response.status, 201);
    assert.equal(await fs.readFile(path.join(root, 'sub', 'a.txt'), 'utf8'), 'hello');
  });

  it('advertises its capabilities', async () => {
    const response = await fetch(`${url}/`, { method: 'OPTIONS' });
    assert.equal(response.status, 200);
    assert.equal(response.headers.get('dav'), '1');
    assert.equal(response.headers.get('ms-author-via'), 'DAV');
  });

  it('reports protocol errors with their status', async () => {
    const response = await fetch(`${url}/`, { method: 'PROPFIND', headers: { depth: 'infinity' } });
    assert.equal(response.status, 403);
    assert.ok((await response.text()).includes('<d:propfind-finite-depth/>'));

    const hidden = await fetch(`${url}/.env`, { method: 'PUT', body: 'SECRET=test-secret' });
    assert.equal(hidden.status, 403);
    assert.deepStrictEqual(await fs.readdir(spool), []);
  });

  it('passes other methods on to the next handler', async () => {
    const response = await fetch(`${url}/sub`, { method: 'PROPPATCH' });
    assert.equal(response.status, 501);
    assert.equal(await response.text(), 'not handled');
  });
});

describe('Express middleware failures', () => {
  let base: string;
  let root: string;
  let server: Server;
  let url: string;

  before(async () => {
    base = await createTempDirectory();
    root = path.join(base, 'share');
    await fs.mkdir(root);

    const app = express();
    app.use('/dav', ...createWebDAVMiddleware({
      uploadDirectory: root,
      logger: createSilentLogger(),
      config: {
        logging: { enabled: false },
        storage: { temporaryDirectory: path.join(base, 'missing-spool') },
        performance: { maxRequestSize: '1kb' },
        webdav: { lockSweepInterval: 0 },
      },
    }));

    server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
      listening.on('error', reject);
    });
    url = `${urlOf(server)}/dav`;
  });

  after(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    await fs.rm(base, { recursive: true, force: true });
  });

  it('answers oversized XML bodies with a plain 413', async () => {
    const response = await fetch(`${url}/`, {
      method: 'PROPFIND',
      headers: { depth: '0', 'content-type': 'application/xml' },
      body: `<d:propfind xmlns:d="DAV:"><!--${'x'.repeat(2048)}--><d:allprop/></d:propfind>`,
    });
    assert.equal(response.status, 413);
    assert.equal(response.headers.get('content-type'), 'text/plain; charset=utf-8');
    assert.equal(await response.text(), 'Payload Too Large');
  });

  it('hides spooling failures behind a plain 500', async () => {
    const response = await fetch(`${url}/a.txt`, { method: 'PUT', body: 'hello' });
    assert.equal(response.status, 500);
    assert.equal(await response.text(), 'Internal Server Error');
  });
});

describe('StandaloneWebDAVServer', () => {
  it('serves the upload directory at the site root', async () => {
    const base = await createTempDirectory();
    const standalone = new StandaloneWebDAVServer({
      uploadDirectory: base,
      logger: createSilentLogger(),
      config: { server: { port: 0, host: '127.0.0.1' }, logging: { enabled: false } },
    });
    try {
      const server = await standalone.start();
      const response = await fetch(`${urlOf(server)}/`, { method: 'PROPFIND', headers: { depth: '0' } });
      assert.equal(response.status, 207);
      assert.ok((await response.text()).includes('<d:href>/</d:href>'));
    } finally {
      await standalone.stop();
      await fs.rm(base, { recursive: true, force: true });
    }
  });
});
