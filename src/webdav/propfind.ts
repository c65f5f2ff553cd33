import path from 'path';
import type { Logger } from '../logging/logger.js';
import type { StorageLayer } from '../storage/types.js';
import { NotFoundError, UnsupportedRequestError } from './errors.js';
import {
  encodeHref,
  PropertyResponseBuilder,
  toResource,
  type PropertyRequest,
} from './properties.js';
import type { SecurityGate } from './security.js';
import type { Depth, DavResponse } from './types.js';
import type { WebDAVXML, XmlTree } from './xml.js';

export function assertFiniteDepth(depth: Depth): asserts depth is '0' | '1' {
  if (depth === 'infinity') {
    throw new UnsupportedRequestError(403, 'Depth infinity is not supported', 'propfind-finite-depth');
  }
}

/**
 * Enumerates a resource and, for Depth 1, its direct children. Recursive
 * listings are refused to bound response size and avoid symlink cycles.
 */
export class PropfindWalker {
  private builder: PropertyResponseBuilder;

  constructor(
    private storage: StorageLayer,
    private gate: SecurityGate,
    private xml: WebDAVXML,
    private logger: Logger
  ) {
    this.builder = new PropertyResponseBuilder(xml);
  }

  async walk(encodedPath: string, mountPath: string, depth: Depth, request: PropertyRequest): Promise<DavResponse> {
    assertFiniteDepth(depth);

    const target = await this.gate.authorize(encodedPath);
    const info = await this.storage.stat(target.absolute);
    if (!info) {
      throw new NotFoundError(target.relative);
    }
    if (info.kind === 'file') {
      this.gate.checkFileExtension(target);
    }

    const rootName = path.basename(this.gate.root);
    const responses: XmlTree[] = [];
    const resource = toResource(target.relative, info, rootName);
    responses.push(this.builder.buildResponse(resource, request, encodeHref(mountPath, resource.path, info.kind === 'collection')));

    if (depth === '1' && info.kind === 'collection') {
      const names = await this.storage.list(target.absolute);
      this.logger.trace('filesystem', `📂 ${target.relative} has ${names.length} entries`);

      for (const name of names) {
        const childAbsolute = path.join(target.absolute, name);
        const childInfo = await this.storage.stat(childAbsolute);
        // Entries removed since the listing, or dangling symlinks
        if (!childInfo || !this.gate.isVisibleChild(name, childInfo.kind)) {
          continue;
        }
        if (!(await this.gate.isContainedChild(childAbsolute))) {
          this.logger.trace('filesystem', `🔗 Skipping ${name}: links outside the upload directory`);
          continue;
        }
        const childPath = path.posix.join(target.relative, name);
        const child = toResource(childPath, childInfo, rootName);
        responses.push(this.builder.buildResponse(child, request, encodeHref(mountPath, childPath, childInfo.kind === 'collection')));
      }
    }

    const xml = this.xml.createMultiStatusResponse(responses);
    this.logger.trace('xml', '📤 PROPFIND response', xml);

    return {
      status: 207,
      headers: {
        'Content-Type': 'application/xml; charset=utf-8',
        'Cache-Control': 'no-cache',
      },
      body: xml,
    };
  }
}
