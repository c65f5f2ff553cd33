import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { BadRequestError } from './errors.js';
import type { LockScope, WebDAVLock } from './types.js';

export const DAV_NAMESPACE = 'DAV:';
export const APACHE_PROPS_NAMESPACE = 'http://apache.org/dav/props/';

/** Input of the serializer: element name → text, child tree, or repeated children. */
export type XmlValue = string | number | XmlTree | XmlTree[];
export interface XmlTree {
  [key: string]: XmlValue;
}

export interface QualifiedName {
  namespace: string;
  name: string;
}

export type PropFindBody = { allprop: true } | { allprop: false; props: QualifiedName[] };

export interface LockInfo {
  owner: string;
  scope: LockScope;
}

type NamespaceScope = ReadonlyMap<string, string>;

interface XmlElement {
  name: string;
  namespace: string;
  value: unknown;
  scope: NamespaceScope;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * XML reader and writer for the small WebDAV vocabulary. The reader is
 * tolerant: prefixes are resolved when declared, and elements are matched by
 * local name so clients that omit or misdeclare the DAV: namespace still work.
 */
export class WebDAVXML {
  private parser: XMLParser;
  private builder: XMLBuilder;

  constructor() {
    this.parser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: '@_',
      textNodeName: '#text',
      removeNSPrefix: false,
      parseTagValue: false,
      parseAttributeValue: false,
      trimValues: true
    });

    this.builder = new XMLBuilder({
      ignoreAttributes: false,
      attributeNamePrefix: '@_',
      textNodeName: '#text',
      format: true,
      suppressEmptyNode: true,
      suppressBooleanAttributes: false
    });
  }

  parse(xml: string): unknown {
    try {
      return this.parser.parse(xml);
    } catch {
      throw new BadRequestError('Malformed XML body');
    }
  }

  build(tree: XmlTree): string {
    const xmlDeclaration = '<?xml version="1.0" encoding="utf-8"?>\n';
    return xmlDeclaration + this.builder.build(tree);
  }

  createMultiStatusResponse(responses: XmlTree[]): string {
    const multiStatus: XmlTree = {
      'd:multistatus': {
        '@_xmlns:d': DAV_NAMESPACE,
        '@_xmlns:a': APACHE_PROPS_NAMESPACE,
        'd:response': responses
      }
    };
    return this.build(multiStatus);
  }

  createPropStat(props: XmlTree, status: string): XmlTree {
    return {
      'd:prop': props,
      'd:status': `HTTP/1.1 ${status}`
    };
  }

  createPropFindResponse(href: string, propstats: XmlTree[]): XmlTree {
    return {
      'd:href': href,
      'd:propstat': propstats
    };
  }

  /** `<d:error>` body naming a failed precondition or postcondition. */
  createErrorBody(condition: string): string {
    return this.build({
      'd:error': {
        '@_xmlns:d': DAV_NAMESPACE,
        [`d:${condition}`]: {}
      }
    });
  }

  createLockResponse(lock: WebDAVLock, lockRoot: string): string {
    return this.build({
      'd:prop': {
        '@_xmlns:d': DAV_NAMESPACE,
        'd:lockdiscovery': {
          'd:activelock': {
            'd:locktype': { 'd:write': {} },
            'd:lockscope': { [`d:${lock.scope}`]: {} },
            'd:depth': lock.depth,
            'd:owner': lock.owner,
            'd:timeout': `Second-${lock.timeout}`,
            'd:locktoken': { 'd:href': lock.token },
            'd:lockroot': { 'd:href': lockRoot }
          }
        }
      }
    });
  }

  parsePropFind(xml: string): PropFindBody {
    const propfind = this.findRoot(xml, 'propfind');
    if (!propfind) {
      return { allprop: true };
    }

    const children = this.childElements(propfind);
    if (children.some(child => child.name === 'allprop' || child.name === 'propname')) {
      return { allprop: true };
    }

    const prop = children.find(child => child.name === 'prop');
    if (!prop) {
      return { allprop: true };
    }

    const props = this.childElements(prop).map(({ namespace, name }) => ({ namespace, name }));
    return { allprop: false, props };
  }

  parseLockRequest(xml: string): LockInfo {
    const lockinfo = this.findRoot(xml, 'lockinfo');
    if (!lockinfo) {
      throw new BadRequestError('Invalid lock request');
    }

    const children = this.childElements(lockinfo);
    const lockscope = children.find(child => child.name === 'lockscope');
    const locktype = children.find(child => child.name === 'locktype');
    if (locktype && !this.childElements(locktype).some(child => child.name === 'write')) {
      throw new BadRequestError('Only write locks are supported');
    }

    let scope: LockScope = 'exclusive';
    if (lockscope && this.childElements(lockscope).some(child => child.name === 'shared')) {
      scope = 'shared';
    }

    // <d:owner> is free-form: plain text or an <d:href>
    const owner = children.find(child => child.name === 'owner');
    let ownerValue = 'unknown';
    if (owner) {
      const href = this.childElements(owner).find(child => child.name === 'href');
      ownerValue = this.textOf(href ? href.value : owner.value) || 'unknown';
    }

    return { owner: ownerValue, scope };
  }

  private findRoot(xml: string, name: string): XmlElement | undefined {
    const document = this.parse(xml);
    return this.elementsOf(document, new Map()).find(element => element.name === name);
  }

  private childElements(element: XmlElement): XmlElement[] {
    return this.elementsOf(element.value, element.scope);
  }

  private elementsOf(value: unknown, parentScope: NamespaceScope): XmlElement[] {
    if (!isRecord(value)) {
      return [];
    }

    const elements: XmlElement[] = [];
    for (const [key, child] of Object.entries(value)) {
      if (key.startsWith('@_') || key.startsWith('#') || key.startsWith('?')) {
        continue;
      }
      const separator = key.indexOf(':');
      const prefix = separator === -1 ? '' : key.slice(0, separator);
      const name = separator === -1 ? key : key.slice(separator + 1);

      for (const occurrence of Array.isArray(child) ? child : [child]) {
        const scope = this.extendScope(parentScope, occurrence);
        elements.push({ name, namespace: scope.get(prefix) ?? '', value: occurrence, scope });
      }
    }
    return elements;
  }

  private extendScope(parentScope: NamespaceScope, value: unknown): NamespaceScope {
    if (!isRecord(value)) {
      return parentScope;
    }
    let scope: Map<string, string> | null = null;
    for (const [key, uri] of Object.entries(value)) {
      if (typeof uri !== 'string') continue;
      if (key === '@_xmlns' || key.startsWith('@_xmlns:')) {
        scope ??= new Map(parentScope);
        scope.set(key === '@_xmlns' ? '' : key.slice('@_xmlns:'.length), uri);
      }
    }
    return scope ?? parentScope;
  }

  private textOf(value: unknown): string {
    if (typeof value === 'string') {
      return value;
    }
    if (isRecord(value) && typeof value['#text'] === 'string') {
      return value['#text'];
    }
    return '';
  }
}
