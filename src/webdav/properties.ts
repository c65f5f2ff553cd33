import path from 'path';
import mime from 'mime-types';
import type { ResourceInfo } from '../storage/types.js';
import {
  APACHE_PROPS_NAMESPACE,
  DAV_NAMESPACE,
  type PropFindBody,
  type QualifiedName,
  type WebDAVXML,
  type XmlTree,
} from './xml.js';

export const DavProperty = {
  ResourceType: 1 << 0,
  CreationDate: 1 << 1,
  LastModified: 1 << 2,
  ContentLength: 1 << 3,
  ContentType: 1 << 4,
  DisplayName: 1 << 5,
  Permissions: 1 << 6,
} as const;

/** Bitmask of {@link DavProperty} flags. */
export type PropertySet = number;

export const AllProperties: PropertySet = Object.values(DavProperty).reduce((mask, flag) => mask | flag, 0);

const PROPERTY_ELEMENTS: Record<string, { flag: number; namespace: string }> = {
  resourcetype: { flag: DavProperty.ResourceType, namespace: DAV_NAMESPACE },
  creationdate: { flag: DavProperty.CreationDate, namespace: DAV_NAMESPACE },
  getlastmodified: { flag: DavProperty.LastModified, namespace: DAV_NAMESPACE },
  getcontentlength: { flag: DavProperty.ContentLength, namespace: DAV_NAMESPACE },
  getcontenttype: { flag: DavProperty.ContentType, namespace: DAV_NAMESPACE },
  displayname: { flag: DavProperty.DisplayName, namespace: DAV_NAMESPACE },
  executable: { flag: DavProperty.Permissions, namespace: APACHE_PROPS_NAMESPACE },
};

export const DIRECTORY_MIME_TYPE = 'httpd/unix-directory';
export const DEFAULT_MIME_TYPE = 'application/octet-stream';

export interface PropertyRequest {
  properties: PropertySet;
  /** Requested names this server has no value for, echoed back as 404. */
  unsupported: QualifiedName[];
}

export interface Resource {
  /** Decoded path below the upload directory. */
  path: string;
  kind: ResourceInfo['kind'];
  size: number;
  lastModified: Date;
  creationTime: Date;
  mimeType: string;
  displayName: string;
}

export function toPropertyRequest(body: PropFindBody): PropertyRequest {
  if (body.allprop) {
    return { properties: AllProperties, unsupported: [] };
  }

  let properties = 0;
  const unsupported: QualifiedName[] = [];
  for (const prop of body.props) {
    const known = PROPERTY_ELEMENTS[prop.name];
    // Unprefixed names in documents without a default namespace are accepted as DAV:
    if (known && (prop.namespace === known.namespace || prop.namespace === '')) {
      properties |= known.flag;
    } else {
      unsupported.push(prop);
    }
  }
  return { properties, unsupported };
}

export function guessMimeType(name: string): string {
  return mime.lookup(name) || DEFAULT_MIME_TYPE;
}

export function toResource(relativePath: string, info: ResourceInfo, rootName: string): Resource {
  const displayName = relativePath === '/' ? rootName : path.posix.basename(relativePath);
  return {
    path: relativePath,
    kind: info.kind,
    size: info.kind === 'collection' ? 0 : info.size,
    lastModified: info.lastModified,
    creationTime: info.created ?? info.lastModified,
    mimeType: info.kind === 'collection' ? DIRECTORY_MIME_TYPE : guessMimeType(displayName),
    displayName,
  };
}

/** ISO-8601 without fractional seconds, the form clients parse reliably. */
export function formatCreationDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function encodeHref(mountPath: string, resourcePath: string, isCollection: boolean): string {
  const encoded = resourcePath.split('/').map(segment => encodeURIComponent(segment)).join('/');
  const href = mountPath + encoded;
  return isCollection && !href.endsWith('/') ? href + '/' : href;
}

/**
 * Renders the `<d:response>` of one resource for a PROPFIND.
 */
export class PropertyResponseBuilder {
  constructor(private xml: WebDAVXML) {}

  buildResponse(resource: Resource, request: PropertyRequest, href: string): XmlTree {
    const requested = (flag: number) => (request.properties & flag) !== 0;
    const isCollection = resource.kind === 'collection';
    const props: XmlTree = {};

    if (requested(DavProperty.ResourceType)) {
      props['d:resourcetype'] = isCollection ? { 'd:collection': {} } : {};
    }
    if (requested(DavProperty.CreationDate)) {
      props['d:creationdate'] = formatCreationDate(resource.creationTime);
    }
    if (requested(DavProperty.LastModified)) {
      props['d:getlastmodified'] = resource.lastModified.toUTCString();
    }
    if (requested(DavProperty.ContentLength)) {
      props['d:getcontentlength'] = String(resource.size);
    }
    if (requested(DavProperty.ContentType)) {
      props['d:getcontenttype'] = resource.mimeType;
    }
    if (requested(DavProperty.DisplayName)) {
      props['d:displayname'] = resource.displayName;
    }
    if (requested(DavProperty.Permissions)) {
      props['a:executable'] = 'F';
    }

    const propstats: XmlTree[] = [];
    if (Object.keys(props).length > 0 || request.unsupported.length === 0) {
      propstats.push(this.xml.createPropStat(props, '200 OK'));
    }
    if (request.unsupported.length > 0) {
      propstats.push(this.xml.createPropStat(this.missingProps(request.unsupported), '404 Not Found'));
    }

    return this.xml.createPropFindResponse(href, propstats);
  }

  private missingProps(names: QualifiedName[]): XmlTree {
    const props: XmlTree = {};
    const prefixes = new Map<string, string>([[DAV_NAMESPACE, 'd'], [APACHE_PROPS_NAMESPACE, 'a']]);

    for (const { namespace, name } of names) {
      if (namespace === '') {
        props[name] = {};
        continue;
      }
      let prefix = prefixes.get(namespace);
      if (!prefix) {
        prefix = `ns${prefixes.size - 2}`;
        prefixes.set(namespace, prefix);
        props[`@_xmlns:${prefix}`] = namespace;
      }
      props[`${prefix}:${name}`] = {};
    }
    return props;
  }
}
