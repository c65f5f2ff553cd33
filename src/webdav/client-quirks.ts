import type { DavHeaders } from './types.js';

/** Clients whose behaviour the server adapts to. */
export type ClientQuirk = 'mac-finder' | 'windows-miniredir' | 'none';

export function detectClientQuirk(headers: DavHeaders): ClientQuirk {
  const userAgent = headers['user-agent'] ?? '';
  if (userAgent.startsWith('WebDAVFS/') || userAgent.startsWith('WebDAVLib/')) {
    return 'mac-finder';
  }
  if (userAgent.startsWith('Microsoft-WebDAV-MiniRedir/')) {
    return 'windows-miniredir';
  }
  return 'none';
}

/**
 * Value of the `DAV` header. Class 2 is only advertised to clients that refuse
 * to mount a share read-write without it; the locking behind it is advisory.
 */
export function davComplianceFor(quirk: ClientQuirk): string {
  return quirk === 'none' ? '1' : '1, 2';
}
