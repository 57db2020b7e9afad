/**
 * URL utility functions
 */

import { isIP } from 'node:net';

// Shorthands that resolve to the local machine but are not parsed as IPs
const SPECIAL_LOCAL_ADDRESSES = ['localhost', '0.0', '127.1'];

/**
 * Extract the bare host from a URL, or from "host:port/path" input without a scheme.
 * Port, brackets and a trailing dot are removed; the result is lower case.
 */
export function extractHost(url: string): string {
  let host = '';
  try {
    const parsed = new URL(url);
    host = parsed.hostname;
  } catch {
    host = '';
  }

  if (!host) {
    // Scheme-less input such as "127.0.0.1:8080/x"
    host = url.replace(/^[a-z][a-z0-9+.-]*:\/\//i, '').split('/')[0] ?? '';
    if (!host.startsWith('[')) {
      host = host.split(':')[0] ?? '';
    }
  }

  return host.replace(/^\[|\]$/g, '').replace(/\.$/, '').trim().toLowerCase();
}

function parseIpv4Octets(host: string): number[] | null {
  if (isIP(host) !== 4) {
    return null;
  }
  return host.split('.').map(part => Number.parseInt(part, 10));
}

function isPrivateIpv4(host: string): boolean {
  const octets = parseIpv4Octets(host);
  if (!octets) {
    return false;
  }

  const [a = -1, b = -1, c = -1] = octets;
  if (a === 0 || a === 10 || a === 127) return true;
  if (a === 169 && b === 254) return true;
  if (a === 172 && b >= 16 && b <= 31) return true;
  if (a === 192 && b === 168) return true;
  // IETF protocol assignments and documentation nets
  if (a === 192 && b === 0 && (c === 0 || c === 2)) return true;
  if (a === 198 && (b === 18 || b === 19)) return true;
  if (a === 198 && b === 51 && c === 100) return true;
  if (a === 203 && b === 0 && c === 113) return true;
  // Reserved 240.0.0.0/4, broadcast included
  if (a >= 240) return true;
  return false;
}

function isPrivateIpv6(host: string): boolean {
  if (isIP(host) !== 6) {
    return false;
  }

  if (host === '::' || host === '::1') {
    return true;
  }

  if (host.startsWith('::ffff:')) {
    const mapped = host.slice('::ffff:'.length);
    // WHATWG URL serialises mapped addresses as two hextets (::ffff:7f00:1)
    const hextets = /^([0-9a-f]{1,4}):([0-9a-f]{1,4})$/.exec(mapped);
    if (hextets) {
      const high = Number.parseInt(hextets[1] ?? '0', 16);
      const low = Number.parseInt(hextets[2] ?? '0', 16);
      return isPrivateIpv4(`${high >> 8}.${high & 0xff}.${low >> 8}.${low & 0xff}`);
    }
    return isPrivateIpv4(mapped);
  }

  const [first = '', second = ''] = host.split(':');
  const firstHextet = Number.parseInt(first || '0', 16);
  const secondHextet = Number.parseInt(second || '0', 16);

  // 2001::/23 IETF assignments, 2001:db8::/32 documentation
  if (firstHextet === 0x2001 && (secondHextet < 0x200 || secondHextet === 0xdb8)) return true;

  // fc00::/7 unique local
  if (firstHextet >= 0xfc00 && firstHextet <= 0xfdff) return true;
  // fe80::/10 link-local
  if (firstHextet >= 0xfe80 && firstHextet <= 0xfebf) return true;
  return false;
}

/**
 * Whether the URL points at this machine or a private network.
 * Never throws; anything that cannot be parsed is treated as public.
 */
export function isLocalAddress(url: string): boolean {
  const host = extractHost(url);
  if (!host) {
    return false;
  }

  if (SPECIAL_LOCAL_ADDRESSES.includes(host)) {
    return true;
  }

  return isPrivateIpv4(host) || isPrivateIpv6(host);
}

/**
 * Resolve a possibly relative link against a base URL.
 * @returns Absolute http(s) URL, or null for anything else
 */
export function resolveHttpUrl(href: string, baseUrl: string): string | null {
  try {
    const resolved = new URL(href, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return null;
    }
    resolved.hash = '';
    return resolved.toString();
  } catch {
    return null;
  }
}
