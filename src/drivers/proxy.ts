/**
 * Proxy Driver
 *
 * Picks the proxy for a target URL from the config's per-scheme routes and
 * formats it for the HTTP session or for Playwright.
 */

import type { ScrapeConfig } from '../core/scrape-config.js';
import type { PlaywrightProxy, ProxyRoutes } from '../types/proxy.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('proxy-driver');

export function proxyRoutesFromConfig(config: ScrapeConfig): ProxyRoutes {
  return {
    http: config.proxyHttp.trim(),
    https: config.proxyHttps.trim()
  };
}

/**
 * Select the proxy for a URL by its scheme.
 * @returns Proxy URI, or null for a direct connection
 */
export function selectProxyForUrl(routes: ProxyRoutes, url: string): string | null {
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    return null;
  }

  const proxy = protocol === 'https:' ? routes.https : protocol === 'http:' ? routes.http : '';
  if (!proxy) {
    return null;
  }

  log.debug(`Using proxy ${redactProxy(proxy)} for ${protocol} request`);
  return proxy;
}

/**
 * Convert a proxy URI to Playwright format, moving credentials out of the URI.
 */
export function formatProxyForPlaywright(proxyUri: string): PlaywrightProxy {
  const parsed = new URL(proxyUri);
  const proxy: PlaywrightProxy = {
    server: `${parsed.protocol}//${parsed.host}`
  };
  if (parsed.username) {
    proxy.username = decodeURIComponent(parsed.username);
    proxy.password = decodeURIComponent(parsed.password);
  }
  return proxy;
}

/**
 * Proxy URI safe for logs and error messages.
 */
export function redactProxy(proxyUri: string): string {
  try {
    const parsed = new URL(proxyUri);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString().replace(/\/$/, '');
  } catch {
    return proxyUri;
  }
}
