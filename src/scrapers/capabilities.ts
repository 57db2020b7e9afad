import { ScrapeConfigError } from '../core/errors.js';
import type { ScrapeConfig } from '../core/scrape-config.js';
import type { ScraperBackend, ScraperCapabilities } from './types.js';

export const HTTP_CAPABILITIES: ScraperCapabilities = {
  javascript: false,
  multiPage: false,
  waitForXPath: false,
  proxy: true
};

export const SCRIPT_CAPABILITIES: ScraperCapabilities = {
  javascript: true,
  multiPage: true,
  waitForXPath: false,
  proxy: true
};

// Multi-page browser scraping is not implemented
export const BROWSER_CAPABILITIES: ScraperCapabilities = {
  javascript: true,
  multiPage: false,
  waitForXPath: true,
  proxy: true
};

/**
 * Reject a missing config. Thrown as TypeError, independent of any backend.
 */
export function requireConfig(config: ScrapeConfig | null | undefined): ScrapeConfig {
  if (config === null || config === undefined) {
    throw new TypeError('Config must be provided');
  }
  return config;
}

function isPositiveNumber(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function checkLimits(config: ScrapeConfig, label: string): void {
  if (!isPositiveNumber(config.requestTimeout)) {
    throw new ScrapeConfigError(`${label}: requestTimeout must be a positive number of seconds`);
  }
  if (typeof config.javascriptWait !== 'number' || !Number.isFinite(config.javascriptWait) || config.javascriptWait < 0) {
    throw new ScrapeConfigError(`${label}: javascriptWait must be zero or a positive number of seconds`);
  }
  if (!isPositiveNumber(config.nextPageTimeout)) {
    throw new ScrapeConfigError(`${label}: nextPageTimeout must be a positive number of seconds`);
  }
  if (!Number.isInteger(config.maxPages) || config.maxPages < 1) {
    throw new ScrapeConfigError(`${label}: maxPages must be a positive integer`);
  }
}

function checkProxyUri(proxy: string, field: string, label: string): void {
  if (!proxy.trim()) return;

  let protocol = '';
  try {
    protocol = new URL(proxy.trim()).protocol;
  } catch {
    throw new ScrapeConfigError(`${label}: ${field} is not a valid proxy URI`);
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ScrapeConfigError(`${label}: ${field} must be an http or https proxy URI`);
  }
}

/**
 * Check a config against a backend's capability table.
 * Pure: reads the config and throws ScrapeConfigError on the first mismatch.
 */
export function assertCapabilities(
  config: ScrapeConfig | null | undefined,
  capabilities: ScraperCapabilities,
  backend: ScraperBackend
): void {
  const checked = requireConfig(config);
  const label = `${backend} scraper`;

  if (checked.javascript && !capabilities.javascript) {
    throw new ScrapeConfigError(`${label}: no support for JavaScript rendering`);
  }

  if (checked.attemptMultiPage && !capabilities.multiPage) {
    throw new ScrapeConfigError(`${label}: no support for multi-page scraping`);
  }

  if (checked.waitForXPath && !capabilities.waitForXPath) {
    throw new ScrapeConfigError(`${label}: no support for waiting on an XPath`);
  }

  if (checked.hasProxy() && !capabilities.proxy) {
    throw new ScrapeConfigError(`${label}: no support for proxies`);
  }

  checkProxyUri(checked.proxyHttp, 'proxyHttp', label);
  checkProxyUri(checked.proxyHttps, 'proxyHttps', label);
  checkLimits(checked, label);
}
