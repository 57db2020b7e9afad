import { UrlValidationError } from '../core/errors.js';
import { ScrapeConfig } from '../core/scrape-config.js';
import type { ScrapeResult } from '../core/scrape-result.js';
import { isLocalAddress } from '../core/utils/url-utils.js';
import { BrowserScraper } from '../scrapers/browser-scraper.js';
import { HttpScraper } from '../scrapers/http-scraper.js';
import { ScriptScraper } from '../scrapers/script-scraper.js';
import type { Scraper, ScraperBackend } from '../scrapers/types.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('engine');

export interface ScrapeUrlOptions {
  /** Overrides the backend inferred from the config */
  backend?: ScraperBackend;
}

/**
 * Pick a backend for a config:
 * waitForXPath needs a real browser, rendering or pagination need the script
 * backend, anything else is plain HTTP.
 */
export function selectBackend(config: ScrapeConfig): ScraperBackend {
  if (config.waitForXPath) {
    return 'browser';
  }
  if (config.javascript || config.attemptMultiPage) {
    return 'script';
  }
  return 'http';
}

/**
 * Construct a backend by name. Throws ScrapeConfigError when the backend
 * cannot honour the config.
 */
export function createScraper(backend: ScraperBackend, config: ScrapeConfig): Scraper {
  switch (backend) {
    case 'http':
      return new HttpScraper(config);
    case 'script':
      return new ScriptScraper(config);
    case 'browser':
      return new BrowserScraper(config);
  }
}

/**
 * Scrape a URL with the selected backend.
 */
export async function scrapeUrl(config: ScrapeConfig, options: ScrapeUrlOptions = {}): Promise<ScrapeResult> {
  const backend = options.backend ?? selectBackend(config);
  log.verbose(`Scraping ${config.url} with the ${backend} backend`);
  return createScraper(backend, config).scrape();
}

export interface CheckUrlOptions {
  localOnly: boolean;
}

/**
 * Reachability probe: one plain HTTP fetch.
 * @throws UrlValidationError when localOnly is set and the URL is not local
 */
export async function checkUrl(url: string, options: CheckUrlOptions): Promise<boolean> {
  if (options.localOnly && !isLocalAddress(url)) {
    throw new UrlValidationError('Url is not a local address');
  }

  const result = await new HttpScraper(new ScrapeConfig(url)).scrape();
  return result.isSuccess();
}
