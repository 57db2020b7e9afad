export { ScrapeConfig, ScrapeConfigOptionsSchema } from './core/scrape-config.js';
export type { ScrapeConfigOptions } from './core/scrape-config.js';
export {
  DEFAULT_JAVASCRIPT_WAIT,
  DEFAULT_MAX_PAGES,
  DEFAULT_NEXT_PAGE_TIMEOUT,
  DEFAULT_REQUEST_TIMEOUT
} from './core/scrape-config.js';
export { ScrapePage, ScrapeResult } from './core/scrape-result.js';
export type { AddScrapePageOptions } from './core/scrape-result.js';
export { ScrapeStatus } from './types/scrape-status.js';
export {
  BrowserSetupError,
  HttpProxyError,
  HttpTimeoutError,
  HttpTransportError,
  NotImplementedError,
  ScrapeConfigError,
  ScrapeError,
  UrlValidationError
} from './core/errors.js';

export { BaseScraper } from './scrapers/base-scraper.js';
export { HttpScraper } from './scrapers/http-scraper.js';
export { ScriptScraper } from './scrapers/script-scraper.js';
export { BrowserScraper, resolveBrowserExecutable } from './scrapers/browser-scraper.js';
export {
  BROWSER_CAPABILITIES,
  HTTP_CAPABILITIES,
  SCRIPT_CAPABILITIES
} from './scrapers/capabilities.js';
export type { ConfigValidator, Scraper, ScraperBackend, ScraperCapabilities } from './scrapers/types.js';

export { checkUrl, createScraper, scrapeUrl, selectBackend } from './engines/scrape-engine.js';
export type { CheckUrlOptions, ScrapeUrlOptions } from './engines/scrape-engine.js';

export { isLocalAddress } from './core/utils/url-utils.js';
export { findNextUrl, DEFAULT_NEXT_SYMBOLS } from './core/next-link.js';
export { genericUserAgent } from './core/user-agent.js';
export { LogLevel, logger, parseLogLevel } from './utils/logger.js';
