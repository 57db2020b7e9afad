import type { ScrapeConfig } from '../core/scrape-config.js';
import type { ScrapeResult } from '../core/scrape-result.js';

export type ScraperBackend = 'http' | 'script' | 'browser';

export interface Scraper {
  readonly config: ScrapeConfig;

  /**
   * Fetch the configured URL.
   * Network and HTTP failures are reported on the result, never thrown.
   */
  scrape(): Promise<ScrapeResult>;
}

/**
 * What a backend can do with a config. A feature marked false is rejected
 * with ScrapeConfigError before any request is made.
 */
export interface ScraperCapabilities {
  javascript: boolean;
  multiPage: boolean;
  waitForXPath: boolean;
  proxy: boolean;
}

/** Throws ScrapeConfigError when the config cannot be honoured; returns nothing otherwise. */
export type ConfigValidator = (config: ScrapeConfig | null | undefined) => void;
