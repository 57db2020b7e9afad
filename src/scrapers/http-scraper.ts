import type { ScrapeConfig } from '../core/scrape-config.js';
import { ScrapeResult } from '../core/scrape-result.js';
import { proxyRoutesFromConfig } from '../drivers/proxy.js';
import { fetchPage, logResult, pageFetchOptions, recordOutcome } from '../engines/page-fetch.js';
import { createHttpSession } from '../providers/fetch-http.js';
import { logger } from '../utils/logger.js';
import { BaseScraper } from './base-scraper.js';
import { assertCapabilities, HTTP_CAPABILITIES } from './capabilities.js';

const log = logger.createContext('http-scraper');

/**
 * Plain HTTP: a single GET, no rendering, no pagination.
 */
export class HttpScraper extends BaseScraper {
  constructor(config: ScrapeConfig | null | undefined) {
    super(config, HttpScraper.validateConfig);
  }

  static override validateConfig(config: ScrapeConfig | null | undefined): void {
    assertCapabilities(config, HTTP_CAPABILITIES, 'http');
  }

  override async scrape(): Promise<ScrapeResult> {
    const { config } = this;
    const result = new ScrapeResult(config.url);
    const session = createHttpSession({ proxy: proxyRoutesFromConfig(config) });

    try {
      log.debug(`Fetching ${config.url}`);
      recordOutcome(result, await fetchPage(session, config.url, pageFetchOptions(config)));
    } finally {
      await session.close();
    }

    logResult(log, result);
    return result;
  }
}
