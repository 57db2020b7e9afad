import type { ScrapeConfig } from '../core/scrape-config.js';
import { ScrapeResult } from '../core/scrape-result.js';
import { findNextUrl } from '../core/next-link.js';
import { genericUserAgent } from '../core/user-agent.js';
import { loadEnv } from '../config/env.js';
import { formatProxyForPlaywright, proxyRoutesFromConfig, selectProxyForUrl } from '../drivers/proxy.js';
import { openRenderer, type Renderer } from '../drivers/renderer.js';
import { fetchPage, logResult, pageFetchOptions, recordOutcome } from '../engines/page-fetch.js';
import { createHttpSession } from '../providers/fetch-http.js';
import type { HttpSession } from '../types/http.js';
import { logger } from '../utils/logger.js';
import { BaseScraper } from './base-scraper.js';
import { assertCapabilities, SCRIPT_CAPABILITIES } from './capabilities.js';

const log = logger.createContext('script-scraper');

/**
 * Fetches over HTTP, optionally renders each page in headless Chromium, and
 * follows "next" links while attemptMultiPage is set.
 *
 * One HTTP session and at most one renderer live for the duration of a
 * scrape() call. Pages are fetched one after another. A failed page ends the
 * loop; pages fetched before it are kept and the result takes the failure
 * status. A renderer that cannot be launched raises BrowserSetupError.
 */
export class ScriptScraper extends BaseScraper {
  constructor(config: ScrapeConfig | null | undefined) {
    super(config, ScriptScraper.validateConfig);
  }

  static override validateConfig(config: ScrapeConfig | null | undefined): void {
    assertCapabilities(config, SCRIPT_CAPABILITIES, 'script');
  }

  override async scrape(): Promise<ScrapeResult> {
    const { config } = this;
    const result = new ScrapeResult(config.url);
    const session = createHttpSession({ proxy: proxyRoutesFromConfig(config) });
    let renderer: Renderer | null = null;

    try {
      if (config.javascript) {
        renderer = await this.openRenderer();
      }
      await this.paginate(result, session, renderer);
    } finally {
      await renderer?.close();
      await session.close();
    }

    logResult(log, result);
    return result;
  }

  private async paginate(result: ScrapeResult, session: HttpSession, renderer: Renderer | null): Promise<void> {
    const { config } = this;
    const options = pageFetchOptions(config, renderer);
    const visited = new Set<string>();
    let nextUrl: string | null = config.url;
    let count = 0;

    while (nextUrl !== null) {
      log.debug(`Processing url: "${nextUrl}"`);
      count += 1;
      visited.add(nextUrl);

      const outcome = await fetchPage(session, nextUrl, options);
      recordOutcome(result, outcome);
      if (!outcome.ok) {
        log.debug(`Stopping after failed fetch of ${nextUrl}`);
        break;
      }

      if (count >= config.maxPages) {
        log.debug(`Paging limit of ${config.maxPages} reached, stop scraping`);
        break;
      }

      if (!config.attemptMultiPage) {
        log.debug('Multipage is not set, skip after first page');
        break;
      }

      nextUrl = findNextUrl(outcome.page.html, outcome.page.url);
      if (nextUrl !== null && visited.has(nextUrl)) {
        log.debug(`Next link ${nextUrl} was already scraped, stop scraping`);
        nextUrl = null;
      }
    }
  }

  private async openRenderer(): Promise<Renderer> {
    const { config } = this;
    const proxy = selectProxyForUrl(proxyRoutesFromConfig(config), config.url);
    return openRenderer({
      launch: { executablePath: loadEnv().CHROME_EXECUTABLE_PATH, headless: true },
      context: {
        proxy: proxy ? formatProxyForPlaywright(proxy) : undefined,
        userAgent: config.userAgent ?? genericUserAgent(),
        timeoutMs: config.requestTimeout * 1000
      },
      waitMs: config.javascriptWait * 1000
    });
  }
}
