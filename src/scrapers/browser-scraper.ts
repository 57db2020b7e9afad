import type { Page } from 'playwright-core';
import { CHROME_EXECUTABLE_ENV_VAR, loadEnv } from '../config/env.js';
import { BrowserSetupError } from '../core/errors.js';
import type { ScrapeConfig } from '../core/scrape-config.js';
import { ScrapeResult } from '../core/scrape-result.js';
import { genericUserAgent } from '../core/user-agent.js';
import { withBrowserPage } from '../drivers/browser.js';
import { formatProxyForPlaywright, proxyRoutesFromConfig, selectProxyForUrl } from '../drivers/proxy.js';
import { httpErrorMessage, logResult } from '../engines/page-fetch.js';
import { ScrapeStatus } from '../types/scrape-status.js';
import { classifyError, describeError, errorMessage, isBrowserError } from '../utils/error-handlers.js';
import { logger } from '../utils/logger.js';
import { BaseScraper } from './base-scraper.js';
import { assertCapabilities, BROWSER_CAPABILITIES } from './capabilities.js';

const log = logger.createContext('browser-scraper');

/**
 * Resolve the Chromium executable from the environment.
 * @throws BrowserSetupError when the variable is not set
 */
export function resolveBrowserExecutable(env: NodeJS.ProcessEnv = process.env): string {
  const executablePath = loadEnv(env).CHROME_EXECUTABLE_PATH;
  if (!executablePath) {
    throw new BrowserSetupError(
      `Browser executable not found, set path as env variable: "${CHROME_EXECUTABLE_ENV_VAR}"`
    );
  }
  return executablePath;
}

/**
 * Headless Chromium: one navigation, one page of fully rendered source.
 * The browser is launched per scrape() call and closed on every exit path.
 */
export class BrowserScraper extends BaseScraper {
  constructor(config: ScrapeConfig | null | undefined) {
    super(config, BrowserScraper.validateConfig);
  }

  static override validateConfig(config: ScrapeConfig | null | undefined): void {
    assertCapabilities(config, BROWSER_CAPABILITIES, 'browser');
  }

  override async scrape(): Promise<ScrapeResult> {
    const { config } = this;
    const executablePath = resolveBrowserExecutable();
    const proxy = selectProxyForUrl(proxyRoutesFromConfig(config), config.url);
    const result = new ScrapeResult(config.url);

    await withBrowserPage(
      { executablePath, headless: true },
      {
        proxy: proxy ? formatProxyForPlaywright(proxy) : undefined,
        userAgent: config.userAgent ?? genericUserAgent(),
        timeoutMs: config.requestTimeout * 1000
      },
      page => this.capture(page, result)
    );

    logResult(log, result);
    return result;
  }

  private async capture(page: Page, result: ScrapeResult): Promise<void> {
    const { config } = this;
    const start = performance.now();

    try {
      const response = await page.goto(config.url, {
        waitUntil: 'load',
        timeout: config.requestTimeout * 1000
      });

      // No response means same-document navigation; there is no status to check
      if (response && response.status() !== 200) {
        result.markFailure(ScrapeStatus.ERROR, httpErrorMessage(response.status()));
        return;
      }

      if (config.waitForXPath) {
        log.debug(`Waiting for ${config.waitForXPath}`);
        await page.locator(`xpath=${config.waitForXPath}`).first().waitFor({
          state: 'visible',
          timeout: config.nextPageTimeout * 1000
        });
      }

      const scrapeTime = performance.now() - start;
      const html = await page.content();
      result.addScrapePage(html, { scrapeTime, status: ScrapeStatus.SUCCESS });
      result.markSuccess();
    } catch (error) {
      if (isBrowserError(errorMessage(error))) {
        log.error(`Browser closed while loading ${config.url}`);
      }
      result.markFailure(classifyError(error), describeError(error));
    }
  }
}
