import type { Route } from 'playwright-core';
import type { BrowserContextSettings, BrowserLaunchOptions } from '../types/browser.js';
import { logger } from '../utils/logger.js';
import { openBrowserPage } from './browser.js';

const log = logger.createContext('renderer');

/**
 * Executes the scripts of already fetched HTML and returns the resulting DOM.
 */
export interface Renderer {
  render(html: string, url: string): Promise<string>;
  close(): Promise<void>;
}

export interface RendererOptions {
  launch: BrowserLaunchOptions;
  context: BrowserContextSettings;
  /** Fixed settle delay after the load event, in milliseconds */
  waitMs: number;
}

/**
 * Open a headless page used to render every page of one scrape call.
 *
 * The fetched HTML is served for its own URL through request interception, so
 * relative scripts and styles resolve as they would on the live site.
 */
export async function openRenderer(options: RendererOptions): Promise<Renderer> {
  const { page, cleanup } = await openBrowserPage(options.launch, options.context);

  return {
    async render(html: string, url: string): Promise<string> {
      const documentUrl = new URL(url).href;
      const matchesDocument = (target: URL): boolean => target.href === documentUrl;
      const serveDocument = (route: Route): Promise<void> =>
        route.fulfill({ status: 200, contentType: 'text/html; charset=utf-8', body: html });

      await page.route(matchesDocument, serveDocument);
      try {
        await page.goto(documentUrl, { waitUntil: 'load' });
        if (options.waitMs > 0) {
          await page.waitForTimeout(options.waitMs);
        }
        const rendered = await page.content();
        log.debug(`Rendered ${url} (${html.length} -> ${rendered.length} chars)`);
        return rendered;
      } finally {
        await page.unroute(matchesDocument, serveDocument);
      }
    },
    close: cleanup
  };
}
