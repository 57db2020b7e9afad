import { STATUS_CODES } from 'node:http';
import type { ScrapeConfig } from '../core/scrape-config.js';
import type { ScrapeResult } from '../core/scrape-result.js';
import { genericUserAgent } from '../core/user-agent.js';
import type { Renderer } from '../drivers/renderer.js';
import type { HttpSession } from '../types/http.js';
import { ScrapeStatus } from '../types/scrape-status.js';
import { classifyError, describeError, type FailureStatus } from '../utils/error-handlers.js';
import { formatTime, type ContextualLogger } from '../utils/logger.js';

export interface FetchedPage {
  /** Final URL, after redirects */
  url: string;
  html: string;
  elapsedMs: number;
}

export type PageFetchOutcome =
  | { ok: true; page: FetchedPage }
  | { ok: false; status: FailureStatus; errorMsg: string };

export interface PageFetchOptions {
  timeoutMs: number;
  userAgent: string;
  renderer?: Renderer | null;
}

export function pageFetchOptions(config: ScrapeConfig, renderer: Renderer | null = null): PageFetchOptions {
  return {
    timeoutMs: config.requestTimeout * 1000,
    userAgent: config.userAgent ?? genericUserAgent(),
    renderer
  };
}

export function httpErrorMessage(statusCode: number): string {
  return `HTTP Error: ${statusCode} - ${STATUS_CODES[statusCode] ?? 'Unknown Status'}`;
}

/**
 * Fetch one page and, when a renderer is given, execute its scripts.
 * Only status 200 counts as a page; the elapsed time covers fetch and render.
 */
export async function fetchPage(
  session: HttpSession,
  url: string,
  options: PageFetchOptions
): Promise<PageFetchOutcome> {
  const start = performance.now();

  try {
    const response = await session.get(url, {
      timeoutMs: options.timeoutMs,
      headers: { 'User-Agent': options.userAgent }
    });

    if (response.statusCode !== 200) {
      return { ok: false, status: ScrapeStatus.ERROR, errorMsg: httpErrorMessage(response.statusCode) };
    }

    const html = options.renderer
      ? await options.renderer.render(response.body, response.url)
      : response.body;

    return {
      ok: true,
      page: { url: response.url, html, elapsedMs: performance.now() - start }
    };
  } catch (error) {
    return { ok: false, status: classifyError(error), errorMsg: describeError(error) };
  }
}

/**
 * Apply a fetch outcome to the result: a SUCCESS page, or the failure.
 */
export function recordOutcome(result: ScrapeResult, outcome: PageFetchOutcome): void {
  if (!outcome.ok) {
    result.markFailure(outcome.status, outcome.errorMsg);
    return;
  }

  result.addScrapePage(outcome.page.html, {
    scrapeTime: outcome.page.elapsedMs,
    status: ScrapeStatus.SUCCESS
  });
  result.markSuccess();
}

export function logResult(log: ContextualLogger, result: ScrapeResult): void {
  if (result.isSuccess()) {
    log.verbose(`${result.url}: ${result.length} page(s) in ${formatTime(result.requestTimeMs)}`);
  } else {
    log.verbose(`${result.url}: ${result.status} after ${result.length} page(s) - ${result.errorMsg}`);
  }
}
