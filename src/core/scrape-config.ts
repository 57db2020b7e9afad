import { z } from 'zod';
import { ScrapeConfigError } from './errors.js';

export const DEFAULT_REQUEST_TIMEOUT = 5.0;
export const DEFAULT_NEXT_PAGE_TIMEOUT = 3;
export const DEFAULT_JAVASCRIPT_WAIT = 3.0;
export const DEFAULT_MAX_PAGES = 15;

/**
 * Plain-object form of a ScrapeConfig, e.g. read from JSON.
 * Durations are in seconds.
 */
export const ScrapeConfigOptionsSchema = z.object({
  url: z.string().min(1, 'Url cannot be blank'),
  requestTimeout: z.number().positive().optional(),
  proxyHttp: z.string().optional(),
  proxyHttps: z.string().optional(),
  javascript: z.boolean().optional(),
  javascriptWait: z.number().nonnegative().optional(),
  userAgent: z.string().min(1).nullable().optional(),
  attemptMultiPage: z.boolean().optional(),
  waitForXPath: z.string().optional(),
  maxPages: z.number().int().positive().optional(),
  nextPageTimeout: z.number().positive().optional()
}).strict();

export type ScrapeConfigOptions = z.infer<typeof ScrapeConfigOptionsSchema>;

/**
 * What to fetch and how.
 *
 * Only the url is checked here. Every other field can be changed freely until
 * the config is handed to a scraper, which checks it against what that backend
 * supports.
 */
export class ScrapeConfig {
  private _url = '';

  requestTimeout = DEFAULT_REQUEST_TIMEOUT;
  proxyHttp = '';
  proxyHttps = '';
  javascript = false;
  javascriptWait = DEFAULT_JAVASCRIPT_WAIT;
  userAgent: string | null = null;
  attemptMultiPage = false;
  waitForXPath = '';
  maxPages = DEFAULT_MAX_PAGES;
  nextPageTimeout = DEFAULT_NEXT_PAGE_TIMEOUT;

  constructor(url: string) {
    this.url = url;
  }

  get url(): string {
    return this._url;
  }

  // Accepts unknown so that values coming from untyped sources are checked too
  set url(newUrl: unknown) {
    if (!newUrl || typeof newUrl !== 'string') {
      throw new ScrapeConfigError('Url cannot be blank');
    }
    this._url = newUrl;
  }

  /**
   * Build a config from a plain object.
   * @throws ScrapeConfigError listing every invalid field
   */
  static fromOptions(input: unknown): ScrapeConfig {
    const parsed = ScrapeConfigOptionsSchema.safeParse(input);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ScrapeConfigError(`Invalid scrape config: ${details}`);
    }

    const { url, ...rest } = parsed.data;
    const config = new ScrapeConfig(url);
    if (rest.requestTimeout !== undefined) config.requestTimeout = rest.requestTimeout;
    if (rest.proxyHttp !== undefined) config.proxyHttp = rest.proxyHttp;
    if (rest.proxyHttps !== undefined) config.proxyHttps = rest.proxyHttps;
    if (rest.javascript !== undefined) config.javascript = rest.javascript;
    if (rest.javascriptWait !== undefined) config.javascriptWait = rest.javascriptWait;
    if (rest.userAgent !== undefined) config.userAgent = rest.userAgent;
    if (rest.attemptMultiPage !== undefined) config.attemptMultiPage = rest.attemptMultiPage;
    if (rest.waitForXPath !== undefined) config.waitForXPath = rest.waitForXPath;
    if (rest.maxPages !== undefined) config.maxPages = rest.maxPages;
    if (rest.nextPageTimeout !== undefined) config.nextPageTimeout = rest.nextPageTimeout;
    return config;
  }

  /** True when either proxy route is set. */
  hasProxy(): boolean {
    return this.proxyHttp !== '' || this.proxyHttps !== '';
  }
}
