import { ScrapeStatus } from '../types/scrape-status.js';

/**
 * One fetched page.
 */
export class ScrapePage {
  requestTimeMs = 0;
  status: ScrapeStatus = ScrapeStatus.UNKNOWN;

  constructor(public html: string) {}
}

export interface AddScrapePageOptions {
  /** Duration of this fetch alone, in milliseconds */
  scrapeTime?: number;
  status: ScrapeStatus;
}

/**
 * Pages and outcome of one scrape call.
 *
 * Created UNKNOWN by the scraper, filled in while it runs and handed to the
 * caller when scrape() resolves. Status is stored, not derived from the pages:
 * a result with pages can still be a failure when a later page failed.
 */
export class ScrapeResult implements Iterable<ScrapePage> {
  private readonly scrapePages: ScrapePage[] = [];

  status: ScrapeStatus = ScrapeStatus.UNKNOWN;
  errorMsg = '';

  constructor(public readonly url: string) {}

  /** Combined request time of all pages. */
  get requestTimeMs(): number {
    let total = 0;
    for (const page of this.scrapePages) {
      total += page.requestTimeMs;
    }
    return total;
  }

  get length(): number {
    return this.scrapePages.length;
  }

  get pages(): readonly ScrapePage[] {
    return this.scrapePages;
  }

  addScrapePage(html: string, options: AddScrapePageOptions): ScrapePage {
    const page = new ScrapePage(html);
    page.requestTimeMs = options.scrapeTime ?? 0;
    page.status = options.status;
    this.scrapePages.push(page);
    return page;
  }

  markSuccess(): void {
    this.status = ScrapeStatus.SUCCESS;
    this.errorMsg = '';
  }

  markFailure(status: Exclude<ScrapeStatus, ScrapeStatus.SUCCESS | ScrapeStatus.UNKNOWN>, errorMsg: string): void {
    this.status = status;
    this.errorMsg = errorMsg;
  }

  /** A result counts as good only when its status is SUCCESS. */
  isSuccess(): boolean {
    return this.status === ScrapeStatus.SUCCESS;
  }

  [Symbol.iterator](): Iterator<ScrapePage> {
    return this.scrapePages[Symbol.iterator]();
  }
}
