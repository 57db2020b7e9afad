/**
 * Outcome of a scrape, for a single page or for the whole result.
 * UNKNOWN is the initial value and never a valid final one.
 */
export enum ScrapeStatus {
  UNKNOWN = 'Unknown',
  TIMEOUT = 'Timeout',
  SUCCESS = 'Success',
  ERROR = 'Error',
  PROXY_ERROR = 'Proxy Error'
}
