/**
 * Error hierarchy.
 *
 * Configuration, setup and validation errors are thrown to the caller.
 * The Http* errors are raised by the HTTP session and are caught by the
 * scrapers, which record them on the ScrapeResult instead of rethrowing.
 */

export class ScrapeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The configuration is blank or asks for something the backend cannot do. */
export class ScrapeConfigError extends ScrapeError {}

/** The browser executable is missing or could not be started. */
export class BrowserSetupError extends ScrapeError {}

/** A URL failed a policy check before any request was made. */
export class UrlValidationError extends ScrapeError {}

export class NotImplementedError extends ScrapeError {
  constructor(message = 'Not implemented') {
    super(message);
  }
}

export class HttpTimeoutError extends ScrapeError {}

export class HttpProxyError extends ScrapeError {}

export class HttpTransportError extends ScrapeError {}
