export interface HttpRequestOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  /** Final URL after redirects */
  url: string;
  statusCode: number;
  body: string;
}

/**
 * A connection pool reused for every request of one scrape call.
 * Rejects with HttpTimeoutError, HttpProxyError or HttpTransportError.
 */
export interface HttpSession {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
  close(): Promise<void>;
}
