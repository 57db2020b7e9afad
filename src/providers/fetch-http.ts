import { Agent, ProxyAgent, fetch, type Dispatcher } from 'undici';
import { TextDecoder } from 'node:util';
import { HttpProxyError, HttpTimeoutError, HttpTransportError } from '../core/errors.js';
import { redactProxy, selectProxyForUrl } from '../drivers/proxy.js';
import type { HttpRequestOptions, HttpResponse, HttpSession } from '../types/http.js';
import type { ProxyRoutes } from '../types/proxy.js';
import { errorMessage } from '../utils/error-handlers.js';

export interface HttpSessionOptions {
  proxy?: ProxyRoutes;
}

const DIRECT = '';

// AbortSignal.timeout() rejects with a DOMException named TimeoutError
function isAbort(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) {
    return false;
  }
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

const DEFAULT_CHARSET = 'utf-8';

/**
 * Charset label from a Content-Type header, or null when none is declared.
 */
export function charsetFromContentType(contentType: string | null): string | null {
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType ?? '');
  return match?.[1] ? match[1].toLowerCase() : null;
}

/**
 * Decode a body with the declared charset; missing or unknown labels fall back to utf-8.
 */
export function decodeBody(bytes: ArrayBuffer, contentType: string | null): string {
  const charset = charsetFromContentType(contentType) ?? DEFAULT_CHARSET;
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    decoder = new TextDecoder(DEFAULT_CHARSET);
  }
  return decoder.decode(bytes);
}

// undici reports network failures as TypeError('fetch failed') with the socket error as cause
function describeFailure(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause !== undefined) {
    const cause = error.cause;
    const code = typeof cause === 'object' && cause !== null && 'code' in cause ? String(cause.code) : '';
    const causeMessage = errorMessage(cause) || code;
    if (causeMessage && causeMessage !== message) {
      return `${message}: ${causeMessage}`;
    }
  }
  return message;
}

/**
 * HTTP session backed by undici. One dispatcher per proxy route, kept open
 * (keep-alive) until close() so that consecutive pages reuse connections.
 */
export class UndiciHttpSession implements HttpSession {
  private readonly dispatchers = new Map<string, Dispatcher>();
  private readonly routes: ProxyRoutes;

  constructor(options: HttpSessionOptions = {}) {
    this.routes = options.proxy ?? { http: '', https: '' };
  }

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const proxy = selectProxyForUrl(this.routes, url);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: options.headers,
        redirect: 'follow',
        dispatcher: this.dispatcherFor(proxy),
        signal: AbortSignal.timeout(options.timeoutMs)
      });
      const body = decodeBody(await response.arrayBuffer(), response.headers.get('content-type'));
      return {
        url: response.url || url,
        statusCode: response.status,
        body
      };
    } catch (error) {
      if (isAbort(error)) {
        throw new HttpTimeoutError(`Request timed out after ${options.timeoutMs}ms`, { cause: error });
      }
      if (proxy) {
        throw new HttpProxyError(
          `Request through proxy ${redactProxy(proxy)} failed: ${describeFailure(error)}`,
          { cause: error }
        );
      }
      throw new HttpTransportError(describeFailure(error), { cause: error });
    }
  }

  async close(): Promise<void> {
    const dispatchers = [...this.dispatchers.values()];
    this.dispatchers.clear();
    await Promise.all(dispatchers.map(dispatcher => dispatcher.close()));
  }

  private dispatcherFor(proxy: string | null): Dispatcher {
    const key = proxy ?? DIRECT;
    let dispatcher = this.dispatchers.get(key);
    if (!dispatcher) {
      dispatcher = proxy ? new ProxyAgent(proxy) : new Agent();
      this.dispatchers.set(key, dispatcher);
    }
    return dispatcher;
  }
}

export function createHttpSession(options: HttpSessionOptions = {}): HttpSession {
  return new UndiciHttpSession(options);
}
