import { HttpProxyError, HttpTimeoutError } from '../core/errors.js';
import { ScrapeStatus } from '../types/scrape-status.js';

export type FailureStatus = ScrapeStatus.TIMEOUT | ScrapeStatus.ERROR | ScrapeStatus.PROXY_ERROR;

function errorName(error: unknown): string {
  if (error instanceof Error) return error.name;
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return typeof error;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Format a caught failure for ScrapeResult.errorMsg.
 */
export function describeError(error: unknown): string {
  return `EXCEPTION: ${errorName(error)} - ${errorMessage(error)}`;
}

/**
 * Map a caught failure to the status recorded on the result.
 * Playwright timeouts carry the name TimeoutError, as does AbortSignal.timeout().
 */
export function classifyError(error: unknown): FailureStatus {
  if (error instanceof HttpTimeoutError || errorName(error) === 'TimeoutError') {
    return ScrapeStatus.TIMEOUT;
  }
  if (error instanceof HttpProxyError) {
    return ScrapeStatus.PROXY_ERROR;
  }
  return ScrapeStatus.ERROR;
}

/**
 * Check if an error is related to browser/page being closed
 */
export function isBrowserError(message: string | null | undefined): boolean {
  if (!message) return false;

  const lowerMessage = message.toLowerCase();
  return lowerMessage.includes('target page, context or browser has been closed') ||
         lowerMessage.includes('browser has been closed') ||
         lowerMessage.includes('context has been closed') ||
         lowerMessage.includes('target closed') ||
         lowerMessage.includes('browser has disconnected') ||
         lowerMessage.includes('connection closed') ||
         lowerMessage.includes('browser is closed') ||
         lowerMessage.includes('execution context was destroyed') ||
         lowerMessage.includes('page has been closed');
}

export { errorMessage };
