import { describe, it, expect } from 'vitest';
import { HttpProxyError, HttpTimeoutError, HttpTransportError } from '../src/core/errors.js';
import { ScrapeStatus } from '../src/types/scrape-status.js';
import { classifyError, describeError, errorMessage, isBrowserError } from '../src/utils/error-handlers.js';

describe('Error Handlers', () => {
  describe('isBrowserError', () => {
    it('should identify browser closed errors', () => {
      const browserErrors = [
        'Target page, context or browser has been closed',
        'Browser has been closed',
        'Context has been closed',
        'Target closed',
        'Browser has disconnected',
        'Connection closed',
        'Browser is closed',
        'Execution context was destroyed',
        'Page has been closed'
      ];

      for (const error of browserErrors) {
        expect(isBrowserError(error)).toBe(true);
        expect(isBrowserError(error.toLowerCase())).toBe(true);
        expect(isBrowserError(error.toUpperCase())).toBe(true);
      }
    });

    it('should not identify non-browser errors', () => {
      const nonBrowserErrors = [
        'Network error',
        'Timeout',
        'File not found',
        'Invalid URL',
        'Permission denied'
      ];

      for (const error of nonBrowserErrors) {
        expect(isBrowserError(error)).toBe(false);
      }
    });

    it('should handle empty or null messages', () => {
      expect(isBrowserError('')).toBe(false);
      expect(isBrowserError(null)).toBe(false);
      expect(isBrowserError(undefined)).toBe(false);
    });
  });

  describe('classifyError', () => {
    it('should map timeouts to TIMEOUT', () => {
      expect(classifyError(new HttpTimeoutError('slow'))).toBe(ScrapeStatus.TIMEOUT);

      const playwrightTimeout = new Error('Timeout 30000ms exceeded.');
      playwrightTimeout.name = 'TimeoutError';
      expect(classifyError(playwrightTimeout)).toBe(ScrapeStatus.TIMEOUT);
    });

    it('should map proxy failures to PROXY_ERROR', () => {
      expect(classifyError(new HttpProxyError('refused'))).toBe(ScrapeStatus.PROXY_ERROR);
    });

    it('should map everything else to ERROR', () => {
      expect(classifyError(new HttpTransportError('reset'))).toBe(ScrapeStatus.ERROR);
      expect(classifyError(new TypeError('bad'))).toBe(ScrapeStatus.ERROR);
      expect(classifyError('string failure')).toBe(ScrapeStatus.ERROR);
    });
  });

  describe('describeError', () => {
    it('should include the error class and message', () => {
      expect(describeError(new HttpTransportError('fetch failed'))).toBe(
        'EXCEPTION: HttpTransportError - fetch failed'
      );
      expect(describeError(new RangeError('out of range'))).toBe('EXCEPTION: RangeError - out of range');
    });

    it('should describe error-like objects and plain values', () => {
      expect(describeError({ name: 'TimeoutError', message: 'aborted' })).toBe('EXCEPTION: TimeoutError - aborted');
      expect(describeError('boom')).toBe('EXCEPTION: string - boom');
    });
  });

  describe('errorMessage', () => {
    it('should read the message of errors and error-like objects', () => {
      expect(errorMessage(new Error('one'))).toBe('one');
      expect(errorMessage({ message: 'two' })).toBe('two');
      expect(errorMessage(3)).toBe('3');
    });
  });
});
