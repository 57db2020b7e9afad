import type { Page } from 'playwright-core';
import { createSession } from '../providers/local-browser.js';
import type { BrowserContextSettings, BrowserLaunchOptions } from '../types/browser.js';
import { errorMessage, isBrowserError } from '../utils/error-handlers.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('browser');

export interface BrowserPageHandle {
  page: Page;
  cleanup: () => Promise<void>;
}

/**
 * Launch a browser and open one page in a fresh context.
 * The caller owns the handle and must call cleanup(); if opening the page
 * fails the browser is closed before the error propagates.
 */
export async function openBrowserPage(
  launch: BrowserLaunchOptions,
  settings: BrowserContextSettings = {}
): Promise<BrowserPageHandle> {
  const session = await createSession(launch);
  const { browser } = session;

  browser.on('disconnected', () => {
    log.debug('Browser disconnected');
  });

  try {
    const context = await browser.newContext({
      proxy: settings.proxy,
      userAgent: settings.userAgent
    });
    if (settings.timeoutMs !== undefined) {
      context.setDefaultTimeout(settings.timeoutMs);
    }
    const page = await context.newPage();

    return {
      page,
      cleanup: async () => {
        try {
          await session.cleanup();
        } catch (error) {
          // Already gone, nothing left to release
          if (!isBrowserError(errorMessage(error))) {
            throw error;
          }
          log.debug(`Browser already closed: ${errorMessage(error)}`);
        }
      }
    };
  } catch (error) {
    await session.cleanup();
    throw error;
  }
}

/**
 * Run fn with a browser page; the browser is closed on every exit path.
 */
export async function withBrowserPage<T>(
  launch: BrowserLaunchOptions,
  settings: BrowserContextSettings,
  fn: (page: Page) => Promise<T>
): Promise<T> {
  const handle = await openBrowserPage(launch, settings);
  try {
    return await fn(handle.page);
  } finally {
    await handle.cleanup();
  }
}
