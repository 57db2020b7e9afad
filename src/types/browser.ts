import type { Browser } from 'playwright-core';
import type { PlaywrightProxy } from './proxy.js';

export interface BrowserLaunchOptions {
  /** Chromium executable; Playwright's own lookup is used when omitted */
  executablePath?: string;
  headless?: boolean;
}

export interface BrowserContextSettings {
  proxy?: PlaywrightProxy;
  userAgent?: string;
  /** Default timeout for navigation and waits, in milliseconds */
  timeoutMs?: number;
}

export interface BrowserSession {
  browser: Browser;
  cleanup: () => Promise<void>;
}
