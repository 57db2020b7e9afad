import { chromium, type Browser } from 'playwright-core';
import { BrowserSetupError } from '../core/errors.js';
import type { BrowserLaunchOptions, BrowserSession } from '../types/browser.js';
import { errorMessage } from '../utils/error-handlers.js';

/**
 * Launch a local Chromium.
 * @param options.headless - Whether to run browser in headless mode (defaults to true)
 * @throws BrowserSetupError when the executable cannot be started
 */
export async function createSession(options: BrowserLaunchOptions = {}): Promise<BrowserSession> {
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: options.headless ?? true,
      executablePath: options.executablePath
    });
  } catch (error) {
    const where = options.executablePath ? ` at "${options.executablePath}"` : '';
    throw new BrowserSetupError(`Failed to launch browser${where}: ${errorMessage(error)}`, { cause: error });
  }

  return {
    browser,
    cleanup: async () => {
      await browser.close();
    }
  };
}
