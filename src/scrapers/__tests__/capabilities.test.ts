import { describe, it, expect } from 'vitest';
import { NotImplementedError, ScrapeConfigError } from '../../core/errors.js';
import { ScrapeConfig } from '../../core/scrape-config.js';
import { BaseScraper } from '../base-scraper.js';
import {
  assertCapabilities,
  BROWSER_CAPABILITIES,
  HTTP_CAPABILITIES,
  SCRIPT_CAPABILITIES
} from '../capabilities.js';
import { HttpScraper } from '../http-scraper.js';
import type { ScraperCapabilities } from '../types.js';

function config(): ScrapeConfig {
  return new ScrapeConfig('https://shop.test/');
}

describe('capability tables', () => {
  it('should match what each backend supports', () => {
    expect(HTTP_CAPABILITIES).toEqual({ javascript: false, multiPage: false, waitForXPath: false, proxy: true });
    expect(SCRIPT_CAPABILITIES).toEqual({ javascript: true, multiPage: true, waitForXPath: false, proxy: true });
    expect(BROWSER_CAPABILITIES).toEqual({ javascript: true, multiPage: false, waitForXPath: true, proxy: true });
  });
});

describe('assertCapabilities', () => {
  it('should reject a missing config with a TypeError', () => {
    expect(() => assertCapabilities(null, HTTP_CAPABILITIES, 'http')).toThrow(TypeError);
    expect(() => assertCapabilities(undefined, HTTP_CAPABILITIES, 'http')).toThrow('Config must be provided');
  });

  it('should reject proxies for a backend without proxy support', () => {
    const noProxy: ScraperCapabilities = { ...HTTP_CAPABILITIES, proxy: false };
    const withProxy = config();
    withProxy.proxyHttp = 'http://127.0.0.1:3128';

    expect(() => assertCapabilities(config(), noProxy, 'http')).not.toThrow();
    expect(() => assertCapabilities(withProxy, noProxy, 'http')).toThrow('http scraper: no support for proxies');
  });

  it('should reject proxy uris that are not http', () => {
    const socks = config();
    socks.proxyHttps = 'socks5://127.0.0.1:1080';
    const garbage = config();
    garbage.proxyHttp = 'not a proxy';

    expect(() => assertCapabilities(socks, HTTP_CAPABILITIES, 'http')).toThrow(
      'http scraper: proxyHttps must be an http or https proxy URI'
    );
    expect(() => assertCapabilities(garbage, HTTP_CAPABILITIES, 'http')).toThrow(
      'http scraper: proxyHttp is not a valid proxy URI'
    );
  });

  it.each<[string, (target: ScrapeConfig) => void, string]>([
    ['requestTimeout', target => { target.requestTimeout = 0; }, 'requestTimeout must be a positive number of seconds'],
    ['javascriptWait', target => { target.javascriptWait = -1; }, 'javascriptWait must be zero or a positive number of seconds'],
    ['nextPageTimeout', target => { target.nextPageTimeout = 0; }, 'nextPageTimeout must be a positive number of seconds'],
    ['maxPages', target => { target.maxPages = 1.5; }, 'maxPages must be a positive integer']
  ])('should reject an impossible %s', (_field, apply, message) => {
    const target = config();
    apply(target);

    expect(() => assertCapabilities(target, SCRIPT_CAPABILITIES, 'script')).toThrow(`script scraper: ${message}`);
  });

  it('should not modify the config', () => {
    const target = config();
    target.javascript = true;
    const before = { ...target };

    expect(() => assertCapabilities(target, HTTP_CAPABILITIES, 'http')).toThrow(ScrapeConfigError);
    expect({ ...target }).toEqual(before);
  });
});

describe('BaseScraper', () => {
  it('should require a config', () => {
    expect(() => BaseScraper.validateConfig(null)).toThrow(TypeError);
    expect(() => new BaseScraper(undefined)).toThrow('Config must be provided');
  });

  it('should not implement scrape', async () => {
    const scraper = new BaseScraper(config());

    await expect(scraper.scrape()).rejects.toThrow(NotImplementedError);
    await expect(scraper.scrape()).rejects.toThrow('BaseScraper.scrape() is not implemented');
  });

  it('should re-validate a replaced config', () => {
    const original = config();
    const scraper = new HttpScraper(original);
    const rendering = config();
    rendering.javascript = true;

    expect(() => { scraper.config = rendering; }).toThrow('http scraper: no support for JavaScript rendering');
    expect(() => { scraper.config = null; }).toThrow(TypeError);
    expect(scraper.config).toBe(original);

    const replacement = new ScrapeConfig('https://shop.test/other');
    scraper.config = replacement;
    expect(scraper.config).toBe(replacement);
  });
});
