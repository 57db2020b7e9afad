import { NotImplementedError } from '../core/errors.js';
import type { ScrapeConfig } from '../core/scrape-config.js';
import type { ScrapeResult } from '../core/scrape-result.js';
import { requireConfig } from './capabilities.js';
import type { ConfigValidator, Scraper } from './types.js';

/**
 * Holds a validated config. Backends pass their own validator so that
 * construction and every later config replacement run the same checks as the
 * static validateConfig().
 */
export class BaseScraper implements Scraper {
  private currentConfig: ScrapeConfig;

  constructor(
    config: ScrapeConfig | null | undefined,
    private readonly validate: ConfigValidator = BaseScraper.validateConfig
  ) {
    this.currentConfig = BaseScraper.checked(config, validate);
  }

  static validateConfig(config: ScrapeConfig | null | undefined): void {
    requireConfig(config);
  }

  get config(): ScrapeConfig {
    return this.currentConfig;
  }

  set config(next: ScrapeConfig | null | undefined) {
    this.currentConfig = BaseScraper.checked(next, this.validate);
  }

  async scrape(): Promise<ScrapeResult> {
    throw new NotImplementedError(`${this.constructor.name}.scrape() is not implemented`);
  }

  private static checked(config: ScrapeConfig | null | undefined, validate: ConfigValidator): ScrapeConfig {
    const present = requireConfig(config);
    validate(present);
    return present;
  }
}
