const CHROME_VERSION = '124.0.0.0';

/**
 * Desktop Chrome user agent sent when the config does not name one.
 * Stateless; every backend may call it.
 */
export function genericUserAgent(): string {
  return `Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${CHROME_VERSION} Safari/537.36`;
}
