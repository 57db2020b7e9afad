import * as cheerio from 'cheerio';
import { resolveHttpUrl } from './utils/url-utils.js';

export const DEFAULT_NEXT_SYMBOLS = ['next', 'more', 'older'];

function hasRelNext(rel: string | undefined): boolean {
  return (rel ?? '').toLowerCase().split(/\s+/).includes('next');
}

/**
 * Find the "next page" link of an HTML document.
 *
 * An explicit rel="next" on an <a> or <link> wins. Otherwise anchors whose text
 * contains one of the symbols are candidates; the first one with a class
 * containing "next" or an href containing "page" is taken, and the last
 * candidate is the fallback.
 *
 * @param baseUrl URL the document was loaded from, used for relative hrefs
 * @returns Absolute http(s) URL, or null when there is no next page
 */
export function findNextUrl(
  html: string,
  baseUrl: string,
  symbols: string[] = DEFAULT_NEXT_SYMBOLS
): string | null {
  const $ = cheerio.load(html);

  const explicit = $('a[href], link[href]')
    .filter((_, el) => hasRelNext($(el).attr('rel')))
    .first()
    .attr('href');
  if (explicit) {
    return resolveHttpUrl(explicit, baseUrl);
  }

  const lowered = symbols.map(symbol => symbol.toLowerCase());
  const candidates = $('a[href]')
    .toArray()
    .map(el => $(el))
    .filter(anchor => {
      const text = anchor.text().toLowerCase();
      return lowered.some(symbol => text.includes(symbol));
    });

  if (candidates.length === 0) {
    return null;
  }

  for (const candidate of candidates) {
    const href = candidate.attr('href') ?? '';
    const classes = (candidate.attr('class') ?? '').toLowerCase().split(/\s+/);
    if (classes.some(name => name.includes('next')) || href.includes('page')) {
      return resolveHttpUrl(href, baseUrl);
    }
  }

  const last = candidates[candidates.length - 1];
  return last ? resolveHttpUrl(last.attr('href') ?? '', baseUrl) : null;
}
