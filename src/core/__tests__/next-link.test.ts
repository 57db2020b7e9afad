import { describe, it, expect } from 'vitest';
import { findNextUrl } from '../next-link.js';

const BASE = 'https://shop.test/list/1';

describe('findNextUrl', () => {
  it('should prefer an explicit rel="next"', () => {
    const html = `
      <head><link rel="next" href="/list/2"></head>
      <body><a href="/other">Next</a></body>`;

    expect(findNextUrl(html, BASE)).toBe('https://shop.test/list/2');
  });

  it('should accept rel="next" among other rel values', () => {
    const html = '<a rel="nofollow next" href="?p=2">2</a>';

    expect(findNextUrl(html, BASE)).toBe('https://shop.test/list/1?p=2');
  });

  it('should find an anchor by its text', () => {
    const html = '<a href="/about">About</a><a href="/list/2">Next &raquo;</a>';

    expect(findNextUrl(html, BASE)).toBe('https://shop.test/list/2');
  });

  it('should prefer a candidate with a "next" class', () => {
    const html = '<a href="/x">Next</a><a class="pager-next" href="/y">next</a>';

    expect(findNextUrl(html, BASE)).toBe('https://shop.test/y');
  });

  it('should prefer a candidate whose href mentions page', () => {
    const html = '<a href="/feed">More</a><a href="/blog?page=2">More posts</a><a href="/z">Older</a>';

    expect(findNextUrl(html, BASE)).toBe('https://shop.test/blog?page=2');
  });

  it('should fall back to the last candidate', () => {
    const html = '<a href="/a">More</a><a href="/b">Older entries</a>';

    expect(findNextUrl(html, BASE)).toBe('https://shop.test/b');
  });

  it('should return null without a next link', () => {
    expect(findNextUrl('<a href="/about">About</a>', BASE)).toBeNull();
    expect(findNextUrl('', BASE)).toBeNull();
  });

  it('should ignore links that are not http', () => {
    expect(findNextUrl('<a href="javascript:void(0)">Next</a>', BASE)).toBeNull();
  });

  it('should accept custom symbols', () => {
    const html = '<a href="/list/2">Weiter</a>';

    expect(findNextUrl(html, BASE)).toBeNull();
    expect(findNextUrl(html, BASE, ['weiter'])).toBe('https://shop.test/list/2');
  });
});
