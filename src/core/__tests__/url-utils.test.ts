import { describe, it, expect } from 'vitest';
import { extractHost, isLocalAddress, resolveHttpUrl } from '../utils/url-utils.js';

describe('isLocalAddress', () => {
  it.each([
    'http://localhost:8080/path',
    'http://LOCALHOST./',
    'http://127.0.0.1/',
    'http://127.1/',
    'http://0.0.0.0:3000/',
    'http://10.1.2.3/',
    'http://172.16.0.1/',
    'http://172.31.255.254/',
    'http://192.168.1.20/',
    'http://169.254.10.1/',
    'http://192.0.0.8/',
    'http://192.0.2.10/',
    'http://198.18.0.1/',
    'http://198.19.255.1/',
    'http://198.51.100.7/',
    'http://203.0.113.9/',
    'http://240.0.0.1/',
    'http://255.255.255.255/',
    'http://[2001:db8::1]/',
    'http://[::1]:3000/',
    'http://[fd00::1]/',
    'http://[fe80::1]/',
    'http://[::ffff:127.0.0.1]/',
    '127.0.0.1:8080/path',
    'localhost:3000'
  ])('should treat %s as local', url => {
    expect(isLocalAddress(url)).toBe(true);
  });

  it.each([
    'http://example.com/',
    'https://8.8.8.8/',
    'http://172.32.0.1/',
    'http://192.169.0.1/',
    'http://100.64.0.1/',
    'http://198.20.0.1/',
    'http://203.0.114.1/',
    'http://[2606:4700::1]/',
    'http://[::ffff:8.8.8.8]/',
    'not a url',
    ''
  ])('should treat %s as public', url => {
    expect(isLocalAddress(url)).toBe(false);
  });
});

describe('extractHost', () => {
  it('should drop scheme, port and case', () => {
    expect(extractHost('https://Shop.TEST:8443/a?b=1')).toBe('shop.test');
  });

  it('should unwrap IPv6 brackets', () => {
    expect(extractHost('http://[::1]:8080/')).toBe('::1');
  });
});

describe('resolveHttpUrl', () => {
  it('should resolve relative links and drop the fragment', () => {
    expect(resolveHttpUrl('/list?p=2#top', 'https://shop.test/list?p=1')).toBe('https://shop.test/list?p=2');
    expect(resolveHttpUrl('page/3', 'https://shop.test/blog/')).toBe('https://shop.test/blog/page/3');
  });

  it('should reject non-http links', () => {
    expect(resolveHttpUrl('mailto:shop@shop.test', 'https://shop.test/')).toBeNull();
    expect(resolveHttpUrl('javascript:void(0)', 'https://shop.test/')).toBeNull();
  });

  it('should reject links that cannot be resolved', () => {
    expect(resolveHttpUrl('/next', 'not a base')).toBeNull();
  });
});
