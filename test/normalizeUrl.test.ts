import { describe, expect, it } from 'vitest';

import { isHttpUrl, normalizeUrl, sameHost } from '../src/crawler/url/normalizeUrl.js';

describe('normalizeUrl', () => {
  const base = new URL('https://Example.COM/docs/guide');

  it('lowercases scheme and host but keeps path case', () => {
    expect(normalizeUrl('HTTP://Example.com/About', base)).toBe('http://example.com/About');
  });

  it('resolves relative links against the page URL', () => {
    expect(normalizeUrl('../pricing', base)).toBe('https://example.com/pricing');
    expect(normalizeUrl('/blog/', 'https://example.com/a/b')).toBe('https://example.com/blog');
  });

  it('drops fragments and default ports', () => {
    expect(normalizeUrl('https://example.com:443/path#section', base)).toBe('https://example.com/path');
    expect(normalizeUrl('http://example.com:80/path', base)).toBe('http://example.com/path');
  });

  it('removes trailing slashes except for the root', () => {
    expect(normalizeUrl('https://example.com/path/', base)).toBe('https://example.com/path');
    expect(normalizeUrl('https://example.com/', base)).toBe('https://example.com/');
  });

  it('keeps query parameters', () => {
    expect(normalizeUrl('https://example.com/search?q=1&page=2', base)).toBe(
      'https://example.com/search?q=1&page=2',
    );
  });

  it('strips tracking parameters', () => {
    expect(normalizeUrl('/pricing?utm_source=news&plan=pro&fbclid=abc', base)).toBe(
      'https://example.com/pricing?plan=pro',
    );
    expect(normalizeUrl('/pricing?UTM_Campaign=x', base)).toBe('https://example.com/pricing');
  });

  it('returns null for references that cannot be crawled', () => {
    expect(normalizeUrl('javascript:alert(1)', base)).toBeNull();
    expect(normalizeUrl('mailto:team@example.com', base)).toBeNull();
    expect(normalizeUrl('not a url')).toBeNull();
  });
});

describe('sameHost', () => {
  it('compares hostnames case-insensitively', () => {
    expect(sameHost('https://Example.com/a', 'http://example.com/b')).toBe(true);
  });

  it('treats subdomains and unparsable input as different hosts', () => {
    expect(sameHost('https://example.com', 'https://docs.example.com')).toBe(false);
    expect(sameHost('nope', 'https://example.com')).toBe(false);
  });
});

describe('isHttpUrl', () => {
  it('accepts only http and https URLs', () => {
    expect(isHttpUrl('https://example.com')).toBe(true);
    expect(isHttpUrl('ftp://example.com')).toBe(false);
    expect(isHttpUrl('example.com')).toBe(false);
  });
});
