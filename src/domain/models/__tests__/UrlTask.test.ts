/**
 * Tests for URL task resolution
 */

import { createUrlTask, resolveUrl } from '../UrlTask';

describe('resolveUrl', () => {
  it('should append robots.txt for robots tasks', () => {
    expect(resolveUrl('https://example.com', 'robots')).toBe('https://example.com/robots.txt');
    expect(resolveUrl('https://example.com/', 'robots')).toBe('https://example.com/robots.txt');
    expect(resolveUrl('example.com', 'robots')).toBe('example.com/robots.txt');
  });

  it('should leave a robots.txt URL unchanged', () => {
    expect(resolveUrl('https://example.com/robots.txt', 'robots')).toBe('https://example.com/robots.txt');
    expect(resolveUrl('https://example.com/ROBOTS.TXT', 'robots')).toBe('https://example.com/ROBOTS.TXT');
  });

  it('should use the URL as given for other site types', () => {
    expect(resolveUrl(' https://example.com/terms ', 'tos')).toBe('https://example.com/terms');
    expect(resolveUrl('https://example.com', 'main')).toBe('https://example.com');
  });
});

describe('createUrlTask', () => {
  it('should derive the domain from the resolved URL', () => {
    const task = createUrlTask('https://www.Example.com', 'robots');

    expect(task).toEqual({
      rawUrl: 'https://www.Example.com',
      siteType: 'robots',
      resolvedUrl: 'https://www.Example.com/robots.txt',
      domain: 'example.com',
    });
  });

  it('should be immutable', () => {
    expect(Object.isFrozen(createUrlTask('example.com', 'main'))).toBe(true);
  });

  it('should reject a URL without a usable host', () => {
    expect(() => createUrlTask('localhost', 'main')).toThrow('Invalid URL: localhost');
  });
});
