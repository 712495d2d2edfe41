/**
 * URL helpers shared by the crawler, the stores and the CSV reader
 */

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Parse a URL that may omit its scheme ("example.com/terms")
 * @returns The parsed URL, or null when it is not a usable http(s) URL
 */
export function parseLooseUrl(value: string): URL | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  try {
    const parsed = new URL(SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`);
    if ((parsed.protocol !== 'http:' && parsed.protocol !== 'https:') || !parsed.hostname.includes('.')) {
      return null;
    }
    return parsed;
  } catch {
    return null;
  }
}

/**
 * Dataset key for a URL: its host without a leading "www."
 * @throws Error if the URL cannot be parsed
 */
export function domainOf(url: string): string {
  const parsed = parseLooseUrl(url);
  if (!parsed) {
    throw new Error(`Invalid URL: ${url}`);
  }
  return parsed.hostname.toLowerCase().replace(/^www\./, '');
}

/**
 * Turn a URL into a safe file or directory name
 */
export function sanitizeUrl(url: string): string {
  return url
    .trim()
    .replace(SCHEME_PATTERN, '')
    .replace(/[^a-zA-Z0-9._-]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .substring(0, 200);
}
