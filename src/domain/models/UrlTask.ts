import { SiteType, UrlTask } from './types';
import { domainOf } from '../../utils/urlUtils';

const ROBOTS_SUFFIX = '/robots.txt';

/**
 * URL to query for a site type: robots.txt is appended for robots tasks
 */
export function resolveUrl(rawUrl: string, siteType: SiteType): string {
  const trimmed = rawUrl.trim();
  if (siteType !== 'robots' || trimmed.toLowerCase().endsWith(ROBOTS_SUFFIX)) {
    return trimmed;
  }
  return `${trimmed.replace(/\/+$/, '')}${ROBOTS_SUFFIX}`;
}

/**
 * Build an immutable task for one input URL
 * @throws Error if the URL has no usable host
 */
export function createUrlTask(rawUrl: string, siteType: SiteType): UrlTask {
  const resolvedUrl = resolveUrl(rawUrl, siteType);

  return Object.freeze({
    rawUrl,
    siteType,
    resolvedUrl,
    domain: domainOf(resolvedUrl),
  });
}
