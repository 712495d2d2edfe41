/**
 * Client for the Wayback Machine CDX Server API
 * Lists the captures of one URL inside a date range
 */

import { ArchiveHttpClient, WAYBACK_BASE_URL } from '../../services/ArchiveHttpClient';
import { LoggingService } from '../../services/LoggingService';
import { HttpRequestError } from '../../services/RetryPolicy';
import { ConfigError, IndexError } from '../errors';
import { SnapshotRef } from '../models/types';
import { formatShortDate, isCompactDate, parseWaybackTimestamp } from '../../utils/DateFormatter';
import { parseLooseUrl } from '../../utils/urlUtils';

export const CDX_ENDPOINT = `${WAYBACK_BASE_URL}/cdx/search/cdx`;

/** Fields requested from the CDX API, in response column order */
export const CDX_FIELDS = ['timestamp', 'original', 'mimetype', 'statuscode', 'digest'] as const;

/** Exclude missing pages and revisit records that carry no content */
export const CDX_FILTERS = ['!statuscode:404', '!mimetype:warc/revisit'] as const;

type CDXField = (typeof CDX_FIELDS)[number];

export class IndexClient {
  private http: ArchiveHttpClient;
  private logger: LoggingService;

  constructor(http: ArchiveHttpClient, logger: LoggingService) {
    this.http = http;
    this.logger = logger;
  }

  /**
   * Fetch every capture of a URL between two dates (inclusive, YYYYMMDD)
   * @returns Captures ordered by timestamp
   * @throws IndexError when the query fails after retries or the body is unreadable
   */
  async query(resolvedUrl: string, startDate: string, endDate: string): Promise<SnapshotRef[]> {
    if (!isCompactDate(startDate) || !isCompactDate(endDate)) {
      throw new ConfigError(`Dates must be YYYYMMDD: ${startDate}, ${endDate}`);
    }
    if (startDate > endDate) {
      throw new ConfigError(`Start date ${startDate} is after end date ${endDate}`);
    }
    if (!parseLooseUrl(resolvedUrl)) {
      throw new IndexError(`Not a valid absolute URL: ${resolvedUrl}`, resolvedUrl, 'invalid-url');
    }

    this.logger.debug(`Querying CDX index for ${resolvedUrl}`, { startDate, endDate });

    let body: unknown;
    try {
      const response = await this.http.get({
        url: CDX_ENDPOINT,
        params: buildQueryParams(resolvedUrl, startDate, endDate),
        responseType: 'text',
      });
      body = response.data;
    } catch (error) {
      if (error instanceof HttpRequestError) {
        throw new IndexError(
          `CDX query failed for ${resolvedUrl}: ${error.message}`,
          resolvedUrl,
          error.status === undefined ? 'network' : 'http',
          { status: error.status, transient: error.transient, cause: error }
        );
      }
      throw error;
    }

    const refs = this.parseResponse(body, resolvedUrl);
    this.logger.debug(`Retrieved ${refs.length} captures for ${resolvedUrl}`);
    return refs;
  }

  /**
   * Parse a CDX JSON response: a header row followed by one row per capture.
   * Malformed rows are skipped.
   */
  parseResponse(body: unknown, url: string): SnapshotRef[] {
    let rows: unknown;
    try {
      rows = typeof body === 'string' ? (body.trim() === '' ? [] : JSON.parse(body)) : body;
    } catch (error) {
      throw new IndexError(`Unparsable CDX response for ${url}`, url, 'parse', { cause: error });
    }

    if (!Array.isArray(rows)) {
      throw new IndexError(`Unexpected CDX response shape for ${url}`, url, 'parse');
    }
    if (rows.length <= 1) {
      return [];
    }

    const header = rows[0];
    if (!isStringRow(header)) {
      throw new IndexError(`Missing CDX header row for ${url}`, url, 'parse');
    }

    const columns = new Map<string, number>(header.map((field, index) => [field, index]));
    const missing = CDX_FIELDS.filter((field) => !columns.has(field));
    if (missing.length > 0) {
      throw new IndexError(`CDX response for ${url} lacks fields: ${missing.join(', ')}`, url, 'parse');
    }

    const refs: SnapshotRef[] = [];
    for (const row of rows.slice(1)) {
      const ref = isStringRow(row) && row.length === header.length ? toSnapshotRef(row, columns) : null;
      if (ref) {
        refs.push(ref);
      } else {
        this.logger.warn(`Skipping invalid CDX row for ${url}`, {
          row: JSON.stringify(row).substring(0, 100),
        });
      }
    }

    return refs.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }
}

function buildQueryParams(url: string, startDate: string, endDate: string): URLSearchParams {
  const params = new URLSearchParams({
    url,
    output: 'json',
    from: startDate,
    to: endDate,
    fl: CDX_FIELDS.join(','),
  });
  for (const filter of CDX_FILTERS) {
    params.append('filter', filter);
  }
  return params;
}

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === 'string');
}

function toSnapshotRef(row: string[], columns: Map<string, number>): SnapshotRef | null {
  const field = (name: CDXField): string => row[columns.get(name) ?? -1] ?? '';

  const timestamp = field('timestamp');
  const digest = field('digest');
  if (!digest || digest === '-') {
    return null;
  }

  try {
    parseWaybackTimestamp(timestamp);
  } catch {
    return null;
  }

  return {
    timestamp,
    date: formatShortDate(timestamp),
    digest,
    original: field('original'),
    statusCode: field('statuscode'),
    mimeType: field('mimetype'),
  };
}
