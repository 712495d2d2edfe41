/**
 * Fetches archived bodies from the Wayback Machine replay endpoint
 */

import { TextDecoder } from 'util';
import { ArchiveHttpClient, WAYBACK_BASE_URL } from '../../services/ArchiveHttpClient';
import { LoggingService } from '../../services/LoggingService';
import { HttpRequestError } from '../../services/RetryPolicy';
import { DecodeError, FetchError } from '../errors';

/**
 * Replay URL returning the original captured bytes ("id_" disables the archive's rewriting)
 */
export function replayUrl(url: string, timestamp: string): string {
  return `${WAYBACK_BASE_URL}/web/${timestamp}id_/${url}`;
}

/**
 * Read the charset parameter of a Content-Type header
 */
export function charsetOf(contentType: string | undefined): string | undefined {
  const match = contentType ? /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType) : null;
  return match ? match[1].toLowerCase() : undefined;
}

/**
 * Decode bytes strictly, trying the declared charset and then UTF-8
 * @returns The decoded text, or null when no candidate decodes cleanly
 */
export function decodeBody(bytes: Uint8Array, contentType?: string): string | null {
  const candidates = [charsetOf(contentType), 'utf-8'].filter(
    (label, index, all): label is string => label !== undefined && all.indexOf(label) === index
  );

  for (const label of candidates) {
    let decoder: TextDecoder;
    try {
      decoder = new TextDecoder(label, { fatal: true });
    } catch {
      // Unknown charset label
      continue;
    }

    try {
      return decoder.decode(bytes);
    } catch {
      continue;
    }
  }

  return null;
}

function toBytes(data: unknown): Uint8Array | null {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf-8');
  }
  return null;
}

export class ContentFetcher {
  private http: ArchiveHttpClient;
  private logger: LoggingService;

  constructor(http: ArchiveHttpClient, logger: LoggingService) {
    this.http = http;
    this.logger = logger;
  }

  /**
   * Fetch the body of one capture as text
   * @param resolvedUrl - Original URL of the capture
   * @param timestamp - Wayback timestamp (YYYYMMDDHHMMSS)
   * @throws FetchError after retries, DecodeError when the bytes are not text
   */
  async fetch(resolvedUrl: string, timestamp: string): Promise<string> {
    const url = replayUrl(resolvedUrl, timestamp);
    this.logger.debug(`Fetching snapshot: ${url}`);

    let bytes: Uint8Array | null;
    let contentType: string | undefined;
    try {
      const response = await this.http.get({ url, responseType: 'arraybuffer' });
      bytes = toBytes(response.data);
      contentType = response.contentType;
    } catch (error) {
      if (error instanceof HttpRequestError) {
        throw new FetchError(
          `Failed to fetch snapshot ${url}: ${error.message}`,
          resolvedUrl,
          timestamp,
          error.status === undefined ? 'network' : 'http',
          { status: error.status, transient: error.transient, cause: error }
        );
      }
      throw error;
    }

    const text = bytes ? decodeBody(bytes, contentType) : null;
    if (text === null) {
      throw new DecodeError(`Snapshot body is not decodable text: ${url}`, resolvedUrl, timestamp);
    }

    return text;
  }
}
