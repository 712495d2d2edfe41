/**
 * HTTP access to the Wayback Machine's CDX and replay endpoints.
 * Every attempt waits on the shared RateLimiter; retries follow the RetryPolicy.
 */

import axios, { AxiosError, AxiosInstance, AxiosResponse, ResponseType } from 'axios';
import { LoggingService } from './LoggingService';
import { RateLimiter } from './RateLimiter';
import { HttpRequestError, RetryPolicy, isTransientStatus, parseRetryAfter } from './RetryPolicy';

export const WAYBACK_BASE_URL = 'https://web.archive.org';

export const DEFAULT_USER_AGENT = 'WaybackTemporalCrawler/1.0 (Research; rate-limited)';

/**
 * Browser user agent used for robots.txt requests
 */
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/124.0.0.0 Safari/537.36';

export interface ArchiveHttpClientOptions {
  userAgent?: string;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  /** Preconfigured axios instance, used as is; a new one is created when omitted */
  client?: AxiosInstance;
}

export interface ArchiveRequest {
  url: string;
  params?: URLSearchParams;
  responseType: ResponseType;
}

export interface ArchiveResponse {
  status: number;
  data: unknown;
  contentType?: string;
}

/**
 * ArchiveHttpClient issues rate-limited, retried GET requests
 */
export class ArchiveHttpClient {
  private client: AxiosInstance;
  private logger: LoggingService;
  private limiter: RateLimiter;
  private retryPolicy: RetryPolicy;

  constructor(limiter: RateLimiter, logger: LoggingService, options: ArchiveHttpClientOptions = {}) {
    this.limiter = limiter;
    this.logger = logger;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();

    if (options.client) {
      // Injected instances keep their own interceptors
      this.client = options.client;
      return;
    }

    this.client = axios.create({
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      },
    });

    // Add response interceptor for error logging
    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        this.logger.debug(`Request failed: ${error.config?.url ?? 'unknown URL'}`, {
          code: error.code,
          message: error.message,
        });
        return Promise.reject(error);
      }
    );
  }

  /**
   * GET a resource, retrying transient failures
   * @returns The first 2xx response
   * @throws HttpRequestError once retries are exhausted or on a permanent failure
   */
  async get(request: ArchiveRequest): Promise<ArchiveResponse> {
    return this.retryPolicy.execute(
      () => this.attempt(request),
      (error, attempt, delayMs) => {
        this.logger.warn(`Retrying ${request.url} after attempt ${attempt} failed: ${error.message}`, {
          status: error.status,
          code: error.code,
          delayMs,
        });
      }
    );
  }

  private async attempt(request: ArchiveRequest): Promise<ArchiveResponse> {
    await this.limiter.acquire();

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(request.url, {
        params: request.params,
        responseType: request.responseType,
        validateStatus: () => true,
      });
    } catch (error) {
      throw toRequestError(error, request.url);
    }

    const contentType = headerValue(response.headers['content-type']);

    if (response.status < 200 || response.status >= 300) {
      throw new HttpRequestError(`HTTP ${response.status} for ${request.url}`, {
        status: response.status,
        transient: isTransientStatus(response.status),
        retryAfterMs:
          response.status === 429 ? parseRetryAfter(headerValue(response.headers['retry-after'])) : undefined,
      });
    }

    return { status: response.status, data: response.data, contentType };
  }
}

function toRequestError(error: unknown, url: string): HttpRequestError {
  if (axios.isAxiosError(error)) {
    // No response means the request never completed: timeout, reset, DNS
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    return new HttpRequestError(
      timedOut ? `Request timeout for ${url}` : `Network error for ${url}: ${error.message}`,
      { code: error.code, transient: true, cause: error }
    );
  }

  return new HttpRequestError(`Request failed for ${url}: ${String(error)}`, {
    transient: false,
    cause: error,
  });
}

function headerValue(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return undefined;
}
