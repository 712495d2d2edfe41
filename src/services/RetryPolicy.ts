/**
 * Retry with exponential backoff for archive requests.
 * Timeouts, dropped connections, 429 and 5xx are retried; other failures are not.
 */

import { RetryConfig } from '../domain/models/types';

export const DEFAULT_RETRY: RetryConfig = {
  attempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
};

export interface HttpRequestErrorOptions {
  status?: number;
  code?: string;
  retryAfterMs?: number;
  transient: boolean;
  cause?: unknown;
}

/**
 * Transport-level failure of one HTTP attempt
 */
export class HttpRequestError extends Error {
  readonly status?: number;
  readonly code?: string;
  readonly retryAfterMs?: number;
  readonly transient: boolean;

  constructor(message: string, options: HttpRequestErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'HttpRequestError';
    this.status = options.status;
    this.code = options.code;
    this.retryAfterMs = options.retryAfterMs;
    this.transient = options.transient;
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date)
 * @returns Delay in milliseconds, or undefined when absent or unreadable
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

export type RetryListener = (error: HttpRequestError, attempt: number, delayMs: number) => void;

export class RetryPolicy {
  readonly config: RetryConfig;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: RetryConfig = DEFAULT_RETRY, sleep: (ms: number) => Promise<void> = delay) {
    this.config = config;
    this.sleep = sleep;
  }

  /**
   * Delay before the next attempt after `attempt` failed (1-based)
   */
  delayFor(attempt: number, retryAfterMs?: number): number {
    const backoff = this.config.baseDelayMs * 2 ** (attempt - 1);
    return Math.min(this.config.maxDelayMs, Math.max(backoff, retryAfterMs ?? 0));
  }

  /**
   * Run an operation, retrying transient HttpRequestErrors
   * @returns The operation's result from the first successful attempt
   */
  async execute<T>(operation: (attempt: number) => Promise<T>, onRetry?: RetryListener): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (!(error instanceof HttpRequestError) || !error.transient || attempt >= this.config.attempts) {
          throw error;
        }

        const delayMs = this.delayFor(attempt, error.retryAfterMs);
        onRetry?.(error, attempt, delayMs);
        await this.sleep(delayMs);
      }
    }
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
