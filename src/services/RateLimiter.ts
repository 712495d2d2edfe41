/**
 * Process-wide rate limiting for calls to the Wayback Machine.
 * One instance is shared by every component that talks to the archive.
 */

import { RateLimitConfig } from '../domain/models/types';

export interface RateLimiter {
  /**
   * Wait until one outbound call is permitted
   * @returns The time (ms since epoch) the call was granted
   */
  acquire(): Promise<number>;
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  maxCalls: 3,
  periodMs: 1000,
};

/**
 * Sliding-window limiter: no more than maxCalls grants in any periodMs window.
 * Waiters are served in arrival order through a promise chain.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly maxCalls: number;
  private readonly periodMs: number;
  private readonly clock: () => number;
  private readonly grants: number[] = [];
  private tail: Promise<unknown> = Promise.resolve();

  constructor(config: RateLimitConfig = DEFAULT_RATE_LIMIT, clock: () => number = Date.now) {
    if (!Number.isInteger(config.maxCalls) || config.maxCalls < 1) {
      throw new RangeError(`maxCalls must be a positive integer, got ${config.maxCalls}`);
    }
    if (!(config.periodMs > 0)) {
      throw new RangeError(`periodMs must be positive, got ${config.periodMs}`);
    }
    this.maxCalls = config.maxCalls;
    this.periodMs = config.periodMs;
    this.clock = clock;
  }

  acquire(): Promise<number> {
    const grant = this.tail.then(() => this.waitForSlot());
    this.tail = grant.catch(() => undefined);
    return grant;
  }

  private async waitForSlot(): Promise<number> {
    for (;;) {
      const now = this.clock();
      while (this.grants.length > 0 && now - this.grants[0] >= this.periodMs) {
        this.grants.shift();
      }

      if (this.grants.length < this.maxCalls) {
        this.grants.push(now);
        return now;
      }

      await delay(this.grants[0] + this.periodMs - now);
    }
  }
}

/**
 * Grants every call immediately
 */
export class NoopRateLimiter implements RateLimiter {
  async acquire(): Promise<number> {
    return Date.now();
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(1, ms)));
}
