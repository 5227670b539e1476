/**
 * Fixed-interval rate limiting for outbound calls.
 *
 * @module search/rate-limiter
 */

import { RATE_LIMITS, CALL_COUNT_LOG_INTERVAL, type CallKind } from '../config/limits.js';
import { silentLogger, type Logger } from '../logger.js';

/**
 * Sleep for a specified duration.
 *
 * @param ms - Duration in milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RateLimiterOptions {
  /** Minimum interval per call kind (defaults to RATE_LIMITS) */
  intervals?: Record<CallKind, number>;
  logger?: Logger;
  /** Clock, replaceable in tests */
  now?: () => number;
  /** Sleep, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Enforces a minimum delay between consecutive calls of the same kind.
 *
 * There is no retry or backoff state: callers await `acquire()` before each
 * request, and the limiter sleeps only for whatever part of the interval has
 * not already elapsed.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter();
 *
 * for (const keyword of keywords) {
 *   await limiter.acquire('search');
 *   await client.searchText(keyword);
 * }
 * ```
 */
export class RateLimiter {
  private readonly intervals: Record<CallKind, number>;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleepFn: (ms: number) => Promise<void>;

  /** Time of the previous call per kind (undefined before the first call) */
  private readonly lastCall = new Map<CallKind, number>();
  private totalCalls = 0;

  constructor(options: RateLimiterOptions = {}) {
    this.intervals = options.intervals ?? { ...RATE_LIMITS };
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.sleepFn = options.sleep ?? sleep;
  }

  /**
   * Wait until a call of the given kind may be made, then record it.
   *
   * @returns Milliseconds spent waiting
   */
  async acquire(kind: CallKind): Promise<number> {
    const last = this.lastCall.get(kind);
    let waited = 0;

    if (last !== undefined) {
      const remaining = this.intervals[kind] - (this.now() - last);
      if (remaining > 0) {
        this.logger.debug(`Rate limiting: waiting ${(remaining / 1000).toFixed(1)}s before ${kind} call`);
        await this.sleepFn(remaining);
        waited = remaining;
      }
    }

    this.lastCall.set(kind, this.now());
    this.totalCalls++;

    if (this.totalCalls % CALL_COUNT_LOG_INTERVAL === 0) {
      this.logger.info(`Total outbound calls made: ${this.totalCalls}`);
    }

    return waited;
  }

  /**
   * Number of calls admitted so far, across all kinds.
   */
  getTotalCalls(): number {
    return this.totalCalls;
  }
}
