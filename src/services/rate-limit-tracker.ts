/**
 * Rate Limit Tracker
 * Rolling view of the quota the Web API advertises in its response headers.
 * Reports only; callers decide whether to wait.
 */

import { loggers } from '../lib/logger.js';
import { parseRetryAfter } from './retry.js';

export type HeaderSource = Headers | Record<string, string | undefined>;

export interface RateLimitSnapshot {
  limit?: number;
  remaining?: number;
  /** Unix timestamp (ms) at which the window resets */
  resetAt?: number;
  /** Seconds, as sent with the last response */
  retryAfter?: number;
  /** Unix timestamp (ms) of the last recorded response; 0 before any */
  observedAt: number;
  isRateLimited: boolean;
}

export interface RateLimitStatus {
  isRateLimited: boolean;
  waitSeconds: number;
}

// Values below this are read as "seconds from now" rather than an epoch.
const EPOCH_SECONDS_THRESHOLD = 1_000_000_000;

export const RATE_LIMIT_HEADERS = {
  LIMIT: 'x-ratelimit-limit',
  REMAINING: 'x-ratelimit-remaining',
  RESET: 'x-ratelimit-reset',
  RETRY_AFTER: 'retry-after',
} as const;

/**
 * Case-insensitive header lookup over fetch Headers or a plain record
 */
export function readHeader(headers: HeaderSource, name: string): string | undefined {
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function emptySnapshot(): RateLimitSnapshot {
  return { observedAt: 0, isRateLimited: false };
}

export class RateLimitTracker {
  private state: RateLimitSnapshot = emptySnapshot();

  /**
   * Update the snapshot from one response
   */
  record(headers: HeaderSource, statusCode: number): void {
    const now = Date.now();
    const next: RateLimitSnapshot = { ...this.state, observedAt: now };

    const limit = parseInteger(readHeader(headers, RATE_LIMIT_HEADERS.LIMIT));
    if (limit !== undefined) {
      next.limit = limit;
    }

    const remaining = parseInteger(readHeader(headers, RATE_LIMIT_HEADERS.REMAINING));
    if (remaining !== undefined) {
      next.remaining = remaining;
    } else if (statusCode < 400 && next.remaining !== undefined && next.remaining <= 0) {
      // The request was accepted, so an exhausted count is stale.
      next.remaining = undefined;
    }

    const reset = parseInteger(readHeader(headers, RATE_LIMIT_HEADERS.RESET));
    if (reset !== undefined) {
      next.resetAt = reset >= EPOCH_SECONDS_THRESHOLD ? reset * 1000 : now + reset * 1000;
    } else if (next.resetAt !== undefined && next.resetAt <= now) {
      next.resetAt = undefined;
    }

    next.retryAfter = parseRetryAfter(readHeader(headers, RATE_LIMIT_HEADERS.RETRY_AFTER), now);

    next.isRateLimited =
      statusCode === 429 || (next.remaining !== undefined && next.remaining <= 0);

    if (next.isRateLimited) {
      loggers.rateLimit.warn('Rate limit reached', {
        statusCode,
        remaining: next.remaining,
        retryAfter: next.retryAfter,
        resetAt: next.resetAt,
      });
    }

    this.state = next;
  }

  status(): RateLimitStatus {
    const now = Date.now();
    if (!this.state.isRateLimited || this.hasLapsed(now)) {
      return { isRateLimited: false, waitSeconds: 0 };
    }
    return { isRateLimited: true, waitSeconds: this.waitSeconds(now) };
  }

  isSafeToSend(): boolean {
    const now = Date.now();
    if (this.status().isRateLimited) {
      return false;
    }
    const remaining = this.resetHasPassed(now) ? this.state.limit : this.state.remaining;
    return remaining === undefined || remaining > 0;
  }

  snapshot(): RateLimitSnapshot {
    return { ...this.state };
  }

  reset(): void {
    this.state = emptySnapshot();
  }

  private resetHasPassed(now: number): boolean {
    return this.state.resetAt !== undefined && now >= this.state.resetAt;
  }

  private retryWindowHasPassed(now: number): boolean {
    return (
      this.state.retryAfter !== undefined &&
      now >= this.state.observedAt + this.state.retryAfter * 1000
    );
  }

  private hasLapsed(now: number): boolean {
    return this.resetHasPassed(now) || this.retryWindowHasPassed(now);
  }

  private waitSeconds(now: number): number {
    if (this.state.retryAfter !== undefined) {
      return Math.max(0, Math.ceil((this.state.observedAt + this.state.retryAfter * 1000 - now) / 1000));
    }
    if (this.state.resetAt !== undefined) {
      return Math.max(0, Math.ceil((this.state.resetAt - now) / 1000));
    }
    return 0;
  }
}
