/**
 * Retry Service
 * Backoff policy, per-operation retry state and cancellable sleeps
 */

import { CancelledError } from '../lib/errors.js';

export interface RequestRetryPolicy {
  /** Retries allowed after a 429 (default: 3) */
  maxRateLimitRetries: number;
  /** Wait used when a 429 carries no Retry-After (default: 30s) */
  defaultRetryAfterSeconds: number;
  /** Upper bound applied to Retry-After (default: 60s) */
  maxRetryAfterSeconds: number;
  /** Added per previous 429 retry (default: 2000ms) */
  rateLimitStepMs: number;
  /** Random jitter upper bound (default: 1000ms) */
  maxJitterMs: number;
  /** Retries allowed after a 5xx (default: 1) */
  maxServerErrorRetries: number;
  /** Fixed wait before a 5xx retry (default: 1000ms) */
  serverErrorDelayMs: number;
}

export const DEFAULT_REQUEST_RETRY_POLICY: RequestRetryPolicy = {
  maxRateLimitRetries: 3,
  defaultRetryAfterSeconds: 30,
  maxRetryAfterSeconds: 60,
  rateLimitStepMs: 2000,
  maxJitterMs: 1000,
  maxServerErrorRetries: 1,
  serverErrorDelayMs: 1000,
};

/** HTTP status codes treated as transient */
export const RETRYABLE_STATUSES = [
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
];

export function isRetryableStatus(
  status: number,
  retryableStatuses: number[] = RETRYABLE_STATUSES
): boolean {
  return retryableStatuses.includes(status) || (status >= 500 && status < 600);
}

/**
 * Retry bookkeeping for one logical request. Never shared between requests.
 */
export interface RetryState {
  /** 1-based number of the attempt in flight */
  attempt: number;
  consecutiveRateLimitHits: number;
  /** Delay applied before the current attempt */
  currentDelayMs: number;
  serverErrorRetries: number;
  /** True once the credential has been refreshed after a 401 */
  authRefreshed: boolean;
}

export function createRetryState(): RetryState {
  return {
    attempt: 1,
    consecutiveRateLimitHits: 0,
    currentDelayMs: 0,
    serverErrorRetries: 0,
    authRefreshed: false,
  };
}

/**
 * Parse a Retry-After header: delta-seconds or an HTTP date
 * @returns seconds, or undefined when absent/unparseable
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - now) / 1000));
}

/**
 * Seconds to honour for a 429: header value or default, capped
 */
export function effectiveRetryAfter(
  headerSeconds: number | undefined,
  policy: Pick<RequestRetryPolicy, 'defaultRetryAfterSeconds' | 'maxRetryAfterSeconds'> = DEFAULT_REQUEST_RETRY_POLICY
): number {
  const seconds = headerSeconds ?? policy.defaultRetryAfterSeconds;
  return Math.min(seconds, policy.maxRetryAfterSeconds);
}

/**
 * Delay before a 429 retry: retryAfter + retryIndex * step + jitter
 * @param retryIndex 0 for the first retry
 */
export function calculateRateLimitBackoff(
  retryAfterSeconds: number,
  retryIndex: number,
  policy: Pick<RequestRetryPolicy, 'rateLimitStepMs' | 'maxJitterMs'> = DEFAULT_REQUEST_RETRY_POLICY,
  random: () => number = Math.random
): number {
  const jitter = random() * policy.maxJitterMs;
  return retryAfterSeconds * 1000 + Math.max(0, retryIndex) * policy.rateLimitStepMs + jitter;
}

/**
 * Advance the state after a 429 and return the wait before the next attempt
 */
export function onRateLimited(
  state: RetryState,
  retryAfterSeconds: number,
  policy: RequestRetryPolicy = DEFAULT_REQUEST_RETRY_POLICY,
  random: () => number = Math.random
): RetryState {
  const delay = calculateRateLimitBackoff(retryAfterSeconds, state.consecutiveRateLimitHits, policy, random);
  return {
    ...state,
    attempt: state.attempt + 1,
    consecutiveRateLimitHits: state.consecutiveRateLimitHits + 1,
    currentDelayMs: delay,
  };
}

export function onServerError(
  state: RetryState,
  policy: RequestRetryPolicy = DEFAULT_REQUEST_RETRY_POLICY
): RetryState {
  return {
    ...state,
    attempt: state.attempt + 1,
    serverErrorRetries: state.serverErrorRetries + 1,
    currentDelayMs: policy.serverErrorDelayMs,
  };
}

export function onUnauthorized(state: RetryState): RetryState {
  return {
    ...state,
    attempt: state.attempt + 1,
    authRefreshed: true,
    currentDelayMs: 0,
  };
}

/**
 * Wait for a promise shared with other callers. Aborting stops this caller's wait only.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Sleep for the given duration; rejects with CancelledError when the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
