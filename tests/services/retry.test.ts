/**
 * Retry Service Tests
 * Backoff arithmetic, retry state transitions and cancellable waits
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_REQUEST_RETRY_POLICY,
  calculateRateLimitBackoff,
  createRetryState,
  effectiveRetryAfter,
  isRetryableStatus,
  onRateLimited,
  onServerError,
  onUnauthorized,
  parseRetryAfter,
  raceWithSignal,
  sleep,
} from '../../src/services/retry.js';
import { CancelledError } from '../../src/lib/errors.js';

describe('parseRetryAfter', () => {
  it('should parse delta-seconds', () => {
    expect(parseRetryAfter('5')).toBe(5);
    expect(parseRetryAfter(' 12 ')).toBe(12);
  });

  it('should parse an HTTP date relative to now', () => {
    const now = Date.UTC(2026, 0, 1, 12, 0, 0);
    expect(parseRetryAfter('Thu, 01 Jan 2026 12:00:30 GMT', now)).toBe(30);
  });

  it('should clamp a date in the past to zero', () => {
    const now = Date.UTC(2026, 0, 1, 12, 0, 0);
    expect(parseRetryAfter('Thu, 01 Jan 2026 11:00:00 GMT', now)).toBe(0);
  });

  it('should return undefined for missing or garbage values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('effectiveRetryAfter', () => {
  it('should default to 30 seconds', () => {
    expect(effectiveRetryAfter(undefined)).toBe(30);
  });

  it('should cap at 60 seconds', () => {
    expect(effectiveRetryAfter(600)).toBe(60);
    expect(effectiveRetryAfter(45)).toBe(45);
  });
});

describe('calculateRateLimitBackoff', () => {
  it('should add a step per previous retry', () => {
    expect(calculateRateLimitBackoff(5, 0, DEFAULT_REQUEST_RETRY_POLICY, () => 0)).toBe(5000);
    expect(calculateRateLimitBackoff(5, 1, DEFAULT_REQUEST_RETRY_POLICY, () => 0)).toBe(7000);
    expect(calculateRateLimitBackoff(5, 2, DEFAULT_REQUEST_RETRY_POLICY, () => 0)).toBe(9000);
  });

  it('should add up to one second of jitter', () => {
    expect(calculateRateLimitBackoff(1, 0, DEFAULT_REQUEST_RETRY_POLICY, () => 0.5)).toBe(1500);
  });

  it('should never wait less than Retry-After', () => {
    for (let i = 0; i < 20; i++) {
      expect(calculateRateLimitBackoff(2, 0)).toBeGreaterThanOrEqual(2000);
    }
  });
});

describe('retry state', () => {
  it('should start at the first attempt', () => {
    expect(createRetryState()).toEqual({
      attempt: 1,
      consecutiveRateLimitHits: 0,
      currentDelayMs: 0,
      serverErrorRetries: 0,
      authRefreshed: false,
    });
  });

  it('should count rate-limit hits', () => {
    const first = onRateLimited(createRetryState(), 3, DEFAULT_REQUEST_RETRY_POLICY, () => 0);
    const second = onRateLimited(first, 3, DEFAULT_REQUEST_RETRY_POLICY, () => 0);

    expect(first).toMatchObject({ attempt: 2, consecutiveRateLimitHits: 1, currentDelayMs: 3000 });
    expect(second).toMatchObject({ attempt: 3, consecutiveRateLimitHits: 2, currentDelayMs: 5000 });
  });

  it('should use the fixed server error delay', () => {
    expect(onServerError(createRetryState())).toMatchObject({
      attempt: 2,
      serverErrorRetries: 1,
      currentDelayMs: 1000,
    });
  });

  it('should mark the credential as refreshed', () => {
    expect(onUnauthorized(createRetryState())).toMatchObject({ attempt: 2, authRefreshed: true });
  });

  it('should not mutate the previous state', () => {
    const state = createRetryState();
    onServerError(state);
    expect(state.attempt).toBe(1);
  });
});

describe('isRetryableStatus', () => {
  it('should treat 429 and 5xx as transient', () => {
    expect(isRetryableStatus(429)).toBe(true);
    expect(isRetryableStatus(503)).toBe(true);
    expect(isRetryableStatus(599)).toBe(true);
  });

  it('should treat other 4xx as final', () => {
    expect(isRetryableStatus(400)).toBe(false);
    expect(isRetryableStatus(404)).toBe(false);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('should reject when the signal fires', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('should reject at once for an aborted signal', async () => {
    await expect(sleep(10, AbortSignal.abort())).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('raceWithSignal', () => {
  it('should pass the value through', async () => {
    await expect(raceWithSignal(Promise.resolve(7), new AbortController().signal)).resolves.toBe(7);
  });

  it('should stop waiting without settling the shared promise', async () => {
    const controller = new AbortController();
    let release: (value: string) => void = () => undefined;
    const shared = new Promise<string>((resolve) => {
      release = resolve;
    });

    const waiting = raceWithSignal(shared, controller.signal);
    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(CancelledError);

    release('still delivered');
    await expect(shared).resolves.toBe('still delivered');
  });
});
