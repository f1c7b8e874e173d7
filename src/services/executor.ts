/**
 * Resilient Request Executor
 * Runs one logical Web API request: authorization, rate-limit gating,
 * 401 refresh, 429 backoff and 5xx retry, ending in a value or one classified error.
 */

import type { HttpMethod } from '../types/api.js';
import type { HttpTransport, QueryValue } from './http-transport.js';
import type { CredentialProvider } from './token-authority.js';
import { RateLimitTracker, readHeader, RATE_LIMIT_HEADERS } from './rate-limit-tracker.js';
import {
  DEFAULT_REQUEST_RETRY_POLICY,
  createRetryState,
  effectiveRetryAfter,
  onRateLimited,
  onServerError,
  onUnauthorized,
  parseRetryAfter,
  sleep,
  type RequestRetryPolicy,
} from './retry.js';
import {
  ApiError,
  AuthExpiredError,
  CancelledError,
  NetworkError,
  RateLimitedError,
  ServerError,
  isClientError,
  throwIfCancelled,
} from '../lib/errors.js';
import { generateRequestId, loggers } from '../lib/logger.js';
import { recordApiError, recordApiResponse, recordRetry } from '../lib/metrics.js';

export interface RequestSpec {
  method: HttpMethod;
  /** Path relative to the API base, or an absolute URL (paging links) */
  path: string;
  query?: Record<string, QueryValue>;
  body?: Record<string, unknown>;
}

export interface ApiResponse<T = unknown> {
  status: number;
  headers: Headers;
  /** Parsed body; undefined for 204 */
  data: T | undefined;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export interface ExecutorOptions {
  baseUrl: string;
  transport: HttpTransport;
  credentials: CredentialProvider;
  tracker: RateLimitTracker;
  policy?: Partial<RequestRetryPolicy>;
  /** Per-attempt timeout (ms) */
  timeoutMs?: number;
  /** Jitter source; injectable for tests */
  random?: () => number;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Best human-readable message from a Web API error body
 */
export function extractErrorMessage(data: unknown, status: number, statusText = ''): string {
  if (typeof data === 'object' && data !== null) {
    const error: unknown = Reflect.get(data, 'error');
    if (typeof error === 'object' && error !== null) {
      const message: unknown = Reflect.get(error, 'message');
      if (typeof message === 'string' && message !== '') {
        return message;
      }
    }

    const description: unknown = Reflect.get(data, 'error_description');
    if (typeof description === 'string' && description !== '') {
      return description;
    }
    if (typeof error === 'string' && error !== '') {
      return error;
    }

    const message: unknown = Reflect.get(data, 'message');
    if (typeof message === 'string' && message !== '') {
      return message;
    }
  }

  return `HTTP ${status}${statusText ? ` ${statusText}` : ''}`;
}

export class ResilientRequestExecutor {
  private baseUrl: string;
  private transport: HttpTransport;
  private credentials: CredentialProvider;
  private tracker: RateLimitTracker;
  private policy: RequestRetryPolicy;
  private timeoutMs: number;
  private random: () => number;

  constructor(options: ExecutorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.transport = options.transport;
    this.credentials = options.credentials;
    this.tracker = options.tracker;
    this.policy = { ...DEFAULT_REQUEST_RETRY_POLICY, ...options.policy };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.random = options.random ?? Math.random;
  }

  /**
   * Execute a request and return the raw response
   */
  async execute(spec: RequestSpec, options: ExecuteOptions = {}): Promise<ApiResponse> {
    const requestId = generateRequestId();
    const url = this.resolveUrl(spec.path);
    const startTime = Date.now();

    loggers.api.debug('API request started', { requestId, method: spec.method, url });

    try {
      const response = await this.run(spec, url, requestId, options.signal);
      loggers.api.info('API request completed', {
        requestId,
        method: spec.method,
        url,
        statusCode: response.status,
        duration: Date.now() - startTime,
      });
      return response;
    } catch (error) {
      if (isClientError(error)) {
        recordApiError(error.code);
      }
      if (!(error instanceof CancelledError)) {
        loggers.api.error('API request failed', error instanceof Error ? error : null, {
          requestId,
          method: spec.method,
          url,
          duration: Date.now() - startTime,
        });
      }
      throw error;
    }
  }

  /**
   * Execute and narrow the body with a parser
   */
  async request<T>(spec: RequestSpec, parse: (data: unknown) => T, options: ExecuteOptions = {}): Promise<T> {
    const response = await this.execute(spec, options);
    return parse(response.data);
  }

  private resolveUrl(path: string): string {
    if (/^https?:\/\//i.test(path)) {
      return path;
    }
    return `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
  }

  private async waitForQuota(requestId: string, signal?: AbortSignal): Promise<void> {
    if (this.tracker.isSafeToSend()) {
      return;
    }

    const { waitSeconds } = this.tracker.status();
    const waitMs = Math.min(waitSeconds, this.policy.maxRetryAfterSeconds) * 1000;
    if (waitMs <= 0) {
      return;
    }

    loggers.rateLimit.info('Waiting for rate limit window before sending', { requestId, waitMs });
    await sleep(waitMs, signal);
  }

  private async run(spec: RequestSpec, url: string, requestId: string, signal?: AbortSignal): Promise<ApiResponse> {
    let state = createRetryState();

    await this.waitForQuota(requestId, signal);

    for (;;) {
      throwIfCancelled(signal);

      const credential = await this.credentials.getValidCredential(signal);
      const attemptStart = Date.now();

      const outcome = await this.transport.send({
        method: spec.method,
        url,
        query: spec.query,
        body: spec.body,
        headers: {
          Authorization: `Bearer ${credential.accessToken}`,
        },
        timeoutMs: this.timeoutMs,
        signal,
      });

      if (outcome.kind === 'cancelled') {
        throw new CancelledError();
      }
      if (outcome.kind === 'network-error') {
        throw new NetworkError(
          outcome.timedOut
            ? `Request timed out after ${this.timeoutMs}ms`
            : `Network error: ${outcome.error.message}`,
          outcome.error
        );
      }

      const { status } = outcome;
      recordApiResponse(spec.method, status, Date.now() - attemptStart);
      this.tracker.record(outcome.headers, status);

      if (status >= 200 && status < 300) {
        return {
          status,
          headers: outcome.headers,
          data: status === 204 ? undefined : outcome.data,
        };
      }

      if (status === 401) {
        if (state.authRefreshed) {
          throw new AuthExpiredError();
        }
        state = onUnauthorized(state);
        recordRetry('unauthorized');
        loggers.retry.info('Access token rejected, refreshing', { requestId, attempt: state.attempt });
        await this.credentials.refreshAfterRejection(credential.accessToken, signal);
        continue;
      }

      if (status === 429) {
        const retryAfter = effectiveRetryAfter(
          parseRetryAfter(readHeader(outcome.headers, RATE_LIMIT_HEADERS.RETRY_AFTER)),
          this.policy
        );
        if (state.consecutiveRateLimitHits >= this.policy.maxRateLimitRetries) {
          throw new RateLimitedError(retryAfter, state.attempt);
        }
        state = onRateLimited(state, retryAfter, this.policy, this.random);
        recordRetry('rate_limit');
        loggers.retry.warn('Rate limited, backing off', {
          requestId,
          attempt: state.attempt,
          retryAfter,
          delayMs: Math.round(state.currentDelayMs),
        });
        await sleep(state.currentDelayMs, signal);
        continue;
      }

      if (status >= 500) {
        if (state.serverErrorRetries >= this.policy.maxServerErrorRetries) {
          throw new ServerError(status);
        }
        state = onServerError(state, this.policy);
        recordRetry('server_error');
        loggers.retry.warn('Server error, retrying', {
          requestId,
          statusCode: status,
          attempt: state.attempt,
          delayMs: state.currentDelayMs,
        });
        await sleep(state.currentDelayMs, signal);
        continue;
      }

      throw new ApiError(status, extractErrorMessage(outcome.data, status, outcome.statusText));
    }
  }
}
