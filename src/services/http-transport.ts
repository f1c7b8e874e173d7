/**
 * HTTP Transport
 * Sends one request and reports what happened as a value, never as a thrown HTTP error.
 */

import { ofetch, type FetchOptions, type FetchResponse } from 'ofetch';
import type { HttpMethod } from '../types/api.js';

export type QueryValue = string | number | boolean | undefined;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, QueryValue>;
  /** Objects are sent as JSON, strings as-is */
  body?: string | Record<string, unknown>;
  /** Per-request deadline (ms) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type HttpOutcome =
  | {
      kind: 'response';
      status: number;
      statusText: string;
      headers: Headers;
      data: unknown;
    }
  | {
      kind: 'network-error';
      error: Error;
      timedOut: boolean;
    }
  | { kind: 'cancelled' };

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpOutcome>;
}

export type RawFetcher = (
  url: string,
  options: FetchOptions<'json'>
) => Promise<FetchResponse<unknown>>;

const defaultFetcher: RawFetcher = (url, options) => ofetch.raw<unknown>(url, options);

function compactQuery(query: Record<string, QueryValue>): Record<string, string | number | boolean> {
  const result: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * ofetch-backed transport. Library retries are disabled; retry policy belongs to the executor.
 */
export class OfetchTransport implements HttpTransport {
  private fetcher: RawFetcher;

  constructor(fetcher: RawFetcher = defaultFetcher) {
    this.fetcher = fetcher;
  }

  async send(request: HttpRequest): Promise<HttpOutcome> {
    if (request.signal?.aborted) {
      return { kind: 'cancelled' };
    }

    const timeoutSignal = request.timeoutMs !== undefined ? AbortSignal.timeout(request.timeoutMs) : undefined;
    const signals = [request.signal, timeoutSignal].filter(
      (signal): signal is AbortSignal => signal !== undefined
    );

    try {
      const response = await this.fetcher(request.url, {
        method: request.method,
        headers: request.headers,
        query: request.query ? compactQuery(request.query) : undefined,
        body: request.body,
        signal: signals.length > 0 ? AbortSignal.any(signals) : undefined,
        retry: 0,
        ignoreResponseError: true,
      });

      return {
        kind: 'response',
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
        data: response._data,
      };
    } catch (error) {
      if (request.signal?.aborted) {
        return { kind: 'cancelled' };
      }

      return {
        kind: 'network-error',
        error: error instanceof Error ? error : new Error(String(error)),
        timedOut: timeoutSignal?.aborted === true,
      };
    }
  }
}
