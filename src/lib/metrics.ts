/**
 * Prometheus metrics
 * Tracks API traffic, token refreshes, rate limiting, retries and batch runs.
 */

import { Registry, Counter, Histogram } from 'prom-client';

export const registry = new Registry();

export const apiRequestsTotal = new Counter({
  name: 'api_requests_total',
  help: 'Web API responses received',
  labelNames: ['method', 'status'],
  registers: [registry],
});

export const apiRequestDurationSeconds = new Histogram({
  name: 'api_request_duration_seconds',
  help: 'Web API round-trip latency (seconds)',
  labelNames: ['method'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1.0, 2.0, 5.0],
  registers: [registry],
});

export const apiErrorsTotal = new Counter({
  name: 'api_errors_total',
  help: 'Requests that ended in a classified error',
  labelNames: ['code'],
  registers: [registry],
});

export const tokenRefreshesTotal = new Counter({
  name: 'token_refreshes_total',
  help: 'Token refresh calls by outcome',
  labelNames: ['outcome'], // 'success' | 'transient' | 'definite' | 'rejected'
  registers: [registry],
});

export const rateLimitHitsTotal = new Counter({
  name: 'rate_limit_hits_total',
  help: 'HTTP 429 responses received',
  registers: [registry],
});

export const retryAttemptsTotal = new Counter({
  name: 'retry_attempts_total',
  help: 'Retries scheduled by the request executor',
  labelNames: ['reason'], // 'rate_limit' | 'server_error' | 'unauthorized'
  registers: [registry],
});

export const batchItemsTotal = new Counter({
  name: 'batch_items_total',
  help: 'Batch items processed by outcome',
  labelNames: ['outcome'], // 'success' | 'failure'
  registers: [registry],
});

export type RefreshOutcome = 'success' | 'transient' | 'definite' | 'rejected';
export type RetryReason = 'rate_limit' | 'server_error' | 'unauthorized';

export function recordApiResponse(method: string, status: number, durationMs: number): void {
  apiRequestsTotal.inc({ method, status: String(status) });
  apiRequestDurationSeconds.observe({ method }, durationMs / 1000);
  if (status === 429) {
    rateLimitHitsTotal.inc();
  }
}

export function recordApiError(code: string): void {
  apiErrorsTotal.inc({ code });
}

export function recordTokenRefresh(outcome: RefreshOutcome): void {
  tokenRefreshesTotal.inc({ outcome });
}

export function recordRetry(reason: RetryReason): void {
  retryAttemptsTotal.inc({ reason });
}

export function recordBatchItem(success: boolean): void {
  batchItemsTotal.inc({ outcome: success ? 'success' : 'failure' });
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}

/**
 * Reset all metrics (tests)
 */
export function resetMetrics(): void {
  registry.resetMetrics();
}
