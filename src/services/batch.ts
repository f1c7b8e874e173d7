/**
 * Batch Orchestrator
 * Runs an operation over many items in chunks, adapting concurrency and
 * pacing to rate limiting. Never aborts early; every item gets a result.
 */

import {
  CancelledError,
  RateLimitedError,
  toClientError,
  type ClientError,
} from '../lib/errors.js';
import { formatDuration, loggers } from '../lib/logger.js';
import { recordBatchItem } from '../lib/metrics.js';
import { sleep } from './retry.js';

export interface BatchItemResult<R = unknown> {
  readonly itemId: string;
  /** Position in the input */
  readonly index: number;
  readonly succeeded: boolean;
  readonly value?: R;
  readonly error?: ClientError;
}

export interface BatchChunkReport {
  chunkIndex: number;
  /** Items settled so far, across all chunks */
  processed: number;
  total: number;
  succeeded: number;
  failed: number;
  rateLimited: boolean;
  consecutiveRateLimitedChunks: number;
  /** Concurrency and delay in effect for the next chunk */
  concurrency: number;
  delayMs: number;
}

export interface BatchOperationContext {
  index: number;
  signal?: AbortSignal;
}

export interface BatchOptions<T> {
  /** Initial chunk size (default: 8) */
  maxConcurrency?: number;
  /** Initial pause between chunks (default: 100ms) */
  batchDelayMs?: number;
  /** Identifier recorded on each result (default: String(item)) */
  getId?: (item: T, index: number) => string;
  signal?: AbortSignal;
  onChunk?: (report: BatchChunkReport) => void;
}

export const BATCH_DEFAULTS = {
  maxConcurrency: 8,
  batchDelayMs: 100,
  maxDelayMs: 5000,
  /** Consecutive rate-limited chunks before slowing down */
  rateLimitedChunkThreshold: 3,
} as const;

// Longest delay setTimeout honours; larger values fire after 1ms.
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export function succeeded<R>(itemId: string, index: number, value: R): BatchItemResult<R> {
  return Object.freeze({ itemId, index, succeeded: true, value });
}

export function failed<R>(itemId: string, index: number, error: ClientError): BatchItemResult<R> {
  return Object.freeze({ itemId, index, succeeded: false, error });
}

function toConcurrency(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(1, Math.floor(value));
}

function toDelay(value: number | undefined, fallback: number): number {
  if (value === undefined || Number.isNaN(value)) {
    return fallback;
  }
  return Math.min(MAX_TIMER_DELAY_MS, Math.max(0, value));
}

export class BatchOrchestrator {
  private defaults: { maxConcurrency: number; batchDelayMs: number };

  constructor(defaults: { maxConcurrency?: number; batchDelayMs?: number } = {}) {
    this.defaults = {
      maxConcurrency: toConcurrency(defaults.maxConcurrency, BATCH_DEFAULTS.maxConcurrency),
      batchDelayMs: toDelay(defaults.batchDelayMs, BATCH_DEFAULTS.batchDelayMs),
    };
  }

  async run<T, R>(
    items: readonly T[],
    operation: (item: T, context: BatchOperationContext) => Promise<R>,
    options: BatchOptions<T> = {}
  ): Promise<BatchItemResult<R>[]> {
    const getId = options.getId ?? ((item: T) => String(item));
    const signal = options.signal;
    const results: BatchItemResult<R>[] = [];

    let concurrency = toConcurrency(options.maxConcurrency, this.defaults.maxConcurrency);
    let delayMs = toDelay(options.batchDelayMs, this.defaults.batchDelayMs);
    let consecutiveRateLimited = 0;
    let chunkIndex = 0;
    let cursor = 0;
    const startTime = Date.now();

    loggers.batch.info('Batch started', { total: items.length, concurrency, delayMs });

    while (cursor < items.length) {
      if (signal?.aborted) {
        for (let index = cursor; index < items.length; index++) {
          results.push(failed<R>(getId(items[index], index), index, new CancelledError()));
          recordBatchItem(false);
        }
        loggers.batch.warn('Batch cancelled', { processed: cursor, total: items.length });
        break;
      }

      const start = cursor;
      const chunk = items.slice(start, start + concurrency);
      // async wrapper turns a synchronous throw into a rejected item
      const settled = await Promise.allSettled(
        chunk.map(async (item, offset) => operation(item, { index: start + offset, signal }))
      );

      let chunkSucceeded = 0;
      let chunkRateLimited = false;

      for (let offset = 0; offset < settled.length; offset++) {
        const outcome = settled[offset];
        const index = start + offset;
        const itemId = getId(chunk[offset], index);
        if (outcome.status === 'fulfilled') {
          chunkSucceeded++;
          results.push(succeeded(itemId, index, outcome.value));
          recordBatchItem(true);
          continue;
        }

        const error = toClientError(outcome.reason);
        if (error instanceof RateLimitedError) {
          chunkRateLimited = true;
        }
        results.push(failed<R>(itemId, index, error));
        recordBatchItem(false);
        loggers.batch.debug('Batch item failed', { itemId, code: error.code });
      }

      cursor += chunk.length;

      if (chunkRateLimited) {
        consecutiveRateLimited++;
      } else if (chunkSucceeded > 0) {
        consecutiveRateLimited = 0;
      }

      if (consecutiveRateLimited >= BATCH_DEFAULTS.rateLimitedChunkThreshold) {
        concurrency = Math.max(1, concurrency - 1);
        delayMs = Math.min(BATCH_DEFAULTS.maxDelayMs, delayMs * 2);
        loggers.batch.warn('Sustained rate limiting, slowing down', {
          consecutiveRateLimited,
          concurrency,
          delayMs,
        });
      }

      options.onChunk?.({
        chunkIndex,
        processed: cursor,
        total: items.length,
        succeeded: chunkSucceeded,
        failed: chunk.length - chunkSucceeded,
        rateLimited: chunkRateLimited,
        consecutiveRateLimitedChunks: consecutiveRateLimited,
        concurrency,
        delayMs,
      });
      chunkIndex++;

      if (cursor < items.length) {
        const pause = chunkRateLimited ? Math.min(MAX_TIMER_DELAY_MS, delayMs * 2) : delayMs;
        try {
          await sleep(pause, signal);
        } catch (error) {
          if (!(error instanceof CancelledError)) {
            throw error;
          }
          // Remaining items are recorded as cancelled at the top of the loop.
        }
      }
    }

    const failures = results.filter((result) => !result.succeeded).length;
    loggers.batch.info('Batch finished', {
      total: items.length,
      succeeded: items.length - failures,
      failed: failures,
      elapsed: formatDuration(Date.now() - startTime),
    });

    return results;
  }
}
