/**
 * Shared output for commands that remove or unfollow many items
 */

import type { OutputFormat } from '../types/config.js';
import type { BatchItemResult } from '../services/batch.js';
import type { RemovalOptions } from '../services/library.js';
import { describeError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { EXIT_CODES, formatJSON, output } from './output.js';
import { parseIntegerOption } from './command.js';

export type RemovalStatus = 'removed' | 'unfollowed';

export interface RemovalRow {
  id: string;
  status: RemovalStatus | 'failed';
  error: string;
}

export function toRemovalRows(results: BatchItemResult<void>[], done: RemovalStatus = 'removed'): RemovalRow[] {
  return results.map((result) => ({
    id: result.itemId,
    status: result.succeeded ? done : 'failed',
    error: result.error ? describeError(result.error).message : '',
  }));
}

/**
 * Batch options from `--concurrency` and `--delay`, with per-chunk progress on the batch logger
 */
export function toRemovalOptions(
  options: { concurrency?: string; delay?: string },
  signal: AbortSignal
): RemovalOptions {
  return {
    maxConcurrency:
      options.concurrency !== undefined ? parseIntegerOption(options.concurrency, '--concurrency', 1) : undefined,
    batchDelayMs: options.delay !== undefined ? parseIntegerOption(options.delay, '--delay', 0) : undefined,
    signal,
    onChunk: (report) => {
      loggers.batch.info('Chunk finished', {
        processed: report.processed,
        total: report.total,
        concurrency: report.concurrency,
        delayMs: report.delayMs,
      });
    },
  };
}

/**
 * Print one row per item and a summary; exit 2 when any item failed
 */
export function printRemovalResults(
  results: BatchItemResult<void>[],
  format: OutputFormat,
  done: RemovalStatus = 'removed'
): void {
  const rows = toRemovalRows(results, done);
  const failed = rows.filter((row) => row.status === 'failed').length;

  if (format === 'json') {
    console.log(formatJSON({ success: failed === 0, [done]: rows.length - failed, failed, results: rows }));
  } else {
    console.log(
      output(
        rows,
        [
          { key: 'id', label: 'ID' },
          { key: 'status', label: 'Status' },
          { key: 'error', label: 'Error' },
        ],
        format
      )
    );
    console.log(`\n${rows.length - failed} ${done}, ${failed} failed`);
  }

  if (failed > 0) {
    process.exitCode = EXIT_CODES.API;
  }
}
