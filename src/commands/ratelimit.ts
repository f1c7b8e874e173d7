/**
 * Rate Limit Command
 * Sends one lightweight request and reports the quota the service advertises.
 */

import { Command } from 'commander';
import type { RateLimitSnapshot, RateLimitStatus } from '../services/rate-limit-tracker.js';
import { getClientContext, requireClientId } from '../lib/api-client.js';
import { formatJSON, output } from '../utils/output.js';
import { runCommand } from '../utils/command.js';

export interface RateLimitView {
  limited: boolean;
  waitSeconds: number;
  limit: number | null;
  remaining: number | null;
  resetAt: string | null;
  retryAfter: number | null;
}

export function toRateLimitView(snapshot: RateLimitSnapshot, status: RateLimitStatus): RateLimitView {
  return {
    limited: status.isRateLimited,
    waitSeconds: status.waitSeconds,
    limit: snapshot.limit ?? null,
    remaining: snapshot.remaining ?? null,
    resetAt: snapshot.resetAt !== undefined ? new Date(snapshot.resetAt).toISOString() : null,
    retryAfter: snapshot.retryAfter ?? null,
  };
}

export const ratelimitCommand = new Command('ratelimit')
  .description('Probe the Web API and show the current rate-limit state')
  .action(async (_options, cmd: Command) => {
    await runCommand(cmd, async ({ format, signal }) => {
      const context = getClientContext();
      requireClientId(context.config);

      await context.executor.execute({ method: 'GET', path: '/me' }, { signal });
      const view = toRateLimitView(context.tracker.snapshot(), context.tracker.status());

      if (format === 'json') {
        console.log(formatJSON(view));
        return;
      }
      console.log(
        output(
          [view],
          [
            { key: 'limited', label: 'Limited' },
            { key: 'waitSeconds', label: 'Wait (s)', align: 'right' },
            { key: 'limit', label: 'Limit', align: 'right' },
            { key: 'remaining', label: 'Remaining', align: 'right' },
            { key: 'resetAt', label: 'Resets at' },
          ],
          format
        )
      );
    });
  });
