/**
 * Artists Command
 */

import { Command } from 'commander';
import type { Artist } from '../types/api.js';
import { normalizeId } from '../services/library.js';
import { getClientContext, requireClientId } from '../lib/api-client.js';
import { formatJSON, output, type ColumnDef } from '../utils/output.js';
import { parseIntegerOption, runCommand } from '../utils/command.js';
import { printRemovalResults, toRemovalOptions } from '../utils/batch-report.js';

const ARTIST_COLUMNS: ColumnDef<Artist>[] = [
  { key: 'id', label: 'ID' },
  { key: 'name', label: 'Name' },
  { key: 'followers.total', label: 'Followers', align: 'right' },
  { key: 'genres', label: 'Genres', format: (_value, row) => row.genres.join(', ') },
];

export const artistsCommand = new Command('artists').description('List and unfollow followed artists');

artistsCommand
  .command('list')
  .description('List followed artists')
  .option('-l, --limit <n>', 'Maximum number of artists')
  .action(async (options: { limit?: string }, cmd: Command) => {
    await runCommand(cmd, async ({ format, signal }) => {
      const context = getClientContext();
      requireClientId(context.config);
      const limit = options.limit !== undefined ? parseIntegerOption(options.limit, '--limit', 1) : undefined;

      const artists = await context.library.listFollowedArtists({ limit, signal });

      if (format === 'json') {
        console.log(formatJSON({ success: true, count: artists.length, artists }));
        return;
      }
      if (artists.length === 0) {
        console.log('No followed artists.');
        return;
      }
      console.log(output(artists, ARTIST_COLUMNS, format));
    });
  });

artistsCommand
  .command('unfollow')
  .description('Unfollow artists by id, URI or link')
  .argument('<ids...>', 'Artist ids')
  .option('-c, --concurrency <n>', 'Initial number of parallel requests')
  .option('-d, --delay <ms>', 'Initial pause between chunks (ms)')
  .action(async (ids: string[], options: { concurrency?: string; delay?: string }, cmd: Command) => {
    await runCommand(cmd, async ({ format, signal }) => {
      const context = getClientContext();
      requireClientId(context.config);

      const results = await context.library.unfollowArtists(
        ids.map((id) => normalizeId(id, 'artist')),
        toRemovalOptions(options, signal)
      );

      printRemovalResults(results, format, 'unfollowed');
    });
  });
