/**
 * Playlists Command
 */

import { Command } from 'commander';
import type { Playlist } from '../types/api.js';
import { normalizeId } from '../services/library.js';
import { getClientContext, requireClientId } from '../lib/api-client.js';
import { formatJSON, output, type ColumnDef } from '../utils/output.js';
import { parseIntegerOption, runCommand } from '../utils/command.js';
import { printRemovalResults, toRemovalOptions } from '../utils/batch-report.js';

const PLAYLIST_COLUMNS: ColumnDef<Playlist>[] = [
  { key: 'id', label: 'ID' },
  { key: 'name', label: 'Name' },
  { key: 'owner.display_name', label: 'Owner' },
  { key: 'tracks.total', label: 'Tracks', align: 'right' },
  {
    key: 'public',
    label: 'Visibility',
    format: (value, row) => (row.collaborative ? 'collaborative' : value === false ? 'private' : 'public'),
  },
];

export const playlistsCommand = new Command('playlists').description('List and remove playlists');

playlistsCommand
  .command('list')
  .description("List the current user's playlists")
  .option('-l, --limit <n>', 'Maximum number of playlists')
  .action(async (options: { limit?: string }, cmd: Command) => {
    await runCommand(cmd, async ({ format, signal }) => {
      const context = getClientContext();
      requireClientId(context.config);
      const limit = options.limit !== undefined ? parseIntegerOption(options.limit, '--limit', 1) : undefined;

      const playlists = await context.library.listPlaylists({ limit, signal });

      if (format === 'json') {
        console.log(formatJSON({ success: true, count: playlists.length, playlists }));
        return;
      }
      if (playlists.length === 0) {
        console.log('No playlists.');
        return;
      }
      console.log(output(playlists, PLAYLIST_COLUMNS, format));
    });
  });

playlistsCommand
  .command('remove')
  .description('Unfollow (delete) playlists by id, URI or link')
  .argument('<ids...>', 'Playlist ids')
  .option('-c, --concurrency <n>', 'Initial number of parallel requests')
  .option('-d, --delay <ms>', 'Initial pause between chunks (ms)')
  .action(async (ids: string[], options: { concurrency?: string; delay?: string }, cmd: Command) => {
    await runCommand(cmd, async ({ format, signal }) => {
      const context = getClientContext();
      requireClientId(context.config);

      const results = await context.library.removePlaylists(
        ids.map((id) => normalizeId(id, 'playlist')),
        toRemovalOptions(options, signal)
      );

      printRemovalResults(results, format);
    });
  });
