/**
 * Albums Command
 * Saved albums in the user's library.
 */

import { Command } from 'commander';
import type { SavedAlbum } from '../types/api.js';
import { normalizeId } from '../services/library.js';
import { getClientContext, requireClientId } from '../lib/api-client.js';
import { formatJSON, output, type ColumnDef } from '../utils/output.js';
import { parseIntegerOption, runCommand } from '../utils/command.js';
import { printRemovalResults, toRemovalOptions } from '../utils/batch-report.js';

const ALBUM_COLUMNS: ColumnDef<SavedAlbum>[] = [
  { key: 'album.id', label: 'ID' },
  { key: 'album.name', label: 'Name' },
  {
    key: 'album.artists',
    label: 'Artists',
    format: (_value, row) => row.album.artists.map((artist) => artist.name).join(', '),
  },
  { key: 'album.total_tracks', label: 'Tracks', align: 'right' },
  { key: 'added_at', label: 'Added', format: (value) => (typeof value === 'string' ? value.slice(0, 10) : '') },
];

export const albumsCommand = new Command('albums').description('List and remove saved albums');

albumsCommand
  .command('list')
  .description('List saved albums')
  .option('-l, --limit <n>', 'Maximum number of albums')
  .action(async (options: { limit?: string }, cmd: Command) => {
    await runCommand(cmd, async ({ format, signal }) => {
      const context = getClientContext();
      requireClientId(context.config);
      const limit = options.limit !== undefined ? parseIntegerOption(options.limit, '--limit', 1) : undefined;

      const albums = await context.library.listSavedAlbums({ limit, signal });

      if (format === 'json') {
        console.log(formatJSON({ success: true, count: albums.length, albums }));
        return;
      }
      if (albums.length === 0) {
        console.log('No saved albums.');
        return;
      }
      console.log(output(albums, ALBUM_COLUMNS, format));
    });
  });

albumsCommand
  .command('remove')
  .description('Remove albums from the library by id, URI or link')
  .argument('<ids...>', 'Album ids')
  .option('-c, --concurrency <n>', 'Initial number of parallel requests')
  .option('-d, --delay <ms>', 'Initial pause between chunks (ms)')
  .action(async (ids: string[], options: { concurrency?: string; delay?: string }, cmd: Command) => {
    await runCommand(cmd, async ({ format, signal }) => {
      const context = getClientContext();
      requireClientId(context.config);

      const results = await context.library.removeSavedAlbums(
        ids.map((id) => normalizeId(id, 'album')),
        toRemovalOptions(options, signal)
      );

      printRemovalResults(results, format);
    });
  });
