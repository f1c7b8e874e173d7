import { Command } from 'commander';
import { authCommand } from './commands/auth.js';
import { playlistsCommand } from './commands/playlists.js';
import { albumsCommand } from './commands/albums.js';
import { artistsCommand } from './commands/artists.js';
import { ratelimitCommand } from './commands/ratelimit.js';
import { configCommand } from './commands/config.js';
import { getConfigService } from './services/config.js';
import { setGlobalLogLevel } from './lib/logger.js';
import { getMetricsSnapshot } from './lib/metrics.js';
import { clearClientContext } from './lib/api-client.js';

export const cli = new Command();

cli
  .name('mixtape')
  .description('Manage your music library from the terminal')
  .version('0.1.0');

// Global options
cli
  .option('-f, --format <format>', 'Output format: json | table | csv')
  .option('-v, --verbose', 'Debug logging on stderr')
  .option('--metrics', 'Print Prometheus metrics to stderr when the command finishes');

cli.hook('preAction', (thisCommand) => {
  const opts = thisCommand.opts();
  setGlobalLogLevel(opts.verbose === true ? 'debug' : getConfigService().getLogLevel());
});

cli.hook('postAction', async (thisCommand) => {
  if (thisCommand.opts().metrics === true) {
    process.stderr.write(await getMetricsSnapshot());
  }
  clearClientContext();
});

cli.addCommand(authCommand);
cli.addCommand(playlistsCommand);
cli.addCommand(albumsCommand);
cli.addCommand(artistsCommand);
cli.addCommand(ratelimitCommand);
cli.addCommand(configCommand);
