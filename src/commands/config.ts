/**
 * Config Command
 */

import { Command } from 'commander';
import { CONFIG_KEYS, ConfigError, getConfigService, isConfigKey } from '../services/config.js';
import { formatJSON, output } from '../utils/output.js';
import { runCommand } from '../utils/command.js';

export const configCommand = new Command('config').description('Read and write settings');

configCommand
  .command('get')
  .description('Show the effective value of a key')
  .argument('<key>', `One of: ${CONFIG_KEYS.join(', ')}`)
  .action(async (key: string, _options, cmd: Command) => {
    await runCommand(cmd, async ({ format }) => {
      if (!isConfigKey(key)) {
        throw new ConfigError(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
      }
      const value = getConfigService().getResolved()[key];
      if (format === 'json') {
        console.log(formatJSON({ key, value: value ?? null }));
      } else {
        console.log(value === undefined ? '' : String(value));
      }
    });
  });

configCommand
  .command('set')
  .description('Store a value in the config file')
  .argument('<key>', `One of: ${CONFIG_KEYS.join(', ')}`)
  .argument('<value>')
  .action(async (key: string, value: string, _options, cmd: Command) => {
    await runCommand(cmd, async ({ format }) => {
      const config = getConfigService();
      config.setFromString(key, value);
      if (format === 'json') {
        console.log(formatJSON({ success: true, key, config: config.getAll() }));
      } else {
        console.log(`Saved ${key} to ${config.getConfigPath()}`);
      }
    });
  });

configCommand
  .command('unset')
  .description('Remove a key from the config file')
  .argument('<key>')
  .action(async (key: string, _options, cmd: Command) => {
    await runCommand(cmd, async () => {
      if (!isConfigKey(key)) {
        throw new ConfigError(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
      }
      getConfigService().delete(key);
      console.log(`Removed ${key}`);
    });
  });

configCommand
  .command('list')
  .description('Show every setting after environment overrides and defaults')
  .action(async (_options, cmd: Command) => {
    await runCommand(cmd, async ({ format }) => {
      const resolved = getConfigService().getResolved();
      if (format === 'json') {
        console.log(formatJSON(resolved));
        return;
      }
      const rows = CONFIG_KEYS.map((key) => ({ key, value: resolved[key] ?? '' }));
      console.log(
        output(
          rows,
          [
            { key: 'key', label: 'Key' },
            { key: 'value', label: 'Value' },
          ],
          format
        )
      );
    });
  });

configCommand
  .command('path')
  .description('Print the config file location')
  .action(() => {
    console.log(getConfigService().getConfigPath());
  });
