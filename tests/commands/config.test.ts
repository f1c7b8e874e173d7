import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { cli } from '../../src/cli.js';
import { resetConfigService } from '../../src/services/config.js';
import { runCli } from '../helpers/cli-context.js';

describe('config command', () => {
  let configDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mixtape-cli-'));
    vi.stubEnv('MIXTAPE_CONFIG_DIR', configDir);
    vi.stubEnv('MIXTAPE_LOG_LEVEL', 'silent');
    vi.stubEnv('MIXTAPE_REDIRECT_PORT', '');
    resetConfigService();

    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetConfigService();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    fs.rmSync(configDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  function lastPrinted(): string {
    return String(logSpy.mock.calls[logSpy.mock.calls.length - 1][0]);
  }

  it('should store a typed value in the config file', async () => {
    await runCli(cli, ['-f', 'json', 'config', 'set', 'redirectPort', '8080']);

    expect(JSON.parse(lastPrinted())).toEqual({ success: true, key: 'redirectPort', config: { redirectPort: 8080 } });
    expect(JSON.parse(fs.readFileSync(path.join(configDir, 'config.json'), 'utf-8'))).toEqual({ redirectPort: 8080 });
  });

  it('should read back the effective value', async () => {
    await runCli(cli, ['-f', 'json', 'config', 'set', 'batchDelayMs', '250']);
    resetConfigService();

    await runCli(cli, ['-f', 'json', 'config', 'get', 'batchDelayMs']);

    expect(JSON.parse(lastPrinted())).toEqual({ key: 'batchDelayMs', value: 250 });
  });

  it('should fall back to the default for unset keys', async () => {
    await runCli(cli, ['-f', 'table', 'config', 'get', 'redirectPort']);

    expect(lastPrinted()).toBe('5543');
  });

  it('should reject unknown keys with exit 1', async () => {
    await runCli(cli, ['-f', 'table', 'config', 'set', 'volume', '11']);

    expect(errorSpy).toHaveBeenCalledWith(
      'Error: Unknown config key "volume". Valid keys: clientId, redirectPort, apiBaseUrl, accountsBaseUrl, logLevel, format, batchConcurrency, batchDelayMs'
    );
    expect(process.exitCode).toBe(1);
  });

  it('should remove a key', async () => {
    await runCli(cli, ['-f', 'json', 'config', 'set', 'clientId', 'test-client']);
    await runCli(cli, ['-f', 'table', 'config', 'unset', 'clientId']);

    expect(lastPrinted()).toBe('Removed clientId');
    expect(JSON.parse(fs.readFileSync(path.join(configDir, 'config.json'), 'utf-8'))).toEqual({});
  });

  it('should print the config path', async () => {
    await runCli(cli, ['config', 'path']);

    expect(lastPrinted()).toBe(path.join(configDir, 'config.json'));
  });
});

describe('cli', () => {
  it('should register every command group', () => {
    expect(cli.name()).toBe('mixtape');
    expect(cli.commands.map((command) => command.name())).toEqual(['auth', 'playlists', 'albums', 'artists', 'ratelimit', 'config']);
  });

  it('should expose the session and library subcommands', () => {
    const subcommands = (name: string): string[] =>
      cli.commands.find((command) => command.name() === name)?.commands.map((command) => command.name()) ?? [];

    expect(subcommands('auth')).toEqual(['login', 'status', 'whoami', 'logout']);
    expect(subcommands('playlists')).toEqual(['list', 'remove']);
    expect(subcommands('albums')).toEqual(['list', 'remove']);
    expect(subcommands('artists')).toEqual(['list', 'unfollow']);
    expect(subcommands('config')).toEqual(['get', 'set', 'unset', 'list', 'path']);
  });
});
