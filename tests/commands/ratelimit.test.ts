import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/lib/api-client.js', async (importOriginal) => {
  const original = await importOriginal<typeof import('../../src/lib/api-client.js')>();
  const { getTestContext } = await import('../helpers/cli-context.js');
  return { ...original, getClientContext: getTestContext };
});

import { cli } from '../../src/cli.js';
import { createClientContext } from '../../src/lib/api-client.js';
import { getConfigService, resetConfigService } from '../../src/services/config.js';
import { MemoryCredentialStore } from '../../src/services/credential-store.js';
import { toRateLimitView } from '../../src/commands/ratelimit.js';
import { FakeTransport, jsonResponse } from '../helpers/fake-transport.js';
import { runCli, setTestContext } from '../helpers/cli-context.js';

describe('toRateLimitView', () => {
  it('should flatten the snapshot for output', () => {
    const view = toRateLimitView(
      { limit: 100, remaining: 0, resetAt: Date.UTC(2026, 0, 1, 0, 1), observedAt: 1, isRateLimited: true },
      { isRateLimited: true, waitSeconds: 60 }
    );

    expect(view).toEqual({
      limited: true,
      waitSeconds: 60,
      limit: 100,
      remaining: 0,
      resetAt: '2026-01-01T00:01:00.000Z',
      retryAfter: null,
    });
  });

  it('should use null for unknown values', () => {
    expect(toRateLimitView({ observedAt: 0, isRateLimited: false }, { isRateLimited: false, waitSeconds: 0 })).toEqual({
      limited: false,
      waitSeconds: 0,
      limit: null,
      remaining: null,
      resetAt: null,
      retryAfter: null,
    });
  });
});

describe('ratelimit command', () => {
  let configDir: string;
  let transport: FakeTransport;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mixtape-cli-'));
    vi.stubEnv('MIXTAPE_CONFIG_DIR', configDir);
    vi.stubEnv('MIXTAPE_CLIENT_ID', 'test-client');
    vi.stubEnv('MIXTAPE_LOG_LEVEL', 'silent');
    vi.stubEnv('MIXTAPE_API_BASE', 'https://api.test/v1');
    resetConfigService();

    transport = new FakeTransport();
    setTestContext(
      createClientContext({
        config: getConfigService(),
        store: new MemoryCredentialStore({ accessToken: 'a1', expiresAt: Date.now() + 3_600_000 }),
        transport,
      })
    );
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    setTestContext(undefined);
    resetConfigService();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    fs.rmSync(configDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it('should probe the profile endpoint and report the advertised quota', async () => {
    transport.enqueue(jsonResponse(200, { id: 'user-1' }, { 'X-RateLimit-Limit': '100', 'X-RateLimit-Remaining': '99' }));

    await runCli(cli, ['-f', 'json', 'ratelimit']);

    expect(transport.requests[0]).toMatchObject({ method: 'GET', url: 'https://api.test/v1/me' });
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      limited: false,
      waitSeconds: 0,
      limit: 100,
      remaining: 99,
      resetAt: null,
      retryAfter: null,
    });
  });

  it('should exit 1 without a client id', async () => {
    vi.stubEnv('MIXTAPE_CLIENT_ID', '');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await runCli(cli, ['-f', 'table', 'ratelimit']);

    expect(errorSpy).toHaveBeenCalledWith(
      'Error: No client id configured. Set MIXTAPE_CLIENT_ID or run `mixtape config set clientId <id>`.'
    );
    expect(process.exitCode).toBe(1);
    expect(transport.requests).toHaveLength(0);
  });
});
