/**
 * API Client Helper
 * Wires configuration into the transport, credential, rate-limit and library layers.
 */

import { ConfigService, ConfigError, getConfigService } from '../services/config.js';
import { FileCredentialStore, type CredentialStore } from '../services/credential-store.js';
import { OfetchTransport, type HttpTransport } from '../services/http-transport.js';
import { TokenEndpoint } from '../services/token-endpoint.js';
import { TokenAuthority } from '../services/token-authority.js';
import { RateLimitTracker } from '../services/rate-limit-tracker.js';
import { ResilientRequestExecutor } from '../services/executor.js';
import { BatchOrchestrator } from '../services/batch.js';
import { MusicLibraryClient } from '../services/library.js';
import { LoginFlow } from '../services/login.js';

export interface ClientContext {
  config: ConfigService;
  store: CredentialStore;
  endpoint: TokenEndpoint;
  authority: TokenAuthority;
  tracker: RateLimitTracker;
  executor: ResilientRequestExecutor;
  library: MusicLibraryClient;
}

export interface ClientContextOverrides {
  config?: ConfigService;
  store?: CredentialStore;
  transport?: HttpTransport;
}

let cachedContext: ClientContext | null = null;

/**
 * Client id is required for anything that talks to the accounts service
 */
export function requireClientId(config: ConfigService): string {
  const clientId = config.getClientId();
  if (!clientId) {
    throw new ConfigError(
      'No client id configured. Set MIXTAPE_CLIENT_ID or run `mixtape config set clientId <id>`.'
    );
  }
  return clientId;
}

export function createClientContext(overrides: ClientContextOverrides = {}): ClientContext {
  const config = overrides.config ?? getConfigService();
  const transport = overrides.transport ?? new OfetchTransport();
  const store = overrides.store ?? new FileCredentialStore(config.getCredentialsPath());

  const endpoint = new TokenEndpoint({
    clientId: config.getClientId() ?? '',
    accountsBaseUrl: config.getAccountsBaseUrl(),
    transport,
  });
  const authority = new TokenAuthority({ store, endpoint });
  const tracker = new RateLimitTracker();
  const executor = new ResilientRequestExecutor({
    baseUrl: config.getApiBaseUrl(),
    transport,
    credentials: authority,
    tracker,
  });
  const library = new MusicLibraryClient(executor, new BatchOrchestrator(config.getBatchOptions()));

  return { config, store, endpoint, authority, tracker, executor, library };
}

/**
 * Shared context for the CLI process
 */
export function getClientContext(): ClientContext {
  if (!cachedContext) {
    cachedContext = createClientContext();
  }
  return cachedContext;
}

export function createLoginFlow(context: ClientContext): LoginFlow {
  return new LoginFlow({
    clientId: requireClientId(context.config),
    accountsBaseUrl: context.config.getAccountsBaseUrl(),
    redirectPort: context.config.getRedirectPort(),
    endpoint: context.endpoint,
    authority: context.authority,
  });
}

/**
 * Clear the cached context (tests)
 */
export function clearClientContext(): void {
  cachedContext?.authority.close();
  cachedContext = null;
}
