/**
 * Token Authority
 * Sole owner of the credential. Hands out valid access tokens and guarantees
 * at most one refresh is in flight at any time.
 */

import type { Credential, CredentialChange, CredentialChangeReason, TokenResponse } from '../types/auth.js';
import type { CredentialStore } from './credential-store.js';
import type { TokenEndpoint, TokenResult } from './token-endpoint.js';
import { tokenFailureToError } from './token-endpoint.js';
import { raceWithSignal, sleep } from './retry.js';
import { NotAuthenticatedError, ReauthRequiredError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { recordTokenRefresh } from '../lib/metrics.js';

/** Tokens are treated as expired this long before the server says so */
export const TOKEN_EXPIRY_MARGIN_MS = 5 * 60 * 1000;

export const REFRESH_RETRY_DELAY_MS = 1000;

export type CredentialListener = (change: CredentialChange) => void;

/**
 * What the request executor needs from the authority
 */
export interface CredentialProvider {
  getValidCredential(signal?: AbortSignal): Promise<Credential>;
  refreshAfterRejection(staleAccessToken: string, signal?: AbortSignal): Promise<Credential>;
}

export interface TokenAuthorityOptions {
  store: CredentialStore;
  endpoint: Pick<TokenEndpoint, 'refresh'>;
  expiryMarginMs?: number;
  refreshRetryDelayMs?: number;
}

/**
 * Build a credential from a token response. The expiry margin is applied here, once.
 */
export function toCredential(
  token: TokenResponse,
  previousRefreshToken?: string,
  expiryMarginMs: number = TOKEN_EXPIRY_MARGIN_MS,
  now: number = Date.now()
): Credential {
  return {
    accessToken: token.access_token,
    // The accounts service may omit the refresh token; the previous one stays valid then.
    refreshToken: token.refresh_token ?? previousRefreshToken,
    expiresAt: now + token.expires_in * 1000 - expiryMarginMs,
  };
}

export class TokenAuthority implements CredentialProvider {
  private store: CredentialStore;
  private endpoint: Pick<TokenEndpoint, 'refresh'>;
  private expiryMarginMs: number;
  private refreshRetryDelayMs: number;

  private credential: Credential | undefined;
  private loaded = false;
  // Bumped on every write; a refresh that started under an older generation is discarded.
  private generation = 0;
  private inFlightRefresh: Promise<Credential> | null = null;
  private listeners = new Set<CredentialListener>();
  private lifecycle = new AbortController();

  constructor(options: TokenAuthorityOptions) {
    this.store = options.store;
    this.endpoint = options.endpoint;
    this.expiryMarginMs = options.expiryMarginMs ?? TOKEN_EXPIRY_MARGIN_MS;
    this.refreshRetryDelayMs = options.refreshRetryDelayMs ?? REFRESH_RETRY_DELAY_MS;
  }

  /**
   * Current credential if still valid, otherwise the result of a (shared) refresh
   */
  async getValidCredential(signal?: AbortSignal): Promise<Credential> {
    const current = this.current();
    if (current && this.isValid(current)) {
      return current;
    }

    if (this.inFlightRefresh) {
      return raceWithSignal(this.inFlightRefresh, signal);
    }

    if (!current) {
      throw new NotAuthenticatedError();
    }
    if (!current.refreshToken) {
      throw new NotAuthenticatedError('Session expired and cannot be refreshed');
    }

    return this.startRefresh(current.refreshToken, signal);
  }

  /**
   * Called after a 401. Refreshes unless the rejected token has already been replaced.
   */
  async refreshAfterRejection(staleAccessToken: string, signal?: AbortSignal): Promise<Credential> {
    if (this.inFlightRefresh) {
      return raceWithSignal(this.inFlightRefresh, signal);
    }

    const current = this.current();
    if (!current) {
      throw new NotAuthenticatedError();
    }
    if (current.accessToken !== staleAccessToken && this.isValid(current)) {
      return current;
    }
    if (!current.refreshToken) {
      throw new NotAuthenticatedError('Session expired and cannot be refreshed');
    }

    return this.startRefresh(current.refreshToken, signal);
  }

  /**
   * Replace the credential (after an interactive login)
   */
  updateCredential(credential: Credential): void {
    this.writeCredential({ ...credential }, 'login');
  }

  /**
   * Accept a fresh token response from the authorization-code exchange
   */
  acceptTokenResponse(token: TokenResponse): Credential {
    const credential = toCredential(token, undefined, this.expiryMarginMs);
    this.updateCredential(credential);
    return credential;
  }

  /**
   * Drop the credential from memory and from the store
   */
  invalidate(reason: Extract<CredentialChangeReason, 'logout' | 'reauth-required'> = 'logout'): void {
    this.generation++;
    this.loaded = true;
    this.credential = undefined;

    try {
      this.store.clear();
    } catch (error) {
      loggers.auth.error('Failed to clear stored credential', error instanceof Error ? error : undefined);
    }

    loggers.auth.info('Credential cleared', { reason });
    this.notify({ reason });
  }

  onCredentialChange(listener: CredentialListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * The credential as held right now, without refreshing
   */
  peekCredential(): Credential | undefined {
    const current = this.current();
    return current ? { ...current } : undefined;
  }

  isAuthenticated(): boolean {
    return this.current() !== undefined;
  }

  hasInflightRefresh(): boolean {
    return this.inFlightRefresh !== null;
  }

  /**
   * Abort any refresh in flight (application shutdown)
   */
  close(): void {
    this.lifecycle.abort();
  }

  private current(): Credential | undefined {
    if (!this.loaded) {
      this.loaded = true;
      this.credential = this.store.load();
      loggers.auth.debug('Credential loaded from store', { found: this.credential !== undefined });
    }
    return this.credential;
  }

  private isValid(credential: Credential): boolean {
    return Date.now() < credential.expiresAt;
  }

  private startRefresh(refreshToken: string, signal?: AbortSignal): Promise<Credential> {
    const refresh = this.performRefresh(refreshToken, this.generation).finally(() => {
      this.inFlightRefresh = null;
    });
    this.inFlightRefresh = refresh;
    return raceWithSignal(refresh, signal);
  }

  private async performRefresh(refreshToken: string, generation: number): Promise<Credential> {
    const signal = this.lifecycle.signal;
    loggers.auth.debug('Refreshing access token');

    let result: TokenResult = await this.endpoint.refresh(refreshToken, signal);
    if (!result.ok && result.failure.kind === 'transient') {
      loggers.auth.warn('Token refresh failed, retrying once', {
        reason: result.failure.reason,
        status: result.failure.status,
        delayMs: this.refreshRetryDelayMs,
      });
      await sleep(this.refreshRetryDelayMs, signal);
      result = await this.endpoint.refresh(refreshToken, signal);
    }

    if (generation !== this.generation) {
      // Login or logout happened meanwhile; that write wins.
      loggers.auth.debug('Discarding refresh result superseded by a newer credential');
      const current = this.current();
      if (!current) {
        throw new NotAuthenticatedError();
      }
      return current;
    }

    if (result.ok) {
      const credential = toCredential(result.token, refreshToken, this.expiryMarginMs);
      recordTokenRefresh('success');
      this.writeCredential(credential, 'refresh');
      return credential;
    }

    const failure = result.failure;
    recordTokenRefresh(failure.kind);

    if (failure.kind === 'definite') {
      loggers.auth.warn('Refresh token rejected, re-authentication required', {
        status: failure.status,
        error: failure.error,
      });
      this.invalidate('reauth-required');
      throw new ReauthRequiredError(failure.error);
    }

    loggers.auth.error('Token refresh failed', undefined, {
      kind: failure.kind,
      status: failure.status,
      message: failure.message,
    });
    throw tokenFailureToError(failure);
  }

  private writeCredential(credential: Credential, reason: 'login' | 'refresh'): void {
    this.generation++;
    this.loaded = true;
    this.credential = credential;

    try {
      this.store.save(credential);
    } catch (error) {
      // The in-memory credential stays authoritative for this process.
      loggers.auth.error('Failed to persist credential', error instanceof Error ? error : undefined);
    }

    loggers.auth.info('Credential updated', { reason, expiresAt: new Date(credential.expiresAt).toISOString() });
    this.notify({ reason, credential: { ...credential } });
  }

  private notify(change: CredentialChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        loggers.auth.error('Credential listener failed', error instanceof Error ? error : undefined, {
          reason: change.reason,
        });
      }
    }
  }
}
