/**
 * Interactive Login
 * Authorization-code flow with PKCE and a loopback redirect.
 */

import http from 'node:http';
import type { Credential } from '../types/auth.js';
import type { TokenAuthority } from './token-authority.js';
import type { TokenEndpoint } from './token-endpoint.js';
import { tokenFailureToError } from './token-endpoint.js';
import { generatePkcePair, generateState } from '../lib/pkce.js';
import { ApiError, CancelledError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

export const CALLBACK_PATH = '/callback';
export const LOGIN_TIMEOUT_MS = 120_000;

export const DEFAULT_SCOPES = [
  'user-read-private',
  'user-read-email',
  'playlist-read-private',
  'playlist-read-collaborative',
  'playlist-modify-private',
  'playlist-modify-public',
];

const SUCCESS_PAGE = '<!doctype html><title>mixtape</title><p>Login complete. You can close this window.</p>';
const FAILURE_PAGE = '<!doctype html><title>mixtape</title><p>Login failed. Return to the terminal for details.</p>';

export interface AuthorizationRequest {
  url: string;
  state: string;
  codeVerifier: string;
  redirectUri: string;
}

export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
}

export interface LoginFlowOptions {
  clientId: string;
  accountsBaseUrl: string;
  redirectPort: number;
  scopes?: string[];
  timeoutMs?: number;
  endpoint: Pick<TokenEndpoint, 'exchangeCode'>;
  authority: Pick<TokenAuthority, 'acceptTokenResponse'>;
}

export interface WaitForCallbackOptions {
  signal?: AbortSignal;
  /** Called once the loopback server accepts connections */
  onListening?: (port: number) => void;
}

export function buildRedirectUri(port: number): string {
  return `http://127.0.0.1:${port}${CALLBACK_PATH}`;
}

export function buildAuthorizationUrl(params: {
  accountsBaseUrl: string;
  clientId: string;
  redirectUri: string;
  scopes: string[];
  state: string;
  codeChallenge: string;
}): string {
  // Keeps any path prefix of the base URL.
  const url = new URL(`${params.accountsBaseUrl.replace(/\/+$/, '')}/authorize`);
  url.searchParams.set('client_id', params.clientId);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('redirect_uri', params.redirectUri);
  url.searchParams.set('code_challenge_method', 'S256');
  url.searchParams.set('code_challenge', params.codeChallenge);
  url.searchParams.set('state', params.state);
  url.searchParams.set('scope', params.scopes.join(' '));
  return url.toString();
}

export function parseCallback(url: URL): CallbackParams {
  return {
    code: url.searchParams.get('code') ?? undefined,
    state: url.searchParams.get('state') ?? undefined,
    error: url.searchParams.get('error') ?? undefined,
  };
}

export class LoginFlow {
  private options: LoginFlowOptions;
  private redirectUri: string;

  constructor(options: LoginFlowOptions) {
    this.options = options;
    this.redirectUri = buildRedirectUri(options.redirectPort);
  }

  createAuthorizationRequest(): AuthorizationRequest {
    const { codeVerifier, codeChallenge } = generatePkcePair();
    const state = generateState();

    return {
      url: buildAuthorizationUrl({
        accountsBaseUrl: this.options.accountsBaseUrl,
        clientId: this.options.clientId,
        redirectUri: this.redirectUri,
        scopes: this.options.scopes ?? DEFAULT_SCOPES,
        state,
        codeChallenge,
      }),
      state,
      codeVerifier,
      redirectUri: this.redirectUri,
    };
  }

  /**
   * Validate the callback, exchange the code and hand the credential to the authority
   */
  async completeLogin(
    request: AuthorizationRequest,
    params: CallbackParams,
    signal?: AbortSignal
  ): Promise<Credential> {
    if (params.error) {
      throw new ApiError(400, `Authorization denied: ${params.error}`);
    }
    if (params.state !== request.state) {
      throw new ApiError(400, 'Authorization callback state does not match');
    }
    if (!params.code) {
      throw new ApiError(400, 'Authorization callback carried no code');
    }

    const grant = { code: params.code, redirectUri: request.redirectUri, codeVerifier: request.codeVerifier };
    const result = await loggers.login.trackAsync('Authorization code exchange', () =>
      this.options.endpoint.exchangeCode(grant, signal)
    );
    if (!result.ok) {
      throw tokenFailureToError(result.failure);
    }

    return this.options.authority.acceptTokenResponse(result.token);
  }

  /**
   * Serve the loopback redirect until one callback arrives, the timeout passes or the signal fires
   */
  waitForCallback(options: WaitForCallbackOptions = {}): Promise<CallbackParams> {
    const timeoutMs = this.options.timeoutMs ?? LOGIN_TIMEOUT_MS;
    const { signal, onListening } = options;

    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    return new Promise<CallbackParams>((resolve, reject) => {
      let settled = false;

      const server = http.createServer((req, res) => {
        const url = new URL(req.url ?? '/', this.redirectUri);
        if (url.pathname !== CALLBACK_PATH) {
          res.writeHead(404).end();
          return;
        }

        const params = parseCallback(url);
        res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
        // Shut down only after the page has been flushed to the browser.
        res.end(params.error ? FAILURE_PAGE : SUCCESS_PAGE, () => finish(() => resolve(params)));
      });

      const onAbort = (): void => finish(() => reject(new CancelledError()));
      const timer = setTimeout(() => {
        finish(() => reject(new CancelledError(`Login timed out after ${Math.round(timeoutMs / 1000)}s`)));
      }, timeoutMs);

      function finish(action: () => void): void {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        server.close();
        server.closeAllConnections();
        action();
      }

      signal?.addEventListener('abort', onAbort, { once: true });
      server.on('error', (error) => finish(() => reject(error)));
      server.listen(this.options.redirectPort, '127.0.0.1', () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.options.redirectPort;
        loggers.login.debug('Loopback server listening', { port });
        onListening?.(port);
      });
    });
  }

  /**
   * Full interactive login; the caller presents the URL to the user
   */
  async login(options: { signal?: AbortSignal; onAuthorizationUrl: (url: string) => void }): Promise<Credential> {
    const request = this.createAuthorizationRequest();
    const params = await this.waitForCallback({
      signal: options.signal,
      onListening: () => options.onAuthorizationUrl(request.url),
    });
    return this.completeLogin(request, params, options.signal);
  }
}
