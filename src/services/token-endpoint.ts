/**
 * Token Endpoint
 * Authorization-code exchange and refresh against the accounts service.
 * Outcomes are classified here; what to do about them is the caller's business.
 */

import type { TokenErrorResponse, TokenResponse } from '../types/auth.js';
import type { HttpTransport } from './http-transport.js';
import { isRetryableStatus, parseRetryAfter } from './retry.js';
import { readHeader, RATE_LIMIT_HEADERS } from './rate-limit-tracker.js';
import {
  ApiError,
  CancelledError,
  NetworkError,
  RateLimitedError,
  ServerError,
  type ClientError,
} from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

export const DEFAULT_TOKEN_TIMEOUT_MS = 10_000;

/** OAuth error codes that mean the grant itself is dead */
const DEFINITE_ERROR_CODES = new Set(['invalid_grant', 'invalid_client', 'unauthorized_client']);

export type TokenFailure =
  /** The grant is unusable; the user has to log in again */
  | { kind: 'definite'; status: number; error: string; description?: string }
  /** Worth one more try */
  | {
      kind: 'transient';
      reason: 'server' | 'rate-limit' | 'network' | 'timeout';
      status?: number;
      retryAfter?: number;
      message: string;
    }
  /** Refused for some other reason; the stored grant is left alone */
  | { kind: 'rejected'; status: number; message: string };

export type TokenResult = { ok: true; token: TokenResponse } | { ok: false; failure: TokenFailure };

export interface AuthorizationCodeGrant {
  code: string;
  redirectUri: string;
  codeVerifier: string;
}

export interface TokenEndpointOptions {
  clientId: string;
  accountsBaseUrl: string;
  transport: HttpTransport;
  timeoutMs?: number;
}

/**
 * Narrow a token endpoint body
 */
export function parseTokenResponse(value: unknown): TokenResponse | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }

  const accessToken: unknown = Reflect.get(value, 'access_token');
  const expiresIn: unknown = Reflect.get(value, 'expires_in');
  const tokenType: unknown = Reflect.get(value, 'token_type');
  const refreshToken: unknown = Reflect.get(value, 'refresh_token');
  const scope: unknown = Reflect.get(value, 'scope');

  if (typeof accessToken !== 'string' || accessToken === '' || typeof expiresIn !== 'number') {
    return undefined;
  }

  return {
    access_token: accessToken,
    token_type: typeof tokenType === 'string' ? tokenType : 'Bearer',
    expires_in: expiresIn,
    refresh_token: typeof refreshToken === 'string' && refreshToken !== '' ? refreshToken : undefined,
    scope: typeof scope === 'string' ? scope : undefined,
  };
}

function readOAuthError(data: unknown): TokenErrorResponse {
  if (typeof data !== 'object' || data === null) {
    return {};
  }
  const error: unknown = Reflect.get(data, 'error');
  const description: unknown = Reflect.get(data, 'error_description');
  return {
    error: typeof error === 'string' ? error : undefined,
    error_description: typeof description === 'string' ? description : undefined,
  };
}

/**
 * Classify a non-2xx token endpoint response
 */
export function classifyTokenFailure(
  status: number,
  data: unknown,
  headers?: Headers
): TokenFailure {
  const { error, error_description: description } = readOAuthError(data);

  if ((error !== undefined && DEFINITE_ERROR_CODES.has(error)) || status === 400 || status === 401) {
    return { kind: 'definite', status, error: error ?? `http_${status}`, description };
  }

  if (isRetryableStatus(status)) {
    const retryAfter = headers ? parseRetryAfter(readHeader(headers, RATE_LIMIT_HEADERS.RETRY_AFTER)) : undefined;
    return {
      kind: 'transient',
      reason: status === 429 ? 'rate-limit' : 'server',
      status,
      retryAfter,
      message: description ?? error ?? `Token endpoint returned HTTP ${status}`,
    };
  }

  return { kind: 'rejected', status, message: description ?? error ?? `Token endpoint returned HTTP ${status}` };
}

/**
 * Error for a transient or rejected failure. Definite failures are handled by the caller.
 */
export function tokenFailureToError(failure: TokenFailure): ClientError {
  if (failure.kind === 'rejected') {
    return new ApiError(failure.status, failure.message);
  }
  if (failure.kind === 'definite') {
    return new ApiError(failure.status, failure.description ?? failure.error);
  }
  if (failure.reason === 'rate-limit') {
    return new RateLimitedError(failure.retryAfter ?? 30, 2);
  }
  if (failure.reason === 'server') {
    return new ServerError(failure.status ?? 500, failure.message);
  }
  return new NetworkError(failure.message);
}

export class TokenEndpoint {
  private clientId: string;
  private tokenUrl: string;
  private transport: HttpTransport;
  private timeoutMs: number;

  constructor(options: TokenEndpointOptions) {
    this.clientId = options.clientId;
    this.tokenUrl = `${options.accountsBaseUrl.replace(/\/+$/, '')}/api/token`;
    this.transport = options.transport;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOKEN_TIMEOUT_MS;
  }

  async exchangeCode(grant: AuthorizationCodeGrant, signal?: AbortSignal): Promise<TokenResult> {
    return this.post(
      {
        grant_type: 'authorization_code',
        code: grant.code,
        redirect_uri: grant.redirectUri,
        client_id: this.clientId,
        code_verifier: grant.codeVerifier,
      },
      signal
    );
  }

  async refresh(refreshToken: string, signal?: AbortSignal): Promise<TokenResult> {
    return this.post(
      {
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
        client_id: this.clientId,
      },
      signal
    );
  }

  private async post(params: Record<string, string>, signal?: AbortSignal): Promise<TokenResult> {
    const outcome = await this.transport.send({
      method: 'POST',
      url: this.tokenUrl,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams(params).toString(),
      timeoutMs: this.timeoutMs,
      signal,
    });

    switch (outcome.kind) {
      case 'cancelled':
        throw new CancelledError();

      case 'network-error':
        loggers.auth.warn('Token endpoint unreachable', {
          grantType: params.grant_type,
          timedOut: outcome.timedOut,
          cause: outcome.error.message,
        });
        return {
          ok: false,
          failure: {
            kind: 'transient',
            reason: outcome.timedOut ? 'timeout' : 'network',
            message: outcome.timedOut
              ? `Token request timed out after ${this.timeoutMs}ms`
              : `Token request failed: ${outcome.error.message}`,
          },
        };

      case 'response': {
        if (outcome.status >= 200 && outcome.status < 300) {
          const token = parseTokenResponse(outcome.data);
          if (token) {
            return { ok: true, token };
          }
          return {
            ok: false,
            failure: { kind: 'rejected', status: outcome.status, message: 'Token endpoint returned a malformed body' },
          };
        }

        const failure = classifyTokenFailure(outcome.status, outcome.data, outcome.headers);
        loggers.auth.warn('Token endpoint refused request', {
          grantType: params.grant_type,
          status: outcome.status,
          kind: failure.kind,
        });
        return { ok: false, failure };
      }
    }
  }
}
