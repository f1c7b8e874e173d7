/**
 * Client Errors
 * Typed failures surfaced by the API access layer
 */

export type ClientErrorCode =
  | 'NOT_AUTHENTICATED'
  | 'REAUTH_REQUIRED'
  | 'AUTH_EXPIRED'
  | 'RATE_LIMITED'
  | 'SERVER_ERROR'
  | 'API_ERROR'
  | 'NETWORK_ERROR'
  | 'CANCELLED'
  | 'UNEXPECTED';

/**
 * Base class for every classified failure
 */
export abstract class ClientError extends Error {
  public abstract readonly code: ClientErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * No credential is available; the user has to log in
 */
export class NotAuthenticatedError extends ClientError {
  public readonly code = 'NOT_AUTHENTICATED';

  constructor(message = 'Not logged in') {
    super(message);
    this.name = 'NotAuthenticatedError';
  }
}

/**
 * The refresh token was rejected or revoked; stored credentials have been cleared
 */
export class ReauthRequiredError extends ClientError {
  public readonly code = 'REAUTH_REQUIRED';
  public readonly reason: string;

  constructor(reason: string) {
    super(`Session revoked (${reason}), please log in again`);
    this.name = 'ReauthRequiredError';
    this.reason = reason;
  }
}

/**
 * The API kept answering 401 after a refreshed credential was sent
 */
export class AuthExpiredError extends ClientError {
  public readonly code = 'AUTH_EXPIRED';

  constructor(message = 'Access token rejected after refresh') {
    super(message);
    this.name = 'AuthExpiredError';
  }
}

export class RateLimitedError extends ClientError {
  public readonly code = 'RATE_LIMITED';
  /** Seconds the service asked us to wait */
  public readonly retryAfter: number;

  constructor(retryAfter: number, attempts: number) {
    super(`Rate limit exceeded after ${attempts} attempts, retry in ${retryAfter}s`);
    this.name = 'RateLimitedError';
    this.retryAfter = retryAfter;
  }
}

export class ServerError extends ClientError {
  public readonly code = 'SERVER_ERROR';
  public readonly status: number;

  constructor(status: number, message?: string) {
    super(message ?? `Server error (HTTP ${status})`);
    this.name = 'ServerError';
    this.status = status;
  }
}

export class ApiError extends ClientError {
  public readonly code = 'API_ERROR';
  public readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
  }
}

export class NetworkError extends ClientError {
  public readonly code = 'NETWORK_ERROR';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'NetworkError';
  }
}

export class CancelledError extends ClientError {
  public readonly code = 'CANCELLED';

  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Wraps a non-taxonomy error thrown by caller-supplied code
 */
export class UnexpectedError extends ClientError {
  public readonly code = 'UNEXPECTED';

  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'UnexpectedError';
  }
}

export function isClientError(error: unknown): error is ClientError {
  return error instanceof ClientError;
}

export function toClientError(error: unknown): ClientError {
  return isClientError(error) ? error : new UnexpectedError(error);
}

/**
 * Throws CancelledError when the signal has fired
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

export type ErrorAction = 'login' | 'wait' | 'check-connection' | 'retry-later' | 'none';

export interface ErrorDescription {
  action: ErrorAction;
  message: string;
}

/**
 * Maps a classified error to the message and next step shown to the user
 */
export function describeError(error: ClientError): ErrorDescription {
  switch (error.code) {
    case 'NOT_AUTHENTICATED':
    case 'REAUTH_REQUIRED':
    case 'AUTH_EXPIRED':
      return {
        action: 'login',
        message: 'Your session has expired. Run `mixtape auth login` to reconnect.',
      };
    case 'RATE_LIMITED': {
      const seconds = error instanceof RateLimitedError ? error.retryAfter : 30;
      return {
        action: 'wait',
        message: `Too many requests. Please wait ${seconds} seconds and try again.`,
      };
    }
    case 'NETWORK_ERROR':
      return {
        action: 'check-connection',
        message: 'Network connection error. Please check your internet connection.',
      };
    case 'SERVER_ERROR':
      return {
        action: 'retry-later',
        message: `The service is having trouble (${error.message}). Try again later.`,
      };
    case 'CANCELLED':
      return { action: 'none', message: 'Cancelled.' };
    case 'API_ERROR':
    case 'UNEXPECTED':
    default:
      return { action: 'none', message: error.message };
  }
}
