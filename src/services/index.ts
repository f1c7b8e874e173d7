export { FileCredentialStore, MemoryCredentialStore, parseCredential } from './credential-store.js';
export type { CredentialStore } from './credential-store.js';
export { TokenEndpoint, classifyTokenFailure, parseTokenResponse, tokenFailureToError } from './token-endpoint.js';
export type { TokenFailure, TokenResult, AuthorizationCodeGrant } from './token-endpoint.js';
export { TokenAuthority, toCredential, TOKEN_EXPIRY_MARGIN_MS } from './token-authority.js';
export type { CredentialListener, CredentialProvider, TokenAuthorityOptions } from './token-authority.js';
export { RateLimitTracker, readHeader } from './rate-limit-tracker.js';
export type { RateLimitSnapshot, RateLimitStatus } from './rate-limit-tracker.js';
export { OfetchTransport } from './http-transport.js';
export type { HttpOutcome, HttpRequest, HttpTransport } from './http-transport.js';
export { ResilientRequestExecutor, extractErrorMessage } from './executor.js';
export type { ApiResponse, ExecuteOptions, ExecutorOptions, RequestSpec } from './executor.js';
export { BatchOrchestrator, BATCH_DEFAULTS } from './batch.js';
export type { BatchChunkReport, BatchItemResult, BatchOptions } from './batch.js';
export { DEFAULT_REQUEST_RETRY_POLICY, parseRetryAfter } from './retry.js';
export type { RequestRetryPolicy, RetryState } from './retry.js';
export { MusicLibraryClient } from './library.js';
export { LoginFlow } from './login.js';
export { ConfigService } from './config.js';
export * from '../lib/errors.js';
