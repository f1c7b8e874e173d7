/**
 * OAuth2 Token Response
 */
export interface TokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
}

/**
 * OAuth2 error body returned by the token endpoint on non-2xx
 */
export interface TokenErrorResponse {
  error?: string;
  error_description?: string;
}

/**
 * Refreshable credential with margin-adjusted expiry
 */
export interface Credential {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number; // Unix timestamp (ms), already shortened by the safety margin
}

export type CredentialChangeReason = 'login' | 'refresh' | 'logout' | 'reauth-required';

export interface CredentialChange {
  reason: CredentialChangeReason;
  /** undefined once the credential has been cleared */
  credential?: Credential;
}
