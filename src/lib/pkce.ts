/**
 * PKCE (RFC 7636) helpers
 */

import { createHash, randomBytes } from 'node:crypto';

export interface PkcePair {
  codeVerifier: string;
  codeChallenge: string;
}

/**
 * Random code verifier: 32 bytes, base64url (43 chars)
 */
export function generateCodeVerifier(byteLength = 32): string {
  return randomBytes(byteLength).toString('base64url');
}

/**
 * S256 challenge for a verifier
 */
export function generateCodeChallenge(codeVerifier: string): string {
  return createHash('sha256').update(codeVerifier).digest('base64url');
}

export function generatePkcePair(): PkcePair {
  const codeVerifier = generateCodeVerifier();
  return { codeVerifier, codeChallenge: generateCodeChallenge(codeVerifier) };
}

export function generateState(): string {
  return randomBytes(16).toString('base64url');
}
