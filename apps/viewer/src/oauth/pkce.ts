/**
 * PKCE (RFC 7636) with the S256 method only, plus the anti-CSRF state nonce.
 */

import { randomToken, sha256Base64Url } from '@launch-bridge/shared';

export interface PkcePair {
  codeVerifier: string;
  codeChallenge: string;
}

// 32 bytes -> 43 base64url characters, the RFC 7636 minimum verifier length
const VERIFIER_BYTES = 32;
const STATE_BYTES = 16;

export function generatePkcePair(): PkcePair {
  const codeVerifier = randomToken(VERIFIER_BYTES);
  return { codeVerifier, codeChallenge: computeS256Challenge(codeVerifier) };
}

export function computeS256Challenge(codeVerifier: string): string {
  return sha256Base64Url(codeVerifier);
}

export function generateState(): string {
  return randomToken(STATE_BYTES);
}
