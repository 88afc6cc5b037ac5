import { describe, it, expect } from 'vitest';
import { computeS256Challenge, generatePkcePair, generateState } from '../apps/viewer/src/oauth/pkce.js';

describe('PKCE', () => {
  it('derives the S256 challenge as unpadded base64url SHA-256', () => {
    expect(computeS256Challenge('test-verifier-0123456789-abcdefghijklmnopqrstuv')).toBe(
      '680IdP-aUA00b-bdVxY-BHXXHFEgT6Uuiw8M7OiG3RQ',
    );
  });

  it('generates a 43 character verifier whose challenge matches', () => {
    const pair = generatePkcePair();
    expect(pair.codeVerifier).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(pair.codeChallenge).toBe(computeS256Challenge(pair.codeVerifier));
    expect(pair.codeChallenge).not.toContain('=');
  });

  it('never repeats verifiers or states', () => {
    const verifiers = new Set(Array.from({ length: 50 }, () => generatePkcePair().codeVerifier));
    const states = new Set(Array.from({ length: 50 }, () => generateState()));
    expect(verifiers.size).toBe(50);
    expect(states.size).toBe(50);
  });

  it('generates URL-safe states carrying 16 bytes', () => {
    expect(generateState()).toMatch(/^[A-Za-z0-9_-]{22}$/);
  });
});
