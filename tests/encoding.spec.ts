import { describe, it, expect } from 'vitest';
import { constantTimeEqual, hmacHex, randomToken, sha256Base64Url } from '@launch-bridge/shared';

describe('shared encoding', () => {
  it('hashes to base64url without padding', () => {
    expect(sha256Base64Url('test-verifier-0123456789-abcdefghijklmnopqrstuv')).toBe(
      '680IdP-aUA00b-bdVxY-BHXXHFEgT6Uuiw8M7OiG3RQ',
    );
  });

  it('signs with HMAC-SHA256 as hex', () => {
    expect(hmacHex('test-secret-test-secret', 'session-1')).toBe(
      '95d67da8809d82448b3b8923106d91e5ad1e0ef96b4a600cf41b89fdaf968f76',
    );
  });

  it('compares strings of different length as unequal', () => {
    expect(constantTimeEqual('abc', 'abc')).toBe(true);
    expect(constantTimeEqual('abc', 'abd')).toBe(false);
    expect(constantTimeEqual('abc', 'abcd')).toBe(false);
  });

  it('sizes random tokens by byte count', () => {
    expect(randomToken(32)).toHaveLength(43);
    expect(randomToken()).toHaveLength(22);
  });
});
