// Shared encoding utilities for the viewer and the mock identity provider
import { createHash, createHmac, randomBytes, timingSafeEqual } from 'node:crypto';

// base64url(SHA-256(input)) without padding, the RFC 7636 S256 transform
export function sha256Base64Url(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('base64url');
}

export function randomToken(bytes = 16): string {
  return randomBytes(bytes).toString('base64url');
}

export function hmacHex(secret: string, value: string): string {
  return createHmac('sha256', Buffer.from(secret, 'utf8')).update(value).digest('hex');
}

export function constantTimeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
