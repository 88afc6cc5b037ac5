import type { ExchangedToken, PendingAuthorization, ProviderKind, TokenResponse } from '../oauth/types.js';

/**
 * A visitor's OAuth state. Kept server-side only; the cookie carries nothing
 * but the signed session id. Must stay JSON-serializable for external stores.
 */
export interface Session {
  /** storage key: a random per-visitor id, or the shared embedded key */
  id: string;
  createdAt: number;
  lastSeenAt: number;
  /** FHIR issuer from the launch request; untrusted, used only as a lookup key */
  issuer?: string;
  /** at most one outstanding authorization per provider */
  pending: Partial<Record<ProviderKind, PendingAuthorization>>;
  fhir?: TokenResponse;
  exchange?: StoredExchangeToken;
}

export interface StoredExchangeToken extends ExchangedToken {
  /** epoch ms, when the provider reported an expiry */
  expiresAt?: number;
}
