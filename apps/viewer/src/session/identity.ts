/**
 * How a request maps to a stored session.
 *
 * `shared-embedded` exists because a loopback EHR that renders the viewer in
 * an iframe blocks the third-party session cookie, so every embedded request
 * lands on one fixed record. It is only honoured when ALLOW_EMBEDDED_SESSION
 * is set and must never be enabled where more than one embedded user can be
 * active at once: they would all share credentials.
 */
export type SessionIdentity =
  | { kind: 'per-visitor'; id: string }
  | { kind: 'shared-embedded' };

export const SHARED_EMBEDDED_KEY = 'iframe';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1']);

export interface EmbeddingHints {
  host?: string;
  fetchDest?: string;
  /** the `iframe` query parameter, as sent; stands in for `Sec-Fetch-Dest` */
  iframeParam?: string;
}

/** An iframe request (by header or query hint) to a loopback host. */
export function isLocalIframe(hints: EmbeddingHints): boolean {
  const hostname = (hints.host ?? '').split(':')[0]?.toLowerCase() ?? '';
  if (!LOOPBACK_HOSTS.has(hostname)) return false;
  return hints.fetchDest === 'iframe' || Boolean(hints.iframeParam);
}

export function storageKey(identity: SessionIdentity): string {
  return identity.kind === 'shared-embedded' ? SHARED_EMBEDDED_KEY : identity.id;
}
