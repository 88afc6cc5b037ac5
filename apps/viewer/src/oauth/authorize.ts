import type { DiscoveryCache } from './discovery.js';
import { generatePkcePair, generateState } from './pkce.js';
import type { AuthorizationRedirect, AuthorizationRequest } from './types.js';

/**
 * Build the provider authorization URL with a fresh state and PKCE pair.
 *
 * Nothing is persisted here: the caller must store `state` and
 * `codeVerifier` in the session before sending the redirect, or the
 * callback cannot be validated.
 */
export async function buildAuthorizationRedirect(
  discovery: DiscoveryCache,
  request: AuthorizationRequest,
): Promise<AuthorizationRedirect> {
  const config = await discovery.resolve(request.issuer);
  const state = generateState();
  const { codeVerifier, codeChallenge } = generatePkcePair();

  const url = new URL(config.authorization_endpoint);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('client_id', request.clientId);
  url.searchParams.set('redirect_uri', request.redirectUri);
  url.searchParams.set('scope', request.scope);
  url.searchParams.set('state', state);
  url.searchParams.set('code_challenge', codeChallenge);
  url.searchParams.set('code_challenge_method', 'S256');
  for (const [key, value] of Object.entries(request.extraParams ?? {})) {
    url.searchParams.set(key, value);
  }

  // the state bound to the session must be the one the provider echoes back
  const boundState = url.searchParams.get('state') ?? state;
  return { url: url.toString(), state: boundState, codeVerifier, codeChallenge };
}
