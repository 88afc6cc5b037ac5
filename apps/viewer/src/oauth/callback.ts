import type { FastifyBaseLogger } from 'fastify';
import {
  MissingCodeError,
  MissingStateError,
  ProviderError,
  StateMismatchError,
  TokenExchangeError,
} from '../errors.js';
import type { SessionManager } from '../session/manager.js';
import type { Session } from '../session/types.js';
import type { DiscoveryCache } from './discovery.js';
import { isSuccess, type OutboundHttp, type OutboundResponse } from './http.js';
import { describeIssues, tokenResponseSchema, type CallbackParams, type ProviderKind, type TokenResponse } from './types.js';

export interface CallbackDeps {
  discovery: DiscoveryCache;
  http: OutboundHttp;
  sessions: SessionManager;
  logger: FastifyBaseLogger;
}

export interface CompleteAuthorizationRequest {
  session: Session;
  provider: ProviderKind;
  issuer: string;
  clientId: string;
  redirectUri: string;
  callback: CallbackParams;
  /** merged last into the token request body */
  extraParams?: Record<string, string>;
}

/**
 * Validate an authorization callback and redeem the code.
 *
 * The session's pending state and verifier are consumed before anything is
 * checked, so a callback can be attempted at most once per issued state
 * whatever the outcome.
 */
export async function completeAuthorization(
  deps: CallbackDeps,
  request: CompleteAuthorizationRequest,
): Promise<TokenResponse> {
  const pending = await deps.sessions.consumePending(request.session, request.provider);
  const { code, state, error, errorDescription } = request.callback;

  if (error) {
    throw new ProviderError(error, errorDescription ?? '');
  }
  if (!code) {
    throw new MissingCodeError();
  }
  if (!state) {
    throw new MissingStateError();
  }
  if (!pending || state !== pending.state) {
    throw new StateMismatchError();
  }

  const config = await deps.discovery.resolve(request.issuer);
  const form = new URLSearchParams({
    grant_type: 'authorization_code',
    code,
    client_id: request.clientId,
    code_verifier: pending.codeVerifier,
    redirect_uri: request.redirectUri,
  });
  for (const [key, value] of Object.entries(request.extraParams ?? {})) {
    form.set(key, value);
  }

  let res: OutboundResponse;
  try {
    res = await deps.http.postForm(config.token_endpoint, form);
  } catch (err) {
    throw new TokenExchangeError(`Token request to ${config.token_endpoint} failed`, undefined, undefined, {
      cause: err,
    });
  }
  if (!isSuccess(res.statusCode)) {
    deps.logger.error(
      { provider: request.provider, status: res.statusCode, body: res.body },
      'Token request rejected',
    );
    throw new TokenExchangeError(
      `Token endpoint returned ${res.statusCode}`,
      res.statusCode,
      res.body,
    );
  }

  const parsed = tokenResponseSchema.safeParse(res.body);
  if (!parsed.success) {
    throw new TokenExchangeError(
      `Token endpoint response is invalid: ${describeIssues(parsed.error)}`,
      res.statusCode,
      res.body,
    );
  }
  return parsed.data;
}
