/**
 * Error taxonomy for the launch and exchange flows.
 *
 * Client-caused failures (missing or mismatched state, missing code, no
 * session) map to 400; provider and network failures map to 500.
 */

export type OAuthFlowErrorCode =
  | 'discovery_failed'
  | 'missing_code'
  | 'missing_state'
  | 'state_mismatch'
  | 'provider_error'
  | 'token_exchange_failed'
  | 'no_session'
  | 'exchange_api_failed'
  | 'reauthentication_required';

export abstract class OAuthFlowError extends Error {
  abstract readonly code: OAuthFlowErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DiscoveryError extends OAuthFlowError {
  readonly code = 'discovery_failed';
  readonly statusCode = 500;

  constructor(readonly issuer: string, cause: unknown) {
    super(`OpenID configuration could not be loaded for ${issuer}`, { cause });
  }
}

export class MissingCodeError extends OAuthFlowError {
  readonly code = 'missing_code';
  readonly statusCode = 400;

  constructor() {
    super('Missing code= parameter');
  }
}

export class MissingStateError extends OAuthFlowError {
  readonly code = 'missing_state';
  readonly statusCode = 400;

  constructor() {
    super('OAuth state missing');
  }
}

export class StateMismatchError extends OAuthFlowError {
  readonly code = 'state_mismatch';
  readonly statusCode = 400;

  constructor() {
    super("OAuth state doesn't match");
  }
}

export class ProviderError extends OAuthFlowError {
  readonly code = 'provider_error';
  readonly statusCode = 500;

  constructor(readonly providerCode: string, description: string) {
    super(description || providerCode);
  }
}

export class TokenExchangeError extends OAuthFlowError {
  readonly code = 'token_exchange_failed';
  readonly statusCode = 500;

  /**
   * @param status - HTTP status from the provider, absent for transport failures
   * @param providerBody - response body as returned by the provider
   */
  constructor(
    message: string,
    readonly status?: number,
    readonly providerBody?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class NoSessionError extends OAuthFlowError {
  readonly code = 'no_session';
  readonly statusCode = 400;

  constructor() {
    super('No session, start again');
  }
}

export class ExchangeApiError extends OAuthFlowError {
  readonly code = 'exchange_api_failed';
  readonly statusCode = 502;

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

// The exchange service rejected a stored bearer token; the user has to go through /jhe_login again.
export class ReauthenticationRequiredError extends OAuthFlowError {
  readonly code = 'reauthentication_required';
  readonly statusCode = 401;

  constructor(readonly status: number) {
    super(`Exchange service rejected the stored token (${status})`);
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}
