/**
 * RFC 8693 token exchange: trade the FHIR access token for an exchange
 * service token scoped to that service.
 */

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { TokenExchangeError } from '../errors.js';
import { isSuccess, type OutboundHttp, type OutboundResponse } from './http.js';
import { describeIssues, optionalNumber, optionalString, type ExchangedToken } from './types.js';

export const TOKEN_EXCHANGE_GRANT = 'urn:ietf:params:oauth:grant-type:token-exchange';
export const ACCESS_TOKEN_TYPE = 'urn:ietf:params:oauth:token-type:access_token';

const exchangeResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: optionalString,
  expires_in: optionalNumber,
  scope: optionalString,
  issued_token_type: optionalString,
});

/**
 * Rewrites the issuer claim before it is sent to the exchange service, e.g.
 * mapping a browser-facing `localhost` to the hostname the exchange service
 * uses to reach the same FHIR server. Which hosts are aliased is a
 * deployment trust decision and comes from configuration only.
 */
export class IssuerRewriter {
  constructor(private readonly aliases: ReadonlyMap<string, string>) {}

  rewrite(issuer: string): string {
    let url: URL;
    try {
      url = new URL(issuer);
    } catch {
      return issuer;
    }
    const alias = this.aliases.get(url.hostname.toLowerCase());
    if (!alias) return issuer;
    url.hostname = alias;
    const rewritten = url.toString();
    // URL adds a bare "/" path; keep the issuer's original form
    return !issuer.endsWith('/') && url.pathname === '/' ? rewritten.replace(/\/$/, '') : rewritten;
  }
}

export interface ExchangeRequest {
  targetBaseUrl: string;
  subjectToken: string;
  issuer: string;
}

export class TokenExchangeBridge {
  constructor(
    private readonly http: OutboundHttp,
    private readonly rewriter: IssuerRewriter,
    private readonly logger: FastifyBaseLogger,
  ) {}

  async exchange(request: ExchangeRequest): Promise<ExchangedToken> {
    const target = request.targetBaseUrl.replace(/\/+$/, '');
    const endpoint = `${target}/o/token-exchange`;
    const iss = this.rewriter.rewrite(request.issuer);
    const form = new URLSearchParams({
      subject_token: request.subjectToken,
      iss,
      audience: target,
      subject_token_type: ACCESS_TOKEN_TYPE,
      requested_token_type: ACCESS_TOKEN_TYPE,
      grant_type: TOKEN_EXCHANGE_GRANT,
    });

    let res: OutboundResponse;
    try {
      res = await this.http.postForm(endpoint, form);
    } catch (err) {
      throw new TokenExchangeError(`Token exchange with ${endpoint} failed`, undefined, undefined, { cause: err });
    }
    this.logger.info({ endpoint, iss, status: res.statusCode }, 'Token exchange response');
    if (!isSuccess(res.statusCode)) {
      throw new TokenExchangeError(`Token exchange returned ${res.statusCode}`, res.statusCode, res.body);
    }

    const parsed = exchangeResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new TokenExchangeError(
        `Token exchange response is invalid: ${describeIssues(parsed.error)}`,
        res.statusCode,
        res.body,
      );
    }
    const token = parsed.data;
    return {
      accessToken: token.access_token,
      tokenType: token.token_type,
      expiresIn: token.expires_in,
      scope: token.scope,
      issuedTokenType: token.issued_token_type,
    };
  }
}
