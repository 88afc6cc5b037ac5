/**
 * Minimal client for the exchange service's own API, used to check that a
 * stored token is still accepted.
 */

import { ExchangeApiError, ReauthenticationRequiredError } from './errors.js';
import { isSuccess, type OutboundHttp, type OutboundResponse } from './oauth/http.js';

export type ExchangeUser = Record<string, unknown>;

export class ExchangeApiClient {
  constructor(
    private readonly http: OutboundHttp,
    private readonly baseUrl: string,
  ) {}

  /**
   * @throws ReauthenticationRequiredError on 401/403, the signal that the
   *   stored token expired or was revoked
   */
  async getUser(accessToken: string): Promise<ExchangeUser> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/api/v1/users/profile`;
    let res: OutboundResponse;
    try {
      res = await this.http.getJson(url, { authorization: `Bearer ${accessToken}` });
    } catch (err) {
      throw new ExchangeApiError(`GET ${url} failed`, undefined, { cause: err });
    }
    if (res.statusCode === 401 || res.statusCode === 403) {
      throw new ReauthenticationRequiredError(res.statusCode);
    }
    if (!isSuccess(res.statusCode)) {
      throw new ExchangeApiError(`GET ${url} returned ${res.statusCode}`, res.statusCode);
    }
    if (!isRecord(res.body)) {
      throw new ExchangeApiError(`GET ${url} returned a non-object body`, res.statusCode);
    }
    return res.body;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
