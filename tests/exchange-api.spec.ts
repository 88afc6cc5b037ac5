import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { MockAgent } from 'undici';
import { ExchangeApiError, ReauthenticationRequiredError } from '../apps/viewer/src/errors.js';
import { ExchangeApiClient } from '../apps/viewer/src/exchange-api.js';
import { EXCHANGE_URL, mockAgent, outboundHttp } from './support/fixtures.js';

describe('ExchangeApiClient', () => {
  let agent: MockAgent;
  let client: ExchangeApiClient;

  beforeEach(() => {
    agent = mockAgent();
    client = new ExchangeApiClient(outboundHttp(agent), `${EXCHANGE_URL}/`);
  });

  afterEach(async () => {
    await agent.close();
  });

  function serveProfile(statusCode: number, data: object | string) {
    agent
      .get(EXCHANGE_URL)
      .intercept({
        path: '/api/v1/users/profile',
        method: 'GET',
        headers: { authorization: 'Bearer exchanged-1' },
      })
      .reply(statusCode, data);
  }

  it('returns the user for a valid token', async () => {
    serveProfile(200, { id: 7, email: 'practitioner@example.test' });
    await expect(client.getUser('exchanged-1')).resolves.toEqual({ id: 7, email: 'practitioner@example.test' });
  });

  it.each([401, 403])('asks for re-authentication on %i', async (status) => {
    serveProfile(status, { detail: 'token expired' });
    const error = await client.getUser('exchanged-1').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ReauthenticationRequiredError);
    expect(error).toMatchObject({ status, statusCode: 401, code: 'reauthentication_required' });
  });

  it('reports other failures as ExchangeApiError', async () => {
    serveProfile(503, 'unavailable');
    await expect(client.getUser('exchanged-1')).rejects.toMatchObject({
      name: 'ExchangeApiError',
      status: 503,
      statusCode: 502,
    });
  });

  it('rejects a body that is not an object', async () => {
    serveProfile(200, '"just a string"');
    await expect(client.getUser('exchanged-1')).rejects.toBeInstanceOf(ExchangeApiError);
  });
});
