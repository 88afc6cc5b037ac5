import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { MockAgent } from 'undici';
import { DiscoveryError } from '../apps/viewer/src/errors.js';
import { buildAuthorizationRedirect } from '../apps/viewer/src/oauth/authorize.js';
import { DiscoveryCache } from '../apps/viewer/src/oauth/discovery.js';
import { computeS256Challenge } from '../apps/viewer/src/oauth/pkce.js';
import { EHR_ISSUER, EHR_ORIGIN, discoveryDocument, mockAgent, outboundHttp, silentLogger } from './support/fixtures.js';

describe('buildAuthorizationRedirect', () => {
  let agent: MockAgent;
  let discovery: DiscoveryCache;

  beforeEach(() => {
    agent = mockAgent();
    discovery = new DiscoveryCache(outboundHttp(agent), silentLogger);
  });

  afterEach(async () => {
    await agent.close();
  });

  function serveDiscovery() {
    agent
      .get(EHR_ORIGIN)
      .intercept({ path: '/fhir/.well-known/openid-configuration', method: 'GET' })
      .reply(200, discoveryDocument(EHR_ISSUER));
  }

  it('builds the SMART authorization URL with PKCE and launch parameters', async () => {
    serveDiscovery();
    const redirect = await buildAuthorizationRedirect(discovery, {
      issuer: EHR_ISSUER,
      clientId: 'viewer-client',
      redirectUri: 'http://viewer.test/callback',
      scope: 'openid launch',
      extraParams: { launch: 'abc123', aud: EHR_ISSUER },
    });

    const url = new URL(redirect.url);
    expect(`${url.origin}${url.pathname}`).toBe(`${EHR_ISSUER}/authorize`);
    expect([...url.searchParams.keys()]).toEqual([
      'response_type',
      'client_id',
      'redirect_uri',
      'scope',
      'state',
      'code_challenge',
      'code_challenge_method',
      'launch',
      'aud',
    ]);
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('client_id')).toBe('viewer-client');
    expect(url.searchParams.get('redirect_uri')).toBe('http://viewer.test/callback');
    expect(url.searchParams.get('scope')).toBe('openid launch');
    expect(url.searchParams.get('state')).toBe(redirect.state);
    expect(url.searchParams.get('code_challenge')).toBe(computeS256Challenge(redirect.codeVerifier));
    expect(url.searchParams.get('code_challenge_method')).toBe('S256');
    expect(url.searchParams.get('launch')).toBe('abc123');
    expect(url.searchParams.get('aud')).toBe(EHR_ISSUER);
  });

  it('lets caller parameters override the defaults and binds the overriding state', async () => {
    serveDiscovery();
    const redirect = await buildAuthorizationRedirect(discovery, {
      issuer: EHR_ISSUER,
      clientId: 'viewer-client',
      redirectUri: 'http://viewer.test/callback',
      scope: 'openid',
      extraParams: { state: 'caller-state', scope: 'openid profile' },
    });

    const url = new URL(redirect.url);
    expect(redirect.state).toBe('caller-state');
    expect(url.searchParams.get('state')).toBe('caller-state');
    expect(url.searchParams.get('scope')).toBe('openid profile');
  });

  it('issues a fresh state and verifier per attempt', async () => {
    serveDiscovery();
    const request = {
      issuer: EHR_ISSUER,
      clientId: 'viewer-client',
      redirectUri: 'http://viewer.test/callback',
      scope: 'openid',
    };
    const first = await buildAuthorizationRedirect(discovery, request);
    const second = await buildAuthorizationRedirect(discovery, request);
    expect(second.state).not.toBe(first.state);
    expect(second.codeVerifier).not.toBe(first.codeVerifier);
  });

  it('propagates discovery failures', async () => {
    const pool = agent.get(EHR_ORIGIN);
    pool.intercept({ path: '/fhir/.well-known/openid-configuration', method: 'GET' }).reply(404, '');
    pool.intercept({ path: '/.well-known/openid-configuration', method: 'GET' }).reply(404, '');

    await expect(
      buildAuthorizationRedirect(discovery, {
        issuer: EHR_ISSUER,
        clientId: 'viewer-client',
        redirectUri: 'http://viewer.test/callback',
        scope: 'openid',
      }),
    ).rejects.toBeInstanceOf(DiscoveryError);
  });
});
