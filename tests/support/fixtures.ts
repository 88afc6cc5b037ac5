/**
 * Shared test fixtures: configuration, a silent logger, undici mocks and a
 * cookie-capturing session context.
 */

import Fastify from 'fastify';
import { MockAgent } from 'undici';
import { loadConfig, type AppConfig } from '../../apps/viewer/src/config.js';
import { OutboundHttp } from '../../apps/viewer/src/oauth/http.js';
import { SessionCookie } from '../../apps/viewer/src/session/cookie.js';
import { SessionManager, type SessionContext } from '../../apps/viewer/src/session/manager.js';
import { MemorySessionStore } from '../../apps/viewer/src/session/store.js';

export const SESSION_SECRET = 'test-secret-test-secret';
export const EHR_ORIGIN = 'https://ehr.example';
export const EHR_ISSUER = `${EHR_ORIGIN}/fhir`;
export const EXCHANGE_URL = 'https://exchange.example';

export const TEST_ENV = {
  APP_HOST: 'http://viewer.test',
  SESSION_SECRET,
  FHIR_CLIENT_ID: 'viewer-client',
  FHIR_API_BASE: EHR_ISSUER,
  JHE_URL: EXCHANGE_URL,
  JHE_CLIENT_ID: 'exchange-client',
  LOG_LEVEL: 'silent',
};

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...overrides });
}

export const silentLogger = Fastify({ logger: false }).log;

export function mockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}

export function outboundHttp(agent: MockAgent, timeoutMs = 2_000): OutboundHttp {
  return new OutboundHttp({ timeoutMs, dispatcher: agent });
}

export function discoveryDocument(base: string) {
  return {
    issuer: base,
    authorization_endpoint: `${base}/authorize`,
    token_endpoint: `${base}/token`,
  };
}

export interface RecordedContext extends SessionContext {
  cookies: string[];
}

export function requestContext(init: Omit<SessionContext, 'setCookie'> = {}): RecordedContext {
  const cookies: string[] = [];
  return {
    ...init,
    cookies,
    setCookie: (header) => {
      cookies.push(header);
    },
  };
}

/** Cookie header a browser would send back for the last Set-Cookie. */
export function cookieFrom(ctx: RecordedContext): string {
  const last = ctx.cookies[ctx.cookies.length - 1] ?? '';
  return last.split(';')[0] ?? '';
}

export interface Clock {
  now: () => number;
  advance(ms: number): void;
}

export function fakeClock(start = 1_700_000_000_000): Clock {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
  };
}

export function sessionManager(
  options: { clock?: Clock; allowEmbedded?: boolean; store?: MemorySessionStore } = {},
): { sessions: SessionManager; store: MemorySessionStore } {
  const store = options.store ?? new MemorySessionStore();
  const sessions = new SessionManager({
    store,
    cookie: new SessionCookie({ secret: SESSION_SECRET, secure: false, maxAgeSeconds: 3600 }),
    logger: silentLogger,
    allowEmbedded: options.allowEmbedded ?? false,
    pendingTtlMs: 600_000,
    sessionTtlMs: 3_600_000,
    now: options.clock?.now,
  });
  return { sessions, store };
}
