import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { Dispatcher } from 'undici';
import type { AppConfig } from './config.js';
import { ExchangeApiClient } from './exchange-api.js';
import { DiscoveryCache } from './oauth/discovery.js';
import { OutboundHttp } from './oauth/http.js';
import { IssuerRewriter, TokenExchangeBridge } from './oauth/token-exchange.js';
import { createViewer } from './server.js';
import { SessionCookie } from './session/cookie.js';
import { SessionManager } from './session/manager.js';
import { MemorySessionStore, type SessionStore } from './session/store.js';

const SWEEP_INTERVAL_MS = 5 * 60 * 1000;

export interface ViewerOptions {
  /** undici dispatcher for outbound calls (tests pass a MockAgent) */
  dispatcher?: Dispatcher;
  sessionStore?: SessionStore;
  now?: () => number;
}

export async function buildApp(config: AppConfig, options: ViewerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    trustProxy: true,
    logger: {
      level: config.logLevel,
      redact: ['req.headers.authorization', 'req.headers.cookie', 'res.headers["set-cookie"]'],
    },
  });

  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: '1 minute',
  });

  const now = options.now ?? Date.now;
  const http = new OutboundHttp({ timeoutMs: config.httpTimeoutMs, dispatcher: options.dispatcher });
  const sessions = new SessionManager({
    store: options.sessionStore ?? new MemorySessionStore(),
    cookie: new SessionCookie({
      secret: config.sessionSecret,
      secure: config.cookieSecure,
      maxAgeSeconds: Math.floor(config.sessionTtlMs / 1000),
    }),
    logger: app.log,
    allowEmbedded: config.allowEmbeddedSession,
    pendingTtlMs: config.pendingTtlMs,
    sessionTtlMs: config.sessionTtlMs,
    now,
  });

  if (config.sessionSecretGenerated) {
    app.log.warn('SESSION_SECRET not set, using a per-process secret; sessions will not survive a restart');
  }

  const sweeper = setInterval(() => {
    sessions
      .sweep()
      .then((removed) => {
        if (removed > 0) app.log.debug({ removed }, 'Swept idle sessions');
      })
      .catch((err: unknown) => {
        app.log.error({ err }, 'Session sweep failed');
      });
  }, SWEEP_INTERVAL_MS);
  sweeper.unref();
  app.addHook('onClose', async () => {
    clearInterval(sweeper);
  });

  await createViewer(app, {
    config,
    sessions,
    discovery: new DiscoveryCache(http, app.log),
    http,
    bridge: new TokenExchangeBridge(http, new IssuerRewriter(config.exchange.issuerAliases), app.log),
    exchangeApi: new ExchangeApiClient(http, config.exchange.url),
    now,
  });

  return app;
}
