import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z, ZodError } from 'zod';
import type { AppConfig } from './config.js';
import {
  ExchangeApiError,
  NoSessionError,
  OAuthFlowError,
  ReauthenticationRequiredError,
} from './errors.js';
import type { ExchangeApiClient, ExchangeUser } from './exchange-api.js';
import { resolvePatientAndPractitioner, type LaunchIdentity } from './launch-context.js';
import { buildAuthorizationRedirect } from './oauth/authorize.js';
import { completeAuthorization, type CallbackDeps } from './oauth/callback.js';
import { normalizeIssuer, type DiscoveryCache } from './oauth/discovery.js';
import type { OutboundHttp } from './oauth/http.js';
import type { TokenExchangeBridge } from './oauth/token-exchange.js';
import type { ExchangedToken, TokenResponse } from './oauth/types.js';
import type { SessionContext, SessionManager } from './session/manager.js';
import type { Session, StoredExchangeToken } from './session/types.js';

export interface ViewerServices {
  config: AppConfig;
  sessions: SessionManager;
  discovery: DiscoveryCache;
  http: OutboundHttp;
  bridge: TokenExchangeBridge;
  exchangeApi: ExchangeApiClient;
  now: () => number;
}

const launchQuery = z.object({
  iss: z.string().url().optional(),
  launch: z.string().min(1).optional(),
});

const callbackQuery = z.object({
  code: z.string().optional(),
  state: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

interface ExchangeStatus {
  connected: boolean;
  user?: ExchangeUser;
  loginUrl?: string;
}

export interface SessionSummary extends LaunchIdentity {
  authenticated: boolean;
  embedded: boolean;
  issuer: string | null;
  exchange: ExchangeStatus;
}

function sessionContext(req: FastifyRequest, reply: FastifyReply): SessionContext {
  const fetchDest = req.headers['sec-fetch-dest'];
  return {
    cookieHeader: req.headers.cookie,
    host: req.headers.host,
    fetchDest: typeof fetchDest === 'string' ? fetchDest : undefined,
    iframeParam: new URL(req.url, 'http://viewer.invalid').searchParams.get('iframe') ?? undefined,
    setCookie: (header) => {
      reply.header('Set-Cookie', header);
    },
  };
}

function storedExchangeToken(token: ExchangedToken, now: number): StoredExchangeToken {
  return {
    ...token,
    expiresAt: token.expiresIn !== undefined ? now + token.expiresIn * 1000 : undefined,
  };
}

function exchangeTokenFromResponse(tokenResponse: TokenResponse): ExchangedToken {
  return {
    accessToken: tokenResponse.access_token,
    tokenType: tokenResponse.token_type,
    expiresIn: tokenResponse.expires_in,
    scope: tokenResponse.scope,
  };
}

export async function createViewer(app: FastifyInstance, services: ViewerServices) {
  const { config, sessions, discovery, bridge, exchangeApi } = services;
  const callbackDeps: CallbackDeps = { discovery, http: services.http, sessions, logger: app.log };
  const exchangeIssuer = `${config.exchange.publicUrl}/o`;

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof OAuthFlowError) {
      const level = error.statusCode >= 500 ? 'error' : 'warn';
      req.log[level]({ err: error, code: error.code }, 'OAuth flow failed');
      return reply.status(error.statusCode).send({ error: error.code, message: error.message });
    }
    if (error instanceof ZodError) {
      const message = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      return reply.status(400).send({ error: 'invalid_request', message });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.code ?? 'request_error', message: error.message });
    }
    req.log.error({ err: error }, 'Request failed');
    return reply.status(500).send({ error: 'server_error', message: 'Internal error' });
  });

  // Drops a stored exchange token the exchange service no longer accepts.
  async function verifyExchangeToken(req: FastifyRequest, session: Session): Promise<ExchangeUser | null> {
    if (!session.exchange) return null;
    try {
      return await exchangeApi.getUser(session.exchange.accessToken);
    } catch (err) {
      if (!(err instanceof ReauthenticationRequiredError)) throw err;
      req.log.info({ status: err.status }, 'Stored exchange token rejected, login required');
      delete session.exchange;
      await sessions.save(session);
      return null;
    }
  }

  // Summary of the caller's launch state; tokens are never included
  app.get('/', async (req, reply): Promise<SessionSummary> => {
    const ctx = sessionContext(req, reply);
    const session = await sessions.get(ctx);

    let identity: LaunchIdentity = { patientId: null, practitionerReference: null };
    if (session?.fhir) {
      try {
        identity = resolvePatientAndPractitioner(session.fhir);
      } catch (err) {
        req.log.warn({ err }, 'Could not decode id_token for practitioner');
        identity = { patientId: session.fhir.patient ?? null, practitionerReference: null };
      }
    }

    let exchange: ExchangeStatus = { connected: false, loginUrl: '/jhe_login' };
    if (session) {
      const user = await verifyExchangeToken(req, session);
      if (user) exchange = { connected: true, user };
    }

    return {
      authenticated: Boolean(session?.fhir),
      embedded: sessions.isEmbedded(ctx),
      issuer: session?.issuer ?? null,
      ...identity,
      exchange,
    };
  });

  // SMART EHR launch (iss + launch) or standalone launch against FHIR_API_BASE
  app.get('/launch', async (req, reply) => {
    const { iss, launch } = launchQuery.parse(req.query);
    const session = await sessions.get(sessionContext(req, reply), { makeNew: true });
    const issuer = normalizeIssuer(iss ?? config.fhir.apiBase);
    session.issuer = issuer;

    const redirect = await buildAuthorizationRedirect(discovery, {
      issuer,
      clientId: config.fhir.clientId,
      redirectUri: config.fhir.redirectUri,
      scope: config.fhir.scope,
      extraParams: launch ? { launch, aud: issuer } : { aud: issuer },
    });
    // persist before redirecting, or the callback has nothing to validate against
    await sessions.beginAuthorization(session, 'fhir', {
      state: redirect.state,
      codeVerifier: redirect.codeVerifier,
    });
    req.log.info({ url: redirect.url }, 'Redirecting to FHIR authorization');
    return reply.redirect(redirect.url);
  });

  app.get('/callback', async (req, reply) => {
    const q = callbackQuery.parse(req.query);
    const session = await sessions.get(sessionContext(req, reply));
    if (!session?.issuer) throw new NoSessionError();
    const issuer = session.issuer;

    const tokenResponse = await completeAuthorization(callbackDeps, {
      session,
      provider: 'fhir',
      issuer,
      clientId: config.fhir.clientId,
      redirectUri: config.fhir.redirectUri,
      callback: { code: q.code, state: q.state, error: q.error, errorDescription: q.error_description },
      extraParams: q.state ? { state: q.state } : {},
    });
    session.fhir = tokenResponse;
    await sessions.save(session);
    req.log.info({ issuer, profile: tokenResponse.profile ?? null }, 'Authenticated with FHIR issuer');

    const exchanged = await bridge.exchange({
      targetBaseUrl: config.exchange.url,
      subjectToken: tokenResponse.access_token,
      issuer,
    });
    session.exchange = storedExchangeToken(exchanged, services.now());
    await sessions.save(session);

    const user = await exchangeApi.getUser(exchanged.accessToken);
    req.log.info({ exchange: config.exchange.url, user: user['id'] ?? null }, 'Authenticated with exchange service');
    return reply.redirect('/');
  });

  app.get('/jhe_login', async (req, reply) => {
    const ctx = sessionContext(req, reply);
    const session = (await sessions.get(ctx)) ?? (await sessions.get(ctx, { makeNew: true }));

    if (session.exchange) {
      try {
        if (await verifyExchangeToken(req, session)) return reply.redirect('/');
      } catch (err) {
        if (!(err instanceof ExchangeApiError)) throw err;
        req.log.error({ err }, 'Failed to get exchange user, logging in again');
        delete session.exchange;
        await sessions.save(session);
      }
    }

    const redirect = await buildAuthorizationRedirect(discovery, {
      issuer: exchangeIssuer,
      clientId: config.exchange.clientId,
      redirectUri: config.exchange.redirectUri,
      scope: config.exchange.scope,
    });
    await sessions.beginAuthorization(session, 'exchange', {
      state: redirect.state,
      codeVerifier: redirect.codeVerifier,
    });
    req.log.info({ url: redirect.url }, 'Redirecting to exchange service authorization');
    return reply.redirect(redirect.url);
  });

  app.get('/jhe_callback', async (req, reply) => {
    const q = callbackQuery.parse(req.query);
    const session = await sessions.get(sessionContext(req, reply));
    if (!session) throw new NoSessionError();

    const tokenResponse = await completeAuthorization(callbackDeps, {
      session,
      provider: 'exchange',
      issuer: exchangeIssuer,
      clientId: config.exchange.clientId,
      redirectUri: config.exchange.redirectUri,
      callback: { code: q.code, state: q.state, error: q.error, errorDescription: q.error_description },
    });
    session.exchange = storedExchangeToken(exchangeTokenFromResponse(tokenResponse), services.now());
    await sessions.save(session);

    const user = await exchangeApi.getUser(tokenResponse.access_token);
    req.log.info({ user: user['id'] ?? null }, 'Authenticated with exchange service');
    return reply.redirect('/');
  });

  app.get('/logout', async (req, reply) => {
    await sessions.logout(sessionContext(req, reply));
    return reply.redirect('/');
  });

  app.get('/healthz', async () => ({ ok: true }));
  app.get('/readyz', async () => ({ ok: true }));
}
