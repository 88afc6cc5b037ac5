import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import formbody from '@fastify/formbody';
import { UnsecuredJWT } from 'jose';
import { z } from 'zod';
import { randomToken, sha256Base64Url } from '@launch-bridge/shared';

/**
 * Local stand-in for both upstream parties: a SMART-on-FHIR EHR authorization
 * server (served at the root, so discovery under a `/fhir` issuer only
 * succeeds through the origin fallback) and the exchange service (under `/o`,
 * plus its token-exchange and user APIs).
 */

const TOKEN_EXCHANGE_GRANT = 'urn:ietf:params:oauth:grant-type:token-exchange';
const ACCESS_TOKEN_TYPE = 'urn:ietf:params:oauth:token-type:access_token';

type Realm = 'fhir' | 'exchange';

type CodeRecord = {
  realm: Realm;
  codeChallenge: string;
  clientId: string;
  redirectUri: string;
  scope: string;
  user: string;
  issuedAt: number;
};

type AccessRecord = {
  realm: Realm;
  user: string;
  exp: number;
};

export interface MockIdpOptions {
  logLevel?: string;
  patientId?: string;
  practitionerReference?: string;
  /** lifetime of issued access tokens */
  tokenTtlSeconds?: number;
}

export interface MockIdp {
  app: FastifyInstance;
  /** Invalidate every token issued to a user, as an admin revocation would. */
  revokeUser(user: string): number;
  readonly exchangeRequests: ReadonlyArray<Record<string, string>>;
}

const authorizeQuery = z.object({
  response_type: z.literal('code'),
  client_id: z.string().min(1),
  redirect_uri: z.string().url(),
  scope: z.string().default(''),
  state: z.string().min(1),
  code_challenge: z.string().min(43),
  code_challenge_method: z.literal('S256'),
  launch: z.string().optional(),
  aud: z.string().optional(),
});

const loginForm = z.object({
  user: z.string().min(1),
  pass: z.string(),
});

const tokenForm = z.object({
  grant_type: z.literal('authorization_code'),
  code: z.string().min(1),
  code_verifier: z.string().min(1),
  client_id: z.string().min(1),
  redirect_uri: z.string(),
});

const exchangeForm = z.object({
  grant_type: z.literal(TOKEN_EXCHANGE_GRANT),
  subject_token: z.string().min(1),
  subject_token_type: z.literal(ACCESS_TOKEN_TYPE),
  requested_token_type: z.literal(ACCESS_TOKEN_TYPE),
  iss: z.string().min(1),
  audience: z.string().min(1),
});

function origin(req: FastifyRequest): string {
  return `${req.protocol}://${req.headers.host ?? 'localhost'}`;
}

function bearer(req: FastifyRequest): string {
  const auth = req.headers.authorization || '';
  return auth.startsWith('Bearer ') ? auth.slice(7) : '';
}

export async function buildMockIdp(options: MockIdpOptions = {}): Promise<MockIdp> {
  const patientId = options.patientId ?? 'pat-123';
  const practitionerReference = options.practitionerReference ?? 'Practitioner/prac-456';
  const tokenTtl = options.tokenTtlSeconds ?? 3600;

  const app = Fastify({ logger: { level: options.logLevel || 'info' } });
  await app.register(formbody);

  const codes = new Map<string, CodeRecord>();
  const accessTokens = new Map<string, AccessRecord>();
  const exchangeRequests: Record<string, string>[] = [];

  function issueAccessToken(realm: Realm, user: string): string {
    const token = `${realm}-${randomToken(24)}`;
    accessTokens.set(token, { realm, user, exp: Math.floor(Date.now() / 1000) + tokenTtl });
    return token;
  }

  function lookupAccessToken(token: string, realm: Realm): AccessRecord | undefined {
    const rec = accessTokens.get(token);
    if (!rec || rec.realm !== realm) return undefined;
    if (rec.exp < Math.floor(Date.now() / 1000)) return undefined;
    return rec;
  }

  app.get('/healthz', async () => ({ ok: true }));

  const realms: Array<[Realm, string]> = [
    ['fhir', ''],
    ['exchange', '/o'],
  ];

  for (const [realm, prefix] of realms) {
    app.get(`${prefix}/.well-known/openid-configuration`, async (req) => {
      const base = origin(req) + prefix;
      return {
        issuer: base,
        authorization_endpoint: `${base}/authorize`,
        token_endpoint: `${base}/token`,
        response_types_supported: ['code'],
        code_challenge_methods_supported: ['S256'],
      };
    });

    app.get(`${prefix}/authorize`, async (req, reply) => {
      const q = authorizeQuery.safeParse(req.query);
      if (!q.success) return reply.status(400).send({ error: 'invalid_request' });
      const action = `${prefix}/authorize?${new URLSearchParams(req.url.split('?')[1] ?? '')}`;
      const html = `<!doctype html><html><body>
    <h1>Mock ${realm === 'fhir' ? 'EHR' : 'Exchange'} Login</h1>
    <form method="POST" action="${action}">
      <label>User: <input name="user" value="practitioner"></label><br>
      <label>Password: <input name="pass" type="password" value="pass"></label><br>
      <button type="submit">Login</button>
    </form>
  </body></html>`;
      return reply.type('text/html').send(html);
    });

    app.post(`${prefix}/authorize`, async (req, reply) => {
      const q = authorizeQuery.safeParse(req.query);
      if (!q.success) return reply.status(400).send({ error: 'invalid_request' });
      const form = loginForm.safeParse(req.body);
      if (!form.success || form.data.pass !== 'pass') return reply.status(401).send('Invalid');

      const code = randomToken(16);
      codes.set(code, {
        realm,
        codeChallenge: q.data.code_challenge,
        clientId: q.data.client_id,
        redirectUri: q.data.redirect_uri,
        scope: q.data.scope,
        user: form.data.user,
        issuedAt: Date.now(),
      });
      const redir = new URL(q.data.redirect_uri);
      redir.searchParams.set('code', code);
      redir.searchParams.set('state', q.data.state);
      return reply.redirect(redir.toString());
    });

    app.post(`${prefix}/token`, async (req, reply) => {
      const body = tokenForm.safeParse(req.body);
      if (!body.success) return reply.status(400).send({ error: 'unsupported_grant_type' });
      const rec = codes.get(body.data.code);
      if (!rec || rec.realm !== realm) return reply.status(400).send({ error: 'invalid_grant' });
      codes.delete(body.data.code); // one-time use
      if (sha256Base64Url(body.data.code_verifier) !== rec.codeChallenge) {
        return reply.status(400).send({ error: 'invalid_grant', error_description: 'PKCE mismatch' });
      }
      if (body.data.client_id !== rec.clientId || body.data.redirect_uri !== rec.redirectUri) {
        return reply.status(400).send({ error: 'invalid_grant', error_description: 'client mismatch' });
      }

      const accessToken = issueAccessToken(realm, rec.user);
      if (realm === 'exchange') {
        return { access_token: accessToken, token_type: 'Bearer', expires_in: tokenTtl, scope: rec.scope };
      }
      const idToken = new UnsecuredJWT({ fhirUser: practitionerReference })
        .setIssuer(origin(req))
        .setSubject(rec.user)
        .setAudience(rec.clientId)
        .setIssuedAt()
        .setExpirationTime('1h')
        .encode();
      return {
        access_token: accessToken,
        token_type: 'Bearer',
        expires_in: tokenTtl,
        scope: rec.scope,
        patient: patientId,
        id_token: idToken,
      };
    });
  }

  app.post('/o/token-exchange', async (req, reply) => {
    const body = exchangeForm.safeParse(req.body);
    if (!body.success) return reply.status(400).send({ error: 'invalid_request' });
    exchangeRequests.push({ ...body.data });
    const subject = lookupAccessToken(body.data.subject_token, 'fhir');
    if (!subject) return reply.status(403).send({ error: 'invalid_grant', error_description: 'unknown subject token' });
    return {
      access_token: issueAccessToken('exchange', subject.user),
      issued_token_type: ACCESS_TOKEN_TYPE,
      token_type: 'Bearer',
      expires_in: tokenTtl,
      scope: 'openid',
    };
  });

  app.get('/api/v1/users/profile', async (req, reply) => {
    const rec = lookupAccessToken(bearer(req), 'exchange');
    if (!rec) return reply.status(401).send({ error: 'unauthorized' });
    return { id: rec.user, email: `${rec.user}@example.test`, practitioner: practitionerReference };
  });

  return {
    app,
    revokeUser(user: string): number {
      let revoked = 0;
      for (const [token, rec] of accessTokens) {
        if (rec.user === user) {
          accessTokens.delete(token);
          revoked++;
        }
      }
      return revoked;
    },
    exchangeRequests,
  };
}
