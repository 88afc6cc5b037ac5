import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const DEFAULT_FHIR_SCOPE = 'user/*.* patient/*.read openid profile launch launch/patient';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const trimmedUrl = z
  .string()
  .url()
  .transform((v) => v.replace(/\/+$/, ''));

// "localhost=fhirproxy,127.0.0.1=fhirproxy" -> Map { localhost => fhirproxy, ... }
const hostAliases = z
  .string()
  .default('')
  .transform((raw, ctx) => {
    const aliases = new Map<string, string>();
    for (const entry of raw.split(',').map((s) => s.trim()).filter(Boolean)) {
      const [from, to] = entry.split('=').map((s) => s.trim());
      if (!from || !to) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid alias "${entry}", expected host=alias` });
        return z.NEVER;
      }
      aliases.set(from.toLowerCase(), to);
    }
    return aliases;
  });

const envSchema = z.object({
  APP_HOST: trimmedUrl.default('http://127.0.0.1:8000'),
  SESSION_SECRET: z.string().min(16).optional(),
  FHIR_CLIENT_ID: z.string().min(1),
  FHIR_API_BASE: trimmedUrl,
  FHIR_SCOPE: z.string().min(1).default(DEFAULT_FHIR_SCOPE),
  JHE_URL: trimmedUrl,
  JHE_PUBLIC_URL: z
    .string()
    .optional()
    .transform((v) => (v ? v : undefined))
    .pipe(trimmedUrl.optional()),
  JHE_CLIENT_ID: z.string().min(1),
  JHE_SCOPE: z.string().min(1).default('openid'),
  EXCHANGE_ISSUER_ALIASES: hostAliases,
  ALLOW_EMBEDDED_SESSION: booleanFlag,
  COOKIE_SECURE: booleanFlag,
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PENDING_TTL_SECONDS: z.coerce.number().int().positive().default(600),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(28_800),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface AppConfig {
  appHost: string;
  sessionSecret: string;
  /** true when SESSION_SECRET was not configured and a per-process secret was generated */
  sessionSecretGenerated: boolean;
  fhir: {
    clientId: string;
    apiBase: string;
    scope: string;
    redirectUri: string;
  };
  exchange: {
    url: string;
    publicUrl: string;
    clientId: string;
    scope: string;
    redirectUri: string;
    issuerAliases: ReadonlyMap<string, string>;
  };
  allowEmbeddedSession: boolean;
  cookieSecure: boolean;
  httpTimeoutMs: number;
  pendingTtlMs: number;
  sessionTtlMs: number;
  rateLimitMax: number;
  port: number;
  host: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    appHost: e.APP_HOST,
    sessionSecret: e.SESSION_SECRET ?? randomBytes(32).toString('hex'),
    sessionSecretGenerated: e.SESSION_SECRET === undefined,
    fhir: {
      clientId: e.FHIR_CLIENT_ID,
      apiBase: e.FHIR_API_BASE,
      scope: e.FHIR_SCOPE,
      redirectUri: `${e.APP_HOST}/callback`,
    },
    exchange: {
      url: e.JHE_URL,
      publicUrl: e.JHE_PUBLIC_URL ?? e.JHE_URL,
      clientId: e.JHE_CLIENT_ID,
      scope: e.JHE_SCOPE,
      redirectUri: `${e.APP_HOST}/jhe_callback`,
      issuerAliases: e.EXCHANGE_ISSUER_ALIASES,
    },
    allowEmbeddedSession: e.ALLOW_EMBEDDED_SESSION,
    cookieSecure: e.COOKIE_SECURE,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    pendingTtlMs: e.PENDING_TTL_SECONDS * 1000,
    sessionTtlMs: e.SESSION_TTL_SECONDS * 1000,
    rateLimitMax: e.RATE_LIMIT_MAX,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
  };
}
