/**
 * Provider-facing types for the SMART launch and the exchange service.
 */

import { z } from 'zod';

export const discoveryDocumentSchema = z
  .object({
    issuer: z.string().optional(),
    authorization_endpoint: z.string().url(),
    token_endpoint: z.string().url(),
  })
  .passthrough();

/**
 * OpenID / SMART configuration document. Only the two endpoints are read;
 * the remaining fields are kept as published.
 */
export type DiscoveryDocument = z.infer<typeof discoveryDocumentSchema>;

// Providers disagree on the optional fields; a malformed one reads as absent.
export const optionalString = z.string().optional().catch(undefined);
export const optionalNumber = z.coerce.number().optional().catch(undefined);

export const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: optionalString,
    expires_in: optionalNumber,
    scope: optionalString,
    id_token: optionalString,
    patient: optionalString,
    encounter: optionalString,
    profile: optionalString,
  })
  .passthrough();

/**
 * Token endpoint response: the bearer token plus whatever launch context the
 * provider attached (patient, encounter, id_token, ...).
 */
export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}

export type ProviderKind = 'fhir' | 'exchange';

export interface PendingAuthorization {
  state: string;
  codeVerifier: string;
  /** epoch ms */
  createdAt: number;
}

export interface AuthorizationRequest {
  issuer: string;
  clientId: string;
  redirectUri: string;
  scope: string;
  /** merged last, may override the defaults (SMART `launch` and `aud`) */
  extraParams?: Record<string, string>;
}

export interface AuthorizationRedirect {
  url: string;
  state: string;
  codeVerifier: string;
  codeChallenge: string;
}

export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
}

export interface ExchangedToken {
  accessToken: string;
  tokenType?: string;
  expiresIn?: number;
  scope?: string;
  issuedTokenType?: string;
}
