import { decodeJwt } from 'jose';
import type { TokenResponse } from './oauth/types.js';

export interface LaunchIdentity {
  patientId: string | null;
  /** e.g. "Practitioner/123" */
  practitionerReference: string | null;
}

/**
 * Read one claim from an id token WITHOUT verifying its signature.
 *
 * Only valid for a token this server received itself, in the response body
 * of a server-to-server call to the provider's token endpoint: the TLS
 * connection to that endpoint is what authenticates it. Never pass a token
 * that arrived from a browser, a query string or any other party.
 */
export function extractClaimFromDirectlyIssuedToken(idToken: string, claim: string): unknown {
  return decodeJwt(idToken)[claim];
}

/**
 * Patient comes from the SMART launch context; practitioner from `profile`
 * when the EHR provides it, otherwise from the id token's `fhirUser`.
 *
 * @throws when the id token cannot be decoded
 */
export function resolvePatientAndPractitioner(tokenResponse: TokenResponse): LaunchIdentity {
  const patientId = tokenResponse.patient ?? null;

  if (tokenResponse.profile) {
    return { patientId, practitionerReference: tokenResponse.profile };
  }
  if (!tokenResponse.id_token) {
    return { patientId, practitionerReference: null };
  }
  const fhirUser = extractClaimFromDirectlyIssuedToken(tokenResponse.id_token, 'fhirUser');
  return { patientId, practitionerReference: typeof fhirUser === 'string' ? fhirUser : null };
}
