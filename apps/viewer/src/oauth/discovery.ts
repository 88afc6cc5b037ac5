/**
 * OpenID / SMART discovery with a process-lifetime cache.
 */

import type { FastifyBaseLogger } from 'fastify';
import { DiscoveryError } from '../errors.js';
import { isSuccess, type OutboundHttp } from './http.js';
import { discoveryDocumentSchema, type DiscoveryDocument } from './types.js';

const WELL_KNOWN = '/.well-known/openid-configuration';

export function normalizeIssuer(issuer: string): string {
  return issuer.replace(/\/+$/, '');
}

/**
 * Candidate configuration URLs, in order: the issuer path itself, then the
 * issuer's origin with the path replaced.
 */
export function discoveryUrls(issuer: string): [string, string] {
  const normalized = normalizeIssuer(issuer);
  const root = new URL(normalized);
  root.pathname = WELL_KNOWN;
  root.search = '';
  root.hash = '';
  return [`${normalized}${WELL_KNOWN}`, root.toString()];
}

export class DiscoveryCache {
  private readonly documents = new Map<string, DiscoveryDocument>();
  private readonly inflight = new Map<string, Promise<DiscoveryDocument>>();

  constructor(
    private readonly http: OutboundHttp,
    private readonly logger: FastifyBaseLogger,
  ) {}

  get size(): number {
    return this.documents.size;
  }

  /**
   * Resolve the configuration for an issuer. Concurrent callers for the same
   * issuer share a single fetch; failures are not cached.
   */
  async resolve(issuer: string): Promise<DiscoveryDocument> {
    const key = normalizeIssuer(issuer);
    const cached = this.documents.get(key);
    if (cached) return cached;

    const pending = this.inflight.get(key);
    if (pending) return pending;

    const promise = this.fetchDocument(key);
    this.inflight.set(key, promise);
    try {
      const document = await promise;
      this.documents.set(key, document);
      return document;
    } finally {
      this.inflight.delete(key);
    }
  }

  private async fetchDocument(issuer: string): Promise<DiscoveryDocument> {
    let urls: [string, string];
    try {
      urls = discoveryUrls(issuer);
    } catch (error) {
      throw new DiscoveryError(issuer, error);
    }
    const [primary, fallback] = urls;

    try {
      return await this.fetchFrom(primary);
    } catch (firstError) {
      this.logger.debug({ issuer, url: primary, err: firstError }, 'Discovery failed, trying origin fallback');
      try {
        return await this.fetchFrom(fallback);
      } catch (secondError) {
        this.logger.warn({ issuer, url: fallback, err: secondError }, 'Discovery fallback failed');
        throw new DiscoveryError(issuer, firstError);
      }
    }
  }

  private async fetchFrom(url: string): Promise<DiscoveryDocument> {
    const res = await this.http.getJson(url);
    if (!isSuccess(res.statusCode)) {
      throw new Error(`GET ${url} returned ${res.statusCode}`);
    }
    const parsed = discoveryDocumentSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new Error(`GET ${url} returned an invalid configuration document`);
    }
    this.logger.info(
      { url, authz: parsed.data.authorization_endpoint, token: parsed.data.token_endpoint },
      'OpenID configuration discovered',
    );
    return parsed.data;
  }
}
