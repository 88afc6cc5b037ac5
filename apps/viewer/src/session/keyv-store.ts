/**
 * Keyv-backed session storage for deployments with more than one replica.
 * Records live under a key prefix and expire through the backend's own TTL,
 * refreshed on every write.
 */

import type { Keyv } from 'keyv';
import type { SessionStore } from './store.js';
import type { Session } from './types.js';

const KEY_PREFIX = 'session:';

export class KeyvSessionStore implements SessionStore {
  constructor(
    private readonly keyv: Keyv,
    private readonly ttlMs: number,
  ) {}

  async get(key: string): Promise<Session | undefined> {
    return this.keyv.get<Session>(`${KEY_PREFIX}${key}`);
  }

  async set(key: string, session: Session): Promise<void> {
    await this.keyv.set(`${KEY_PREFIX}${key}`, session, this.ttlMs);
  }

  async delete(key: string): Promise<void> {
    await this.keyv.delete(`${KEY_PREFIX}${key}`);
  }

  // The backend expires idle records by TTL; nothing to scan.
  async sweep(): Promise<number> {
    return 0;
  }
}
