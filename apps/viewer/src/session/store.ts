/**
 * Session storage backends.
 *
 * The memory store is process-local and only suitable for a single
 * instance; run several replicas against a KeyvSessionStore instead.
 */

import type { Session } from './types.js';

export interface SessionStore {
  get(key: string): Promise<Session | undefined>;
  set(key: string, session: Session): Promise<void>;
  delete(key: string): Promise<void>;
  /**
   * Drop sessions idle since before `idleBefore` (epoch ms).
   * @returns number of sessions removed
   */
  sweep(idleBefore: number): Promise<number>;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();

  async get(key: string): Promise<Session | undefined> {
    return this.sessions.get(key);
  }

  async set(key: string, session: Session): Promise<void> {
    this.sessions.set(key, session);
  }

  async delete(key: string): Promise<void> {
    this.sessions.delete(key);
  }

  async sweep(idleBefore: number): Promise<number> {
    let removed = 0;
    for (const [key, session] of this.sessions) {
      if (session.lastSeenAt < idleBefore) {
        this.sessions.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
