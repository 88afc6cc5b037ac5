import type { FastifyBaseLogger } from 'fastify';
import { randomToken } from '@launch-bridge/shared';
import type { PendingAuthorization, ProviderKind } from '../oauth/types.js';
import type { SessionCookie } from './cookie.js';
import { isLocalIframe, storageKey, type EmbeddingHints, type SessionIdentity } from './identity.js';
import { KeyedMutex } from './keyed-mutex.js';
import type { SessionStore } from './store.js';
import type { Session } from './types.js';

// 16 bytes = 128 bits of entropy
const SESSION_ID_BYTES = 16;

/**
 * What the session layer needs from an HTTP exchange: the incoming cookie and
 * embedding hints, and a way to send a Set-Cookie header back.
 */
export interface SessionContext extends EmbeddingHints {
  cookieHeader?: string;
  setCookie(header: string): void;
}

export interface SessionManagerOptions {
  store: SessionStore;
  cookie: SessionCookie;
  logger: FastifyBaseLogger;
  allowEmbedded: boolean;
  pendingTtlMs: number;
  sessionTtlMs: number;
  now?: () => number;
}

export class SessionManager {
  private readonly mutex = new KeyedMutex();
  private readonly now: () => number;

  constructor(private readonly options: SessionManagerOptions) {
    this.now = options.now ?? Date.now;
  }

  resolveIdentity(ctx: SessionContext): SessionIdentity | null {
    if (this.isEmbedded(ctx)) return { kind: 'shared-embedded' };
    const id = this.options.cookie.read(ctx.cookieHeader);
    return id ? { kind: 'per-visitor', id } : null;
  }

  isEmbedded(ctx: EmbeddingHints): boolean {
    return this.options.allowEmbedded && isLocalIframe(ctx);
  }

  /**
   * Look up the caller's session.
   *
   * With `makeNew`, a fresh record always replaces whatever was stored
   * (a new launch invalidates a stale pending flow). Without it, a missing,
   * unsigned or idle-expired session reads as null: not authenticated.
   */
  async get(ctx: SessionContext, options: { makeNew: true }): Promise<Session>;
  async get(ctx: SessionContext, options?: { makeNew?: false }): Promise<Session | null>;
  async get(ctx: SessionContext, { makeNew = false }: { makeNew?: boolean } = {}): Promise<Session | null> {
    const identity = this.resolveIdentity(ctx);

    if (makeNew) {
      let key: string;
      if (identity?.kind === 'shared-embedded') {
        this.options.logger.info('Using localhost iframe session');
        key = storageKey(identity);
      } else {
        key = randomToken(SESSION_ID_BYTES);
        ctx.setCookie(this.options.cookie.serialize(key));
      }
      const now = this.now();
      const session: Session = { id: key, createdAt: now, lastSeenAt: now, pending: {} };
      await this.mutex.runExclusive(key, () => this.options.store.set(key, session));
      this.options.logger.info({ embedded: identity?.kind === 'shared-embedded' }, 'Made new session');
      return session;
    }

    if (!identity) return null;
    const key = storageKey(identity);
    return this.mutex.runExclusive(key, async () => {
      const session = await this.options.store.get(key);
      if (!session) return null;

      const now = this.now();
      if (session.lastSeenAt + this.options.sessionTtlMs < now) {
        await this.options.store.delete(key);
        return null;
      }
      session.lastSeenAt = now;
      await this.options.store.set(key, session);
      return session;
    });
  }

  /**
   * Write the session back. Pending authorizations are owned by
   * `beginAuthorization` and `consumePending`, so the stored slots win over
   * whatever this copy still holds.
   */
  async save(session: Session): Promise<void> {
    await this.mutex.runExclusive(session.id, async () => {
      const stored = await this.options.store.get(session.id);
      if (stored) session.pending = stored.pending;
      await this.options.store.set(session.id, session);
    });
  }

  /**
   * Bind a new pending authorization to the session, replacing any
   * outstanding one for the same provider. Must complete before the
   * redirect is sent.
   */
  async beginAuthorization(
    session: Session,
    provider: ProviderKind,
    pending: Omit<PendingAuthorization, 'createdAt'>,
  ): Promise<void> {
    await this.mutex.runExclusive(session.id, async () => {
      const stored = await this.options.store.get(session.id);
      session.pending = { ...(stored?.pending ?? session.pending), [provider]: { ...pending, createdAt: this.now() } };
      await this.options.store.set(session.id, session);
    });
  }

  /**
   * Take and clear the pending authorization for a provider. Racing callers
   * on the same session are serialized, so only the first one sees it.
   * An expired entry is cleared and reported as absent.
   */
  async consumePending(session: Session, provider: ProviderKind): Promise<PendingAuthorization | undefined> {
    return this.mutex.runExclusive(session.id, async () => {
      const current = (await this.options.store.get(session.id)) ?? session;
      const pending = current.pending[provider];
      delete current.pending[provider];
      delete session.pending[provider];
      await this.options.store.set(session.id, current);

      if (pending && pending.createdAt + this.options.pendingTtlMs < this.now()) {
        this.options.logger.info({ provider }, 'Pending authorization expired');
        return undefined;
      }
      return pending;
    });
  }

  /** Remove the session record and its cookie. Safe to call repeatedly. */
  async logout(ctx: SessionContext): Promise<void> {
    const identity = this.resolveIdentity(ctx);
    if (identity?.kind === 'per-visitor') {
      ctx.setCookie(this.options.cookie.clear());
    }
    if (!identity) return;
    const key = storageKey(identity);
    this.options.logger.info({ embedded: identity.kind === 'shared-embedded' }, 'Logging out');
    await this.options.store.delete(key);
  }

  async sweep(): Promise<number> {
    return this.options.store.sweep(this.now() - this.options.sessionTtlMs);
  }
}
