/**
 * Auth & Session Manager
 *
 * Drives the QuickConnect device-authorization flow and turns its result into
 * a local username/password pair the VR client can type in.
 *
 * State per browser interaction:
 *
 *   NoSession -> QuickConnectPending -> QuickConnectApproved -> SessionActive
 *                        |
 *                        +-> QuickConnectExpired (terminal, restart)
 *
 * All state lives in the store. pollLogin is idempotent and can be called
 * from any connection, so a browser that drops and reconnects resumes where
 * it left off. An approved request carries the plaintext password only until
 * the browser acknowledges it or one QuickConnect window has passed.
 */

import type { LoginStatus } from '@spherebridge/shared';
import type { KeyValueStore, Versioned } from '../db/store.js';
import {
  QuickConnectRecordType,
  SessionRecordType,
  UsernameRecordType,
  type QuickConnectRecord,
  type SessionGrant,
  type SessionRecord,
} from '../db/records.js';
import type { JellyfinCredentials, JellyfinUpstream } from './mediaServer/types.js';
import { ConflictError, describeError } from '../utils/errors.js';
import { generateId, generateLocalPassword, hashPassword, verifyPassword } from '../utils/crypto.js';
import { signSessionToken, verifySessionToken } from '../utils/jwt.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import { createLogger, type Logger } from '../utils/logger.js';

/** Jellyfin's own QuickConnect requests live for ten minutes */
export const DEFAULT_QUICK_CONNECT_TTL_MS = 10 * 60 * 1000;

/** lastUsedAt is refreshed at most this often per session */
const TOUCH_INTERVAL_MS = 60 * 1000;

/** Bound on compare-and-swap retries for index updates */
const MAX_CAS_ATTEMPTS = 5;

export interface AuthServiceOptions {
  store: KeyValueStore;
  jellyfin: JellyfinUpstream;
  /** Signs HereSphere auth tokens */
  tokenSecret: string;
  quickConnectTtlMs?: number;
  /** Retry policy for QuickConnect polls (deadline is always the request expiry) */
  retry?: Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'maxDelayMs' | 'sleep'>;
  now?: () => number;
  logger?: Logger;
}

export function sessionCredentials(session: SessionRecord): JellyfinCredentials {
  return { userId: session.jellyfinUserId, accessToken: session.accessToken };
}

export class AuthSessionManager {
  private readonly store: KeyValueStore;
  private readonly jellyfin: JellyfinUpstream;
  private readonly tokenSecret: string;
  private readonly ttlMs: number;
  private readonly retry: AuthServiceOptions['retry'];
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: AuthServiceOptions) {
    this.store = options.store;
    this.jellyfin = options.jellyfin;
    this.tokenSecret = options.tokenSecret;
    this.ttlMs = options.quickConnectTtlMs ?? DEFAULT_QUICK_CONNECT_TTL_MS;
    this.retry = options.retry;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger('auth');
  }

  // ==========================================================================
  // QuickConnect Flow
  // ==========================================================================

  /**
   * Start a QuickConnect request and persist it as pending.
   *
   * @param previousSecret - The browser's earlier request, if any. A pending
   *   one is marked expired and superseded; it is kept, not deleted.
   */
  async startLogin(previousSecret?: string): Promise<QuickConnectRecord> {
    const { secret, code } = await this.jellyfin.quickConnectInitiate();
    const createdAt = this.now();

    const record: QuickConnectRecord = {
      secret,
      code,
      status: 'pending',
      createdAt,
      expiresAt: createdAt + this.ttlMs,
    };
    await this.store.compareAndSwap(QuickConnectRecordType, secret, null, record);
    this.log.info('QuickConnect started', { code });

    if (previousSecret && previousSecret !== secret) {
      await this.supersede(previousSecret, secret);
    }

    return record;
  }

  /**
   * Advance a QuickConnect request.
   *
   * Concurrent pollers of one secret race on a compare-and-swap of the request
   * record; the loser reads the winner's grant, so every caller sees the same
   * session identity and exactly one session is created.
   */
  async pollLogin(secret: string): Promise<LoginStatus> {
    const current = await this.store.get(QuickConnectRecordType, secret);
    if (!current) return { status: 'unknown' };
    if (current.value.status !== 'pending') return this.fromRecord(current);

    const { expiresAt } = current.value;
    if (this.now() >= expiresAt) return this.expire(secret, current);

    let result;
    try {
      result = await withRetry(() => this.jellyfin.quickConnectPoll(secret), {
        ...this.retry,
        deadline: expiresAt,
        now: this.now,
        onRetry: (error, attempt) =>
          this.log.warn('QuickConnect poll failed, retrying', { attempt, error: describeError(error) }),
      });
    } catch (error) {
      // Another poller may have finished the flow while this one failed
      const latest = await this.store.get(QuickConnectRecordType, secret);
      if (latest && latest.value.status !== 'pending') return this.fromRecord(latest);
      throw error;
    }

    if (result.status === 'pending') {
      return { status: 'pending', code: current.value.code, expiresAt };
    }
    if (result.status === 'expired') {
      this.log.info('QuickConnect rejected by Jellyfin', { code: current.value.code });
      return this.expire(secret, current);
    }

    // An approval that arrives after the window closed is never honoured
    if (this.now() >= expiresAt) return this.expire(secret, current);

    const grant = await this.createGrant(result.userId, result.username, result.accessToken);

    let authorized: Versioned<QuickConnectRecord>;
    try {
      authorized = await this.store.compareAndSwap(QuickConnectRecordType, secret, current.version, {
        ...current.value,
        status: 'authorized',
        grant,
      });
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
      const latest = await this.store.get(QuickConnectRecordType, secret);
      return latest ? this.fromRecord(latest) : { status: 'unknown' };
    }

    this.log.info('QuickConnect authorized', { username: grant.username, sessionId: grant.sessionId });
    try {
      await this.jellyfin.reportCapabilities(grant.accessToken);
    } catch (error) {
      this.log.warn('Failed to report client capabilities', { error: describeError(error) });
    }

    return this.fromRecord(authorized);
  }

  /**
   * The browser has shown the one-time password: discard the request and
   * the plaintext it carried. The session already exists, since pollLogin
   * materializes it before revealing the password.
   */
  async acknowledgeLogin(secret: string): Promise<void> {
    const current = await this.store.get(QuickConnectRecordType, secret);
    if (!current || current.value.status !== 'authorized') return;

    await this.store.delete(QuickConnectRecordType, secret);
    this.log.debug('QuickConnect acknowledged', { code: current.value.code });
  }

  /**
   * Remove requests no browser can still hold a cookie for: pending and
   * expired ones past their expiry, and approved ones whose reveal window
   * has passed. The login cookie never outlives the request window.
   *
   * @returns Number of requests removed
   */
  async sweepLoginRequests(): Promise<number> {
    const entries = await this.store.list(QuickConnectRecordType);
    const now = this.now();
    let removed = 0;

    for (const entry of entries) {
      const record = entry.value;
      if (record.status === 'authorized') {
        if (record.grant && !this.revealWindowPassed(record.grant)) continue;
        await this.discardGrant(record);
      } else {
        if (now < record.expiresAt) continue;
        await this.store.delete(QuickConnectRecordType, entry.id);
      }
      removed++;
    }

    if (removed > 0) this.log.info('Swept QuickConnect requests', { removed });
    return removed;
  }

  // ==========================================================================
  // Local Credentials
  // ==========================================================================

  /**
   * Resolve a username/password pair to a live session
   */
  async authenticateLocal(username: string, password: string): Promise<SessionRecord | null> {
    const session = await this.findByUsername(username);
    if (!session) return null;

    const valid = await verifyPassword(password, session.value.passwordHash);
    if (!valid) {
      this.log.debug('Rejected local credentials', { username });
      return null;
    }

    return this.touch(session);
  }

  /**
   * Load a live session. A session stops being live when the same Jellyfin
   * account logs in again or its token is invalidated.
   */
  async getSession(sessionId: string): Promise<SessionRecord | null> {
    const session = await this.loadLiveSession(sessionId);
    return session?.value ?? null;
  }

  issueAuthToken(session: SessionRecord): string {
    return signSessionToken(session.id, this.tokenSecret);
  }

  async resolveAuthToken(token: string): Promise<SessionRecord | null> {
    const verified = verifySessionToken(token, this.tokenSecret);
    if (!verified.valid) {
      this.log.debug('Rejected auth token', { error: verified.error });
      return null;
    }
    const session = await this.loadLiveSession(verified.sessionId);
    return session ? this.touch(session) : null;
  }

  /**
   * Retire a session whose Jellyfin token was rejected. The record stays,
   * marked invalidated, so no later step can bind it again; its credential
   * stops resolving.
   */
  async invalidateSession(sessionId: string): Promise<void> {
    const session = await this.markInvalidated(sessionId);
    if (!session) return;

    const index = await this.store.get(UsernameRecordType, session.username);
    if (index?.value.sessionId === sessionId) {
      await this.store.delete(UsernameRecordType, session.username);
    }
    this.log.warn('Session invalidated', { sessionId, username: session.username });
  }

  /** Number of live sessions */
  async countSessions(): Promise<number> {
    const entries = await this.store.list(UsernameRecordType);
    return entries.length;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async createGrant(userId: string, username: string, accessToken: string): Promise<SessionGrant> {
    const password = generateLocalPassword();
    return {
      sessionId: generateId(),
      userId,
      username,
      accessToken,
      password,
      passwordHash: await hashPassword(password),
      issuedAt: this.now(),
    };
  }

  /**
   * Map a stored request to the status callers see. Authorized requests are
   * materialized first, so a returned identity always names a stored session.
   */
  private async fromRecord(entry: Versioned<QuickConnectRecord>): Promise<LoginStatus> {
    const record = entry.value;
    switch (record.status) {
      case 'pending':
        return { status: 'pending', code: record.code, expiresAt: record.expiresAt };
      case 'expired':
        return { status: 'expired' };
      case 'authorized': {
        if (!record.grant) return { status: 'unknown' };
        if (this.revealWindowPassed(record.grant)) {
          await this.discardGrant(record);
          return { status: 'expired' };
        }
        const session = await this.materializeSession(record.grant);
        if (session.invalidatedAt !== undefined) return { status: 'expired' };
        return {
          status: 'authorized',
          identity: {
            sessionId: record.grant.sessionId,
            username: record.grant.username,
            password: record.grant.password,
          },
        };
      }
    }
  }

  private async expire(secret: string, entry: Versioned<QuickConnectRecord>): Promise<LoginStatus> {
    try {
      await this.store.compareAndSwap(QuickConnectRecordType, secret, entry.version, {
        ...entry.value,
        status: 'expired',
      });
      this.log.info('QuickConnect expired', { code: entry.value.code });
      return { status: 'expired' };
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
      const latest = await this.store.get(QuickConnectRecordType, secret);
      return latest ? this.fromRecord(latest) : { status: 'unknown' };
    }
  }

  private async supersede(secret: string, supersededBy: string): Promise<void> {
    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
      const entry = await this.store.get(QuickConnectRecordType, secret);
      if (!entry || entry.value.status !== 'pending') return;
      try {
        await this.store.compareAndSwap(QuickConnectRecordType, secret, entry.version, {
          ...entry.value,
          status: 'expired',
          supersededBy,
        });
        return;
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;
      }
    }
    this.log.warn('Could not supersede QuickConnect request', { code: supersededBy });
  }

  private revealWindowPassed(grant: SessionGrant): boolean {
    return this.now() >= grant.issuedAt + this.ttlMs;
  }

  /** Finish the grant's session, then delete the request with its plaintext */
  private async discardGrant(record: QuickConnectRecord): Promise<void> {
    if (record.grant) await this.materializeSession(record.grant);
    await this.store.delete(QuickConnectRecordType, record.secret);
    this.log.info('QuickConnect grant discarded', { code: record.code });
  }

  /**
   * Idempotently create the session described by a grant and point the
   * username index at it. An invalidated session is returned as is and never
   * bound again.
   */
  private async materializeSession(grant: SessionGrant): Promise<SessionRecord> {
    const existing = await this.store.get(SessionRecordType, grant.sessionId);
    let session = existing?.value;
    if (!session) {
      const created: SessionRecord = {
        id: grant.sessionId,
        jellyfinUserId: grant.userId,
        accessToken: grant.accessToken,
        username: grant.username,
        passwordHash: grant.passwordHash,
        createdAt: grant.issuedAt,
        lastUsedAt: grant.issuedAt,
      };
      try {
        await this.store.compareAndSwap(SessionRecordType, grant.sessionId, null, created);
        this.log.info('Session created', { sessionId: grant.sessionId, username: grant.username });
        session = created;
      } catch (error) {
        // A concurrent poller materialized the same grant
        if (!(error instanceof ConflictError)) throw error;
        const latest = await this.store.get(SessionRecordType, grant.sessionId);
        if (!latest) throw error;
        session = latest.value;
      }
    }

    if (session.invalidatedAt === undefined) {
      await this.bindUsername(grant);
    }
    return session;
  }

  private async markInvalidated(sessionId: string): Promise<SessionRecord | null> {
    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
      const entry = await this.store.get(SessionRecordType, sessionId);
      if (!entry) return null;
      if (entry.value.invalidatedAt !== undefined) return entry.value;

      const updated: SessionRecord = { ...entry.value, invalidatedAt: this.now() };
      try {
        await this.store.compareAndSwap(SessionRecordType, sessionId, entry.version, updated);
        return updated;
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;
      }
    }
    throw new ConflictError(`session:${sessionId}`, null, null);
  }

  /**
   * Point the username index at the grant's session unless a newer session
   * already holds it.
   */
  private async bindUsername(grant: SessionGrant): Promise<void> {
    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
      const index = await this.store.get(UsernameRecordType, grant.username);
      if (index?.value.sessionId === grant.sessionId) return;

      if (index) {
        const holder = await this.store.get(SessionRecordType, index.value.sessionId);
        if (holder && holder.value.createdAt > grant.issuedAt) return;
      }

      try {
        await this.store.compareAndSwap(UsernameRecordType, grant.username, index?.version ?? null, {
          sessionId: grant.sessionId,
        });
        if (index) {
          this.log.info('Session replaced by a newer login', {
            username: grant.username,
            previousSessionId: index.value.sessionId,
          });
        }
        return;
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;
      }
    }
    throw new ConflictError(`username:${grant.username}`, null, null);
  }

  private async findByUsername(username: string): Promise<Versioned<SessionRecord> | null> {
    const index = await this.store.get(UsernameRecordType, username);
    if (!index) return null;
    const session = await this.store.get(SessionRecordType, index.value.sessionId);
    return session && session.value.invalidatedAt === undefined ? session : null;
  }

  private async loadLiveSession(sessionId: string): Promise<Versioned<SessionRecord> | null> {
    const session = await this.store.get(SessionRecordType, sessionId);
    if (!session || session.value.invalidatedAt !== undefined) return null;
    const index = await this.store.get(UsernameRecordType, session.value.username);
    return index?.value.sessionId === sessionId ? session : null;
  }

  private async touch(entry: Versioned<SessionRecord>): Promise<SessionRecord> {
    const now = this.now();
    if (now - entry.value.lastUsedAt < TOUCH_INTERVAL_MS) return entry.value;

    const updated: SessionRecord = { ...entry.value, lastUsedAt: now };
    try {
      await this.store.compareAndSwap(SessionRecordType, updated.id, entry.version, updated);
    } catch (error) {
      // Another request refreshed it first
      if (!(error instanceof ConflictError)) throw error;
    }
    return updated;
  }
}
