/**
 * SqliteStore tests
 *
 * Runs against an in-memory SQLite database:
 * - get/put/delete round trips and version bumps
 * - compareAndSwap create and update semantics
 * - corrupt rows surface as StoreUnavailableError
 * - writes survive closing and reopening a database file
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { sql } from 'drizzle-orm';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { openDatabase } from '../client.js';
import { SqliteStore } from '../store.js';
import { MetaRecordType, SessionRecordType, UsernameRecordType, type SessionRecord } from '../records.js';
import { ConflictError, StoreUnavailableError } from '../../utils/errors.js';
import { createClock, createTestStore, type TestClock, type TestStore } from '../../test/fakes.js';

function session(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id: 'sess-1',
    jellyfinUserId: 'user-1',
    accessToken: 'token-1',
    username: 'alice',
    passwordHash: 'hash-placeholder',
    createdAt: 1000,
    lastUsedAt: 1000,
    ...overrides,
  };
}

describe('SqliteStore', () => {
  let clock: TestClock;
  let ctx: TestStore;

  beforeEach(() => {
    clock = createClock(5000);
    ctx = createTestStore(clock.now);
  });

  afterEach(() => {
    ctx.handle.close();
  });

  describe('get/put/delete', () => {
    it('returns null for a missing record', async () => {
      expect(await ctx.store.get(SessionRecordType, 'missing')).toBeNull();
    });

    it('puts and reads back a record at version 1', async () => {
      const written = await ctx.store.put(SessionRecordType, 'sess-1', session());

      expect(written).toEqual({ value: session(), version: 1, updatedAt: 5000 });
      expect(await ctx.store.get(SessionRecordType, 'sess-1')).toEqual(written);
    });

    it('bumps the version on overwrite', async () => {
      await ctx.store.put(SessionRecordType, 'sess-1', session());
      clock.advance(10);
      const second = await ctx.store.put(SessionRecordType, 'sess-1', session({ lastUsedAt: 2000 }));

      expect(second.version).toBe(2);
      expect(second.updatedAt).toBe(5010);
      const read = await ctx.store.get(SessionRecordType, 'sess-1');
      expect(read?.value.lastUsedAt).toBe(2000);
    });

    it('keeps kinds apart under the same key', async () => {
      await ctx.store.put(UsernameRecordType, 'alice', { sessionId: 'sess-1' });
      await ctx.store.put(MetaRecordType, 'alice', { value: 'other' });

      expect((await ctx.store.get(UsernameRecordType, 'alice'))?.value).toEqual({ sessionId: 'sess-1' });
      expect((await ctx.store.get(MetaRecordType, 'alice'))?.value).toEqual({ value: 'other' });
    });

    it('reports whether delete removed anything', async () => {
      await ctx.store.put(UsernameRecordType, 'alice', { sessionId: 'sess-1' });

      expect(await ctx.store.delete(UsernameRecordType, 'alice')).toBe(true);
      expect(await ctx.store.delete(UsernameRecordType, 'alice')).toBe(false);
      expect(await ctx.store.get(UsernameRecordType, 'alice')).toBeNull();
    });

    it('lists every record of one kind', async () => {
      await ctx.store.put(UsernameRecordType, 'alice', { sessionId: 'sess-1' });
      await ctx.store.put(UsernameRecordType, 'bob', { sessionId: 'sess-2' });
      await ctx.store.put(SessionRecordType, 'sess-1', session());

      const entries = await ctx.store.list(UsernameRecordType);
      expect(entries.map((entry) => entry.id).sort()).toEqual(['alice', 'bob']);
    });
  });

  describe('compareAndSwap', () => {
    it('creates a record when none is expected', async () => {
      const created = await ctx.store.compareAndSwap(UsernameRecordType, 'alice', null, { sessionId: 'sess-1' });
      expect(created.version).toBe(1);
    });

    it('rejects creation when the record exists', async () => {
      await ctx.store.put(UsernameRecordType, 'alice', { sessionId: 'sess-1' });

      const attempt = ctx.store.compareAndSwap(UsernameRecordType, 'alice', null, { sessionId: 'sess-2' });
      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      expect((await ctx.store.get(UsernameRecordType, 'alice'))?.value.sessionId).toBe('sess-1');
    });

    it('updates when the version matches', async () => {
      const first = await ctx.store.put(UsernameRecordType, 'alice', { sessionId: 'sess-1' });
      const second = await ctx.store.compareAndSwap(UsernameRecordType, 'alice', first.version, {
        sessionId: 'sess-2',
      });

      expect(second.version).toBe(2);
      expect((await ctx.store.get(UsernameRecordType, 'alice'))?.value.sessionId).toBe('sess-2');
    });

    it('reports the actual version on a stale write', async () => {
      await ctx.store.put(UsernameRecordType, 'alice', { sessionId: 'sess-1' });
      await ctx.store.put(UsernameRecordType, 'alice', { sessionId: 'sess-2' });

      const error = await ctx.store
        .compareAndSwap(UsernameRecordType, 'alice', 1, { sessionId: 'sess-3' })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({ expectedVersion: 1, actualVersion: 2, statusCode: 409 });
    });

    it('lets exactly one of two racing writers win', async () => {
      const base = await ctx.store.put(UsernameRecordType, 'alice', { sessionId: 'sess-0' });

      const results = await Promise.allSettled([
        ctx.store.compareAndSwap(UsernameRecordType, 'alice', base.version, { sessionId: 'sess-1' }),
        ctx.store.compareAndSwap(UsernameRecordType, 'alice', base.version, { sessionId: 'sess-2' }),
      ]);

      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
      expect(results.filter((result) => result.status === 'rejected')).toHaveLength(1);
    });
  });

  describe('validation', () => {
    it('raises StoreUnavailableError for a row that is not JSON', async () => {
      ctx.handle.db.run(
        sql`INSERT INTO records (kind, key, value, version, updated_at) VALUES ('username', 'alice', 'not json', 1, 0)`
      );

      await expect(ctx.store.get(UsernameRecordType, 'alice')).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it('raises StoreUnavailableError for a row with the wrong shape', async () => {
      ctx.handle.db.run(
        sql`INSERT INTO records (kind, key, value, version, updated_at) VALUES ('username', 'alice', '{"other":1}', 1, 0)`
      );

      await expect(ctx.store.get(UsernameRecordType, 'alice')).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it('refuses to write a value that fails its schema', async () => {
      await expect(ctx.store.put(UsernameRecordType, 'alice', { sessionId: '' })).rejects.toBeInstanceOf(
        StoreUnavailableError
      );
    });

    it('wraps driver failures once the database is closed', async () => {
      ctx.handle.close();

      await expect(ctx.store.get(UsernameRecordType, 'alice')).rejects.toBeInstanceOf(StoreUnavailableError);
      expect(await ctx.store.ping()).toBe(false);
      // Reopen so afterEach can close without throwing
      ctx = createTestStore(clock.now);
    });
  });

  describe('durability', () => {
    let dataDir: string;

    beforeEach(() => {
      dataDir = mkdtempSync(join(tmpdir(), 'spherebridge-store-'));
    });

    afterEach(() => {
      rmSync(dataDir, { recursive: true, force: true });
    });

    it('reads a record back at the same version after reopening', async () => {
      const first = openDatabase(dataDir);
      const written = await new SqliteStore(first.db, { now: clock.now }).put(SessionRecordType, 'sess-1', session());
      first.close();

      const reopened = openDatabase(dataDir);
      const read = await new SqliteStore(reopened.db).get(SessionRecordType, 'sess-1');
      reopened.close();

      expect(written.version).toBe(1);
      expect(read).toEqual({ value: session(), version: 1, updatedAt: 5000 });
    });

    it('continues versioning across a reopen', async () => {
      const first = openDatabase(dataDir);
      const store = new SqliteStore(first.db, { now: clock.now });
      await store.put(UsernameRecordType, 'alice', { sessionId: 'sess-1' });
      await store.put(UsernameRecordType, 'alice', { sessionId: 'sess-2' });
      first.close();

      const reopened = openDatabase(dataDir);
      const next = await new SqliteStore(reopened.db, { now: clock.now }).compareAndSwap(
        UsernameRecordType,
        'alice',
        2,
        { sessionId: 'sess-3' }
      );
      reopened.close();

      expect(next.version).toBe(3);
    });
  });
});
