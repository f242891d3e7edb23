/**
 * Persistent key-value store
 *
 * Records are addressed by (kind, id) and carry a version. Every operation is a
 * single SQLite statement, so each is atomic per key; read-modify-write callers
 * use compareAndSwap with the version they read.
 *
 * Driver failures and records that fail validation surface as
 * StoreUnavailableError. There is no in-memory fallback.
 */

import { and, eq, sql } from 'drizzle-orm';
import type { GatewayDatabase } from './client.js';
import { records, type RecordRow } from './schema.js';
import type { RecordType } from './records.js';
import { AppError, ConflictError, StoreUnavailableError } from '../utils/errors.js';

export interface Versioned<T> {
  value: T;
  version: number;
  updatedAt: number;
}

export interface StoredEntry<T> extends Versioned<T> {
  id: string;
}

export interface KeyValueStore {
  get<T>(type: RecordType<T>, id: string): Promise<Versioned<T> | null>;
  /** Unconditional upsert */
  put<T>(type: RecordType<T>, id: string, value: T): Promise<Versioned<T>>;
  delete<T>(type: RecordType<T>, id: string): Promise<boolean>;
  /**
   * Write only if the stored version equals `expectedVersion`
   * (`null` = the record must not exist).
   *
   * @throws ConflictError when the expectation does not hold
   */
  compareAndSwap<T>(
    type: RecordType<T>,
    id: string,
    expectedVersion: number | null,
    value: T
  ): Promise<Versioned<T>>;
  /** Read-only scan of one kind */
  list<T>(type: RecordType<T>): Promise<StoredEntry<T>[]>;
  ping(): Promise<boolean>;
}

export interface SqliteStoreOptions {
  now?: () => number;
}

export class SqliteStore implements KeyValueStore {
  private readonly now: () => number;

  constructor(
    private readonly db: GatewayDatabase,
    options: SqliteStoreOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  async get<T>(type: RecordType<T>, id: string): Promise<Versioned<T> | null> {
    const row = this.run('get', type, id, () =>
      this.db
        .select()
        .from(records)
        .where(and(eq(records.kind, type.kind), eq(records.key, id)))
        .get()
    );
    return row ? this.decode(type, row) : null;
  }

  async put<T>(type: RecordType<T>, id: string, value: T): Promise<Versioned<T>> {
    const json = this.encode(type, id, value);
    const updatedAt = this.now();

    const row = this.run('put', type, id, () =>
      this.db
        .insert(records)
        .values({ kind: type.kind, key: id, value: json, version: 1, updatedAt })
        .onConflictDoUpdate({
          target: [records.kind, records.key],
          set: { value: json, version: sql`${records.version} + 1`, updatedAt },
        })
        .returning({ version: records.version })
        .get()
    );
    if (!row) {
      throw new StoreUnavailableError(`Store put returned no row for ${type.kind}:${id}`);
    }

    return { value, version: row.version, updatedAt };
  }

  async delete<T>(type: RecordType<T>, id: string): Promise<boolean> {
    const result = this.run('delete', type, id, () =>
      this.db
        .delete(records)
        .where(and(eq(records.kind, type.kind), eq(records.key, id)))
        .run()
    );
    return result.changes > 0;
  }

  async compareAndSwap<T>(
    type: RecordType<T>,
    id: string,
    expectedVersion: number | null,
    value: T
  ): Promise<Versioned<T>> {
    const json = this.encode(type, id, value);
    const updatedAt = this.now();
    const version = expectedVersion === null ? 1 : expectedVersion + 1;

    const result = this.run('compareAndSwap', type, id, () =>
      expectedVersion === null
        ? this.db
            .insert(records)
            .values({ kind: type.kind, key: id, value: json, version, updatedAt })
            .onConflictDoNothing()
            .run()
        : this.db
            .update(records)
            .set({ value: json, version, updatedAt })
            .where(
              and(
                eq(records.kind, type.kind),
                eq(records.key, id),
                eq(records.version, expectedVersion)
              )
            )
            .run()
    );

    if (result.changes === 0) {
      const current = this.run('compareAndSwap', type, id, () =>
        this.db
          .select({ version: records.version })
          .from(records)
          .where(and(eq(records.kind, type.kind), eq(records.key, id)))
          .get()
      );
      throw new ConflictError(`${type.kind}:${id}`, expectedVersion, current?.version ?? null);
    }

    return { value, version, updatedAt };
  }

  async list<T>(type: RecordType<T>): Promise<StoredEntry<T>[]> {
    const rows = this.run('list', type, '*', () =>
      this.db.select().from(records).where(eq(records.kind, type.kind)).all()
    );
    return rows.map((row) => ({ id: row.key, ...this.decode(type, row) }));
  }

  async ping(): Promise<boolean> {
    try {
      this.db.get(sql`SELECT 1`);
      return true;
    } catch {
      return false;
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private run<R, T>(operation: string, type: RecordType<T>, id: string, fn: () => R): R {
    try {
      return fn();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new StoreUnavailableError(`Store ${operation} failed for ${type.kind}:${id}`, {
        cause: error,
      });
    }
  }

  private encode<T>(type: RecordType<T>, id: string, value: T): string {
    const checked = type.schema.safeParse(value);
    if (!checked.success) {
      throw new StoreUnavailableError(`Refusing to write invalid ${type.kind} record ${id}`, {
        cause: checked.error,
      });
    }
    return JSON.stringify(checked.data);
  }

  private decode<T>(type: RecordType<T>, row: RecordRow): Versioned<T> {
    let raw: unknown;
    try {
      raw = JSON.parse(row.value);
    } catch (error) {
      throw new StoreUnavailableError(`Corrupt ${type.kind} record ${row.key}`, { cause: error });
    }

    const parsed = type.schema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreUnavailableError(`Corrupt ${type.kind} record ${row.key}`, {
        cause: parsed.error,
      });
    }

    return { value: parsed.data, version: row.version, updatedAt: row.updatedAt };
  }
}
