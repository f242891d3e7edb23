/**
 * Drizzle ORM schema definitions for SphereBridge
 *
 * The gateway persists a handful of record kinds (sessions, QuickConnect
 * requests, playback state) in a single keyed table. Each row carries a
 * version that compare-and-swap writes check.
 */

import { sqliteTable, text, integer, primaryKey, index } from 'drizzle-orm/sqlite-core';

// Record kinds stored in the table
export const recordKindEnum = ['session', 'quickconnect', 'playback', 'username', 'meta'] as const;
export type RecordKind = (typeof recordKindEnum)[number];

export const records = sqliteTable(
  'records',
  {
    kind: text('kind', { enum: recordKindEnum }).notNull(),
    key: text('key').notNull(),
    // JSON document, validated on every read
    value: text('value').notNull(),
    version: integer('version').notNull(),
    updatedAt: integer('updated_at', { mode: 'number' }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.kind, table.key] }),
    updatedIdx: index('records_kind_updated_idx').on(table.kind, table.updatedAt),
  })
);

export type RecordRow = typeof records.$inferSelect;

/**
 * DDL applied at startup. Kept in sync with the table definition above.
 */
export const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS records (
    kind TEXT NOT NULL,
    key TEXT NOT NULL,
    value TEXT NOT NULL,
    version INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    PRIMARY KEY (kind, key)
  );
  CREATE INDEX IF NOT EXISTS records_kind_updated_idx ON records (kind, updated_at);
`;
