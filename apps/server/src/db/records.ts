/**
 * Record types persisted in the store.
 *
 * Each RecordType pairs a kind with the Zod schema every read is validated
 * against. Timestamps are epoch milliseconds.
 */

import { z } from 'zod';
import type { RecordKind } from './schema.js';

export interface RecordType<T> {
  kind: RecordKind;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

const playbackEventKindSchema = z.enum(['start', 'progress', 'stop', 'watched']);

// ============================================================================
// Session
// ============================================================================

export const sessionRecordSchema = z.object({
  id: z.string().min(1),
  jellyfinUserId: z.string().min(1),
  accessToken: z.string().min(1),
  username: z.string().min(1),
  passwordHash: z.string().min(1),
  createdAt: z.number(),
  lastUsedAt: z.number(),
  /** Set once Jellyfin rejected the token; the session never becomes live again */
  invalidatedAt: z.number().optional(),
});

export type SessionRecord = z.infer<typeof sessionRecordSchema>;

export const SessionRecordType: RecordType<SessionRecord> = {
  kind: 'session',
  schema: sessionRecordSchema,
};

/** Unique index: local username -> live session */
export const usernameRecordSchema = z.object({
  sessionId: z.string().min(1),
});

export type UsernameRecord = z.infer<typeof usernameRecordSchema>;

export const UsernameRecordType: RecordType<UsernameRecord> = {
  kind: 'username',
  schema: usernameRecordSchema,
};

// ============================================================================
// QuickConnect
// ============================================================================

/**
 * Outcome of an approved QuickConnect request. Kept on the request until the
 * browser acknowledges the one-time password reveal, or at most one
 * QuickConnect window past `issuedAt`, then deleted with it.
 */
export const sessionGrantSchema = z.object({
  sessionId: z.string().min(1),
  userId: z.string().min(1),
  username: z.string().min(1),
  accessToken: z.string().min(1),
  password: z.string().min(1),
  passwordHash: z.string().min(1),
  issuedAt: z.number(),
});

export type SessionGrant = z.infer<typeof sessionGrantSchema>;

export const quickConnectRecordSchema = z.object({
  secret: z.string().min(1),
  code: z.string().min(1),
  status: z.enum(['pending', 'authorized', 'expired']),
  createdAt: z.number(),
  expiresAt: z.number(),
  supersededBy: z.string().optional(),
  grant: sessionGrantSchema.optional(),
});

export type QuickConnectRecord = z.infer<typeof quickConnectRecordSchema>;

export const QuickConnectRecordType: RecordType<QuickConnectRecord> = {
  kind: 'quickconnect',
  schema: quickConnectRecordSchema,
};

// ============================================================================
// Playback
// ============================================================================

export const playbackRecordSchema = z.object({
  sessionId: z.string().min(1),
  itemId: z.string().min(1),
  positionTicks: z.number().int().nonnegative(),
  watched: z.boolean(),
  isPaused: z.boolean(),
  speed: z.number().positive(),
  lastEvent: playbackEventKindSchema,
  lastReportedAt: z.number(),
  playSessionId: z.string().optional(),
  mediaSourceId: z.string().optional(),
  runtimeTicks: z.number().int().nonnegative().optional(),
});

export type PlaybackRecord = z.infer<typeof playbackRecordSchema>;

export const PlaybackRecordType: RecordType<PlaybackRecord> = {
  kind: 'playback',
  schema: playbackRecordSchema,
};

export function playbackKey(sessionId: string, itemId: string): string {
  return `${sessionId}:${itemId}`;
}

// ============================================================================
// Meta
// ============================================================================

export const metaRecordSchema = z.object({
  value: z.string(),
});

export type MetaRecord = z.infer<typeof metaRecordSchema>;

export const MetaRecordType: RecordType<MetaRecord> = {
  kind: 'meta',
  schema: metaRecordSchema,
};
