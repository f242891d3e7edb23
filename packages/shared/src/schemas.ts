/**
 * Zod validation schemas for inbound HereSphere requests
 */

import { z } from 'zod';
import { HERESPHERE_EVENTS } from './constants.js';

// ============================================================================
// Common
// ============================================================================

/** Jellyfin item ids are 32 hex chars, with or without dashes */
export const itemIdSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9-]+$/, 'Invalid item id');

export const itemIdParamSchema = z.object({
  id: itemIdSchema,
});

export const eventParamsSchema = z.object({
  sid: z.string().min(1).max(64),
  id: itemIdSchema,
});

export const eventQuerySchema = z.object({
  runtime: z.coerce.number().int().nonnegative().optional(),
});

// ============================================================================
// HereSphere requests
// ============================================================================

export const heresphereTagSchema = z.object({
  name: z.string(),
  start: z.number().optional(),
  end: z.number().optional(),
  track: z.number().int().optional(),
  rating: z.number().optional(),
});

/**
 * Body HereSphere POSTs to every library endpoint. Credentials are absent when
 * the client authenticates with the auth-token header instead.
 */
export const heresphereRequestSchema = z
  .object({
    username: z.string().max(256).optional(),
    password: z.string().max(256).optional(),
    isFavorite: z.boolean().optional(),
    rating: z.number().optional(),
    tags: z.array(heresphereTagSchema).optional(),
    hsp: z.string().optional(),
    deleteFile: z.boolean().optional(),
    needsMediaSource: z.boolean().optional(),
  })
  .passthrough();

export const heresphereAuthSchema = z.object({
  username: z.string().min(1).max(256),
  password: z.string().min(1).max(256),
});

export const heresphereEventSchema = z.object({
  username: z.string().optional(),
  id: z.string().optional(),
  title: z.string().optional(),
  event: z.nativeEnum(HERESPHERE_EVENTS),
  /** Playback position in milliseconds */
  time: z.number().nonnegative(),
  speed: z.number().positive().default(1),
  /** Client UTC clock in milliseconds */
  utc: z.number().nonnegative(),
  connectionKey: z.string().optional(),
});

// Type exports
export type HereSphereRequest = z.infer<typeof heresphereRequestSchema>;
export type HereSphereAuthRequest = z.infer<typeof heresphereAuthSchema>;
export type HereSphereEvent = z.infer<typeof heresphereEventSchema>;
export type ItemIdParam = z.infer<typeof itemIdParamSchema>;
export type EventParams = z.infer<typeof eventParamsSchema>;
export type EventQuery = z.infer<typeof eventQuerySchema>;
