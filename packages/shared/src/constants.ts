/**
 * Shared constants for SphereBridge
 */

/** Response header HereSphere checks before parsing a JSON body */
export const HERESPHERE_JSON_HEADER = 'HereSphere-JSON-Version';
export const HERESPHERE_JSON_VERSION = '1';

/** Request header carrying the token issued by POST /heresphere/auth */
export const HERESPHERE_AUTH_HEADER = 'auth-token';

/** HereSphere `access` values */
export const HERESPHERE_ACCESS = {
  GRANTED: 1,
  DENIED: -1,
} as const;

/** Jellyfin ticks are 100ns units */
export const TICKS_PER_MS = 10_000;

/** HereSphere event codes (the `event` field of an event callback) */
export const HERESPHERE_EVENTS = {
  OPEN: 0,
  PLAY: 1,
  PAUSE: 2,
  CLOSE: 3,
} as const;

/** Fraction of the runtime after which a closed video counts as watched */
export const WATCHED_THRESHOLD = 0.9;

/** Browser cookies used by the login dashboard */
export const COOKIE_NAMES = {
  LOGIN: 'sb_login',
  SESSION: 'sb_session',
} as const;

/** Local password shape: six lowercase letters */
export const LOCAL_PASSWORD_LENGTH = 6;

/** Tag categories surfaced in the HereSphere tag browser */
export const TAG_CATEGORIES = [
  'Series',
  'Studio',
  'Genre',
  'Tag',
  'Type',
  'Year',
  'Season',
  'Movie',
  'Chapter',
] as const;

export type TagCategory = (typeof TAG_CATEGORIES)[number];
