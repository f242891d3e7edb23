/**
 * @spherebridge/shared - Shared types, schemas, and constants
 */

// Type exports
export type {
  // HereSphere
  HereSphereLibrary,
  HereSphereIndex,
  HereSphereTag,
  HereSphereMediaSource,
  HereSphereMedia,
  HereSphereSubtitle,
  HereSphereScanEntry,
  HereSphereScan,
  HereSphereVideo,
  HereSphereAuthResponse,
  // Gateway
  PlaybackEventKind,
  QuickConnectStatus,
  SessionIdentity,
  LoginStatus,
  ReadinessReport,
} from './types.js';

// Schema exports
export {
  itemIdSchema,
  itemIdParamSchema,
  eventParamsSchema,
  eventQuerySchema,
  heresphereTagSchema,
  heresphereRequestSchema,
  heresphereAuthSchema,
  heresphereEventSchema,
} from './schemas.js';

export type {
  HereSphereRequest,
  HereSphereAuthRequest,
  HereSphereEvent,
  ItemIdParam,
  EventParams,
  EventQuery,
} from './schemas.js';

// Constant exports
export {
  HERESPHERE_JSON_HEADER,
  HERESPHERE_JSON_VERSION,
  HERESPHERE_AUTH_HEADER,
  HERESPHERE_ACCESS,
  TICKS_PER_MS,
  HERESPHERE_EVENTS,
  WATCHED_THRESHOLD,
  COOKIE_NAMES,
  LOCAL_PASSWORD_LENGTH,
  TAG_CATEGORIES,
} from './constants.js';

export type { TagCategory } from './constants.js';
