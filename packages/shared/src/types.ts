/**
 * HereSphere wire types and the gateway's public status shapes
 */

// HereSphere library index (POST /heresphere)
export interface HereSphereLibrary {
  name: string;
  list: string[];
}

export interface HereSphereIndex {
  access: number;
  banner?: {
    image: string;
    link: string;
  };
  library: HereSphereLibrary[];
}

// Tags, media and subtitles shared by scan and video responses
export interface HereSphereTag {
  name: string;
  start?: number;
  end?: number;
  track?: number;
  rating?: number;
}

export interface HereSphereMediaSource {
  resolution?: number;
  height?: number;
  width?: number;
  size?: number;
  url: string;
}

export interface HereSphereMedia {
  name: string;
  sources: HereSphereMediaSource[];
}

export interface HereSphereSubtitle {
  name: string;
  language: string;
  url: string;
}

// Bulk metadata (POST /heresphere/scan)
export interface HereSphereScanEntry {
  link: string;
  title: string;
  dateReleased: string;
  dateAdded: string;
  duration: number;
  rating: number;
  favorites: number;
  comments: number;
  isFavorite: boolean;
  tags: HereSphereTag[];
  thumbnailImage: string;
  projection: string;
  stereo: string;
  media: HereSphereMedia[];
  subtitles: HereSphereSubtitle[];
}

export interface HereSphereScan {
  scanData: HereSphereScanEntry[];
}

// Single video detail (POST /heresphere/:id)
export interface HereSphereVideo {
  access: number;
  title: string;
  description: string;
  thumbnailImage: string;
  dateReleased: string;
  dateAdded: string;
  duration: number;
  rating: number;
  isFavorite: boolean;
  projection: string;
  stereo: string;
  eventServer?: string;
  subtitles: HereSphereSubtitle[];
  tags: HereSphereTag[];
  media: HereSphereMedia[];
  writeFavorite: boolean;
  writeRating: boolean;
  writeTags: boolean;
  writeHSP: boolean;
}

// Auth (POST /heresphere/auth)
export interface HereSphereAuthResponse {
  'auth-token'?: string;
  access: number;
}

// ============================================================================
// Gateway status shapes
// ============================================================================

/** Playback event kinds relayed to Jellyfin */
export type PlaybackEventKind = 'start' | 'progress' | 'stop' | 'watched';

/** Status of one QuickConnect request */
export type QuickConnectStatus = 'pending' | 'authorized' | 'expired';

/** Credentials revealed once to the browser after approval */
export interface SessionIdentity {
  sessionId: string;
  username: string;
  password: string;
}

export type LoginStatus =
  | { status: 'pending'; code: string; expiresAt: number }
  | { status: 'authorized'; identity: SessionIdentity }
  | { status: 'expired' }
  | { status: 'unknown' };

export interface ReadinessReport {
  status: 'ok' | 'degraded';
  store: boolean;
  jellyfin: boolean;
  sessions: number;
}
