/**
 * Jellyfin Upstream Types
 *
 * The subset of Jellyfin the gateway talks to, expressed as an interface so
 * orchestration code and tests do not depend on the HTTP client.
 */

import type { PlaybackEventKind } from '@spherebridge/shared';

// ============================================================================
// Hosts and Credentials
// ============================================================================

/**
 * Two-host setup: the gateway reaches Jellyfin on `internalUrl`, clients are
 * handed links on `publicUrl`. Both are equal when no public URL is configured.
 */
export interface JellyfinHosts {
  internalUrl: string;
  publicUrl: string;
}

/** Per-call credentials; the client keeps no session state */
export interface JellyfinCredentials {
  userId: string;
  accessToken: string;
}

// ============================================================================
// QuickConnect
// ============================================================================

export interface QuickConnectInitiation {
  secret: string;
  /** Code the user types into an authenticated Jellyfin client */
  code: string;
}

export type QuickConnectPollResult =
  | { status: 'pending' }
  /** Jellyfin no longer knows the secret (expired or rejected) */
  | { status: 'expired' }
  | { status: 'approved'; userId: string; username: string; accessToken: string };

// ============================================================================
// Library Items
// ============================================================================

export interface JellyfinPerson {
  name: string;
  /** Actor, Director, Writer, ... */
  type?: string;
  role?: string;
}

export interface JellyfinChapter {
  name?: string;
  startPositionTicks: number;
}

export interface JellyfinSubtitleStream {
  index: number;
  language?: string;
  displayTitle?: string;
  codec?: string;
  isTextSubtitleStream: boolean;
}

export interface JellyfinMediaSource {
  id: string;
  name?: string;
  container?: string;
  size?: number;
  width?: number;
  height?: number;
  subtitles: JellyfinSubtitleStream[];
}

export interface JellyfinItem {
  id: string;
  name: string;
  /** BaseItemKind: Movie, Episode, ... */
  type: string;
  overview?: string;
  seriesName?: string;
  seriesStudio?: string;
  seasonName?: string;
  studios: string[];
  genres: string[];
  tags: string[];
  people: JellyfinPerson[];
  chapters: JellyfinChapter[];
  productionYear?: number;
  premiereDate?: Date;
  dateCreated?: Date;
  runTimeTicks?: number;
  /** 0-10 scale */
  communityRating?: number;
  /** Season number for episodes */
  parentIndexNumber?: number;
  /** Episode number for episodes */
  indexNumber?: number;
  /** Virtual items have metadata but no file */
  isVirtual: boolean;
  isFavorite: boolean;
  mediaSources: JellyfinMediaSource[];
}

// ============================================================================
// Playback
// ============================================================================

export interface JellyfinPlaybackInfo {
  playSessionId: string;
  mediaSourceId: string;
  /** Relative URL Jellyfin proposes when the source needs transcoding */
  transcodingUrl?: string;
}

export interface PlaybackReport {
  itemId: string;
  positionTicks: number;
  kind: PlaybackEventKind;
  isPaused?: boolean;
  playSessionId?: string;
  mediaSourceId?: string;
}

// ============================================================================
// Client Interface
// ============================================================================

export interface JellyfinUpstream {
  readonly hosts: JellyfinHosts;

  quickConnectInitiate(): Promise<QuickConnectInitiation>;
  quickConnectPoll(secret: string): Promise<QuickConnectPollResult>;
  /** Announce client capabilities for a freshly issued token */
  reportCapabilities(accessToken: string): Promise<void>;

  /** Lazy, finite sequence over the user's playable items; one request per page */
  listLibrary(credentials: JellyfinCredentials): AsyncGenerator<JellyfinItem, void, undefined>;
  getItem(credentials: JellyfinCredentials, itemId: string): Promise<JellyfinItem>;
  getPlaybackInfo(credentials: JellyfinCredentials, itemId: string): Promise<JellyfinPlaybackInfo>;
  reportProgress(credentials: JellyfinCredentials, report: PlaybackReport): Promise<void>;

  /** Substitute the public host for the internal one */
  rewriteMediaUrl(url: string): string;
  ping(): Promise<boolean>;
}
