/**
 * Jellyfin API Response Parser Functions
 *
 * Turn untyped Jellyfin JSON into the gateway's item model. Optional metadata
 * that is missing or malformed is dropped field by field; only an item without
 * an id is rejected.
 */

import {
  isRecord,
  getArray,
  getNestedObject,
  parseBoolean,
  parseDateString,
  parseNumber,
  parseOptionalNumber,
  parseOptionalString,
  parseString,
  parseStringArray,
  type UnknownRecord,
} from '../../../utils/parsing.js';
import { UpstreamRequestError } from '../../../utils/errors.js';
import type {
  JellyfinChapter,
  JellyfinItem,
  JellyfinMediaSource,
  JellyfinPerson,
  JellyfinPlaybackInfo,
  JellyfinSubtitleStream,
} from '../types.js';

// ============================================================================
// QuickConnect / Auth
// ============================================================================

export interface QuickConnectResult {
  secret: string;
  code: string;
  authenticated: boolean;
}

/**
 * Parse a QuickConnectResult (Initiate and Connect responses)
 */
export function parseQuickConnectResult(data: unknown): QuickConnectResult {
  if (!isRecord(data)) {
    throw new UpstreamRequestError('QuickConnect response is not an object', 200);
  }
  const secret = parseOptionalString(data.Secret);
  const code = parseOptionalString(data.Code);
  if (!secret || !code) {
    throw new UpstreamRequestError('QuickConnect response is missing Secret or Code', 200);
  }
  return { secret, code, authenticated: parseBoolean(data.Authenticated) };
}

export interface JellyfinAuthResult {
  userId: string;
  username: string;
  accessToken: string;
}

/**
 * Parse an AuthenticationResult
 */
export function parseAuthResponse(data: unknown): JellyfinAuthResult {
  if (!isRecord(data)) {
    throw new UpstreamRequestError('Authentication response is not an object', 200);
  }
  const user = getNestedObject(data, 'User');
  const userId = parseOptionalString(user?.Id);
  const username = parseOptionalString(user?.Name);
  const accessToken = parseOptionalString(data.AccessToken);
  if (!userId || !username || !accessToken) {
    throw new UpstreamRequestError('Authentication response is missing user or token', 200);
  }
  return { userId, username, accessToken };
}

// ============================================================================
// Items
// ============================================================================

export interface ItemsPage {
  items: unknown[];
  totalCount: number | undefined;
}

/**
 * Parse a BaseItemDtoQueryResult envelope without touching the items
 */
export function parseItemsPage(data: unknown): ItemsPage {
  if (!isRecord(data)) return { items: [], totalCount: 0 };
  return {
    items: getArray(data, 'Items'),
    totalCount: parseOptionalNumber(data.TotalRecordCount),
  };
}

function parsePerson(raw: unknown): JellyfinPerson | null {
  if (!isRecord(raw)) return null;
  const name = parseOptionalString(raw.Name);
  if (!name) return null;
  return {
    name,
    type: parseOptionalString(raw.Type),
    role: parseOptionalString(raw.Role),
  };
}

function parseChapter(raw: unknown): JellyfinChapter | null {
  if (!isRecord(raw)) return null;
  return {
    name: parseOptionalString(raw.Name),
    startPositionTicks: parseNumber(raw.StartPositionTicks),
  };
}

function parseStudioNames(raw: unknown): string[] {
  if (!Array.isArray(raw)) return [];
  const names: string[] = [];
  for (const studio of raw) {
    const name = isRecord(studio) ? parseOptionalString(studio.Name) : parseOptionalString(studio);
    if (name) names.push(name);
  }
  return names;
}

function parseSubtitleStream(stream: UnknownRecord): JellyfinSubtitleStream | null {
  if (parseString(stream.Type) !== 'Subtitle') return null;
  const index = parseOptionalNumber(stream.Index);
  if (index === undefined) return null;
  return {
    index,
    language: parseOptionalString(stream.Language),
    displayTitle: parseOptionalString(stream.DisplayTitle),
    codec: parseOptionalString(stream.Codec),
    // Jellyfin omits the flag on older servers; treat absent as text
    isTextSubtitleStream: stream.IsTextSubtitleStream === undefined || parseBoolean(stream.IsTextSubtitleStream),
  };
}

function parseMediaSource(raw: unknown): JellyfinMediaSource | null {
  if (!isRecord(raw)) return null;
  const id = parseOptionalString(raw.Id);
  if (!id) return null;

  const subtitles: JellyfinSubtitleStream[] = [];
  let width: number | undefined;
  let height: number | undefined;
  for (const stream of getArray(raw, 'MediaStreams')) {
    if (!isRecord(stream)) continue;
    if (parseString(stream.Type) === 'Video' && width === undefined) {
      width = parseOptionalNumber(stream.Width);
      height = parseOptionalNumber(stream.Height);
      continue;
    }
    const subtitle = parseSubtitleStream(stream);
    if (subtitle) subtitles.push(subtitle);
  }

  return {
    id,
    name: parseOptionalString(raw.Name),
    container: parseOptionalString(raw.Container),
    size: parseOptionalNumber(raw.Size),
    width,
    height,
    subtitles,
  };
}

function compact<T>(values: Array<T | null>): T[] {
  return values.filter((value): value is T => value !== null);
}

/**
 * Parse one BaseItemDto
 *
 * @returns The item, or null when it has no id
 */
export function parseItem(raw: unknown): JellyfinItem | null {
  if (!isRecord(raw)) return null;
  const id = parseOptionalString(raw.Id);
  if (!id) return null;

  const userData = getNestedObject(raw, 'UserData');

  return {
    id,
    name: parseString(raw.Name),
    type: parseString(raw.Type, 'Unknown'),
    overview: parseOptionalString(raw.Overview),
    seriesName: parseOptionalString(raw.SeriesName),
    seriesStudio: parseOptionalString(raw.SeriesStudio),
    seasonName: parseOptionalString(raw.SeasonName),
    studios: parseStudioNames(raw.Studios),
    genres: parseStringArray(raw.Genres),
    tags: parseStringArray(raw.Tags),
    people: compact(getArray(raw, 'People').map(parsePerson)),
    chapters: compact(getArray(raw, 'Chapters').map(parseChapter)),
    productionYear: parseOptionalNumber(raw.ProductionYear),
    premiereDate: parseDateString(raw.PremiereDate),
    dateCreated: parseDateString(raw.DateCreated),
    runTimeTicks: parseOptionalNumber(raw.RunTimeTicks),
    communityRating: parseOptionalNumber(raw.CommunityRating),
    parentIndexNumber: parseOptionalNumber(raw.ParentIndexNumber),
    indexNumber: parseOptionalNumber(raw.IndexNumber),
    isVirtual: parseString(raw.LocationType) === 'Virtual',
    isFavorite: parseBoolean(userData?.IsFavorite),
    mediaSources: compact(getArray(raw, 'MediaSources').map(parseMediaSource)),
  };
}

// ============================================================================
// Playback Info
// ============================================================================

/**
 * Parse a PlaybackInfoResponse. The first media source wins; an item without
 * sources falls back to its own id, which Jellyfin accepts as a source id.
 */
export function parsePlaybackInfo(data: unknown, itemId: string): JellyfinPlaybackInfo {
  if (!isRecord(data)) {
    throw new UpstreamRequestError('PlaybackInfo response is not an object', 200);
  }
  const playSessionId = parseOptionalString(data.PlaySessionId);
  if (!playSessionId) {
    throw new UpstreamRequestError('PlaybackInfo response is missing PlaySessionId', 200);
  }

  const source = getArray(data, 'MediaSources').find(isRecord);
  return {
    playSessionId,
    mediaSourceId: parseOptionalString(source?.Id) ?? itemId,
    transcodingUrl: parseOptionalString(source?.TranscodingUrl),
  };
}
