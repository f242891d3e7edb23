/**
 * Jellyfin -> HereSphere mapping
 *
 * Pure functions over parsed Jellyfin items. Links to Jellyfin media go
 * through a MediaUrlBuilder so they point at the public host.
 */

import type {
  HereSphereLibrary,
  HereSphereMedia,
  HereSphereScan,
  HereSphereScanEntry,
  HereSphereSubtitle,
  HereSphereVideo,
} from '@spherebridge/shared';
import { HERESPHERE_ACCESS, TICKS_PER_MS } from '@spherebridge/shared';
import type { JellyfinItem } from '../mediaServer/types.js';
import type { MediaUrlBuilder } from '../mediaServer/jellyfin/urls.js';
import { buildTags } from './tags.js';
import { describeError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

export const LIBRARY_NAME = 'Library';
const PROJECTION = 'perspective';
const STEREO = 'mono';
const EPOCH_DATE = '1970-01-01';

export interface TranslationContext {
  /** Externally visible base URL of the gateway, without trailing slash */
  baseUrl: string;
  urls: MediaUrlBuilder;
  /** When set, only subtitles in this language are listed on video detail */
  subtitleLanguage?: string;
}

// ============================================================================
// Field helpers
// ============================================================================

const pad2 = (value: number) => String(value).padStart(2, '0');

/** Episodes read `S01E02 - Name`; everything else uses its name */
export function formatTitle(item: JellyfinItem): string {
  if (item.type !== 'Episode') return item.name;
  return `S${pad2(item.parentIndexNumber ?? 0)}E${pad2(item.indexNumber ?? 0)} - ${item.name}`;
}

/** YYYY-MM-DD in UTC; missing dates fall back to the epoch */
export function formatDate(date: Date | undefined): string {
  return date ? date.toISOString().slice(0, 10) : EPOCH_DATE;
}

export function ticksToMs(ticks: number | undefined): number {
  return (ticks ?? 0) / TICKS_PER_MS;
}

/** Jellyfin rates 0-10, HereSphere 0-5 */
export function toRating(communityRating: number | undefined): number {
  return (communityRating ?? 0) / 2;
}

export function itemLink(item: JellyfinItem, ctx: TranslationContext): string {
  return `${ctx.baseUrl}/heresphere/${item.id}`;
}

export function thumbnailFor(item: JellyfinItem, urls: MediaUrlBuilder): string {
  return urls.image(item.id, item.type === 'Movie' ? 'Backdrop' : 'Primary');
}

/** One downloadable file per Jellyfin media source */
export function buildMedia(item: JellyfinItem, urls: MediaUrlBuilder): HereSphereMedia[] {
  return item.mediaSources.map((source) => ({
    name: source.container ?? source.name ?? 'video',
    sources: [
      {
        resolution: source.height,
        height: source.height,
        width: source.width,
        size: source.size,
        url: urls.download(source.id),
      },
    ],
  }));
}

/**
 * Text subtitle streams of every media source. Image-based subtitles are
 * skipped since HereSphere cannot render them.
 */
export function buildSubtitles(
  item: JellyfinItem,
  urls: MediaUrlBuilder,
  language?: string
): HereSphereSubtitle[] {
  const subtitles: HereSphereSubtitle[] = [];
  for (const source of item.mediaSources) {
    for (const stream of source.subtitles) {
      if (!stream.isTextSubtitleStream) continue;
      const streamLanguage = stream.language ?? '';
      if (language && streamLanguage !== language) continue;
      subtitles.push({
        name: stream.displayTitle ?? streamLanguage,
        language: streamLanguage,
        url: urls.subtitle(item.id, source.id, stream.index, stream.codec ?? 'srt'),
      });
    }
  }
  return subtitles;
}

// ============================================================================
// Item mapping
// ============================================================================

export function itemToScanEntry(item: JellyfinItem, ctx: TranslationContext): HereSphereScanEntry {
  return {
    link: itemLink(item, ctx),
    title: formatTitle(item),
    dateReleased: formatDate(item.premiereDate),
    dateAdded: formatDate(item.dateCreated),
    duration: ticksToMs(item.runTimeTicks),
    rating: toRating(item.communityRating),
    favorites: 0,
    comments: 0,
    isFavorite: item.isFavorite,
    tags: buildTags(item),
    thumbnailImage: thumbnailFor(item, ctx.urls),
    projection: PROJECTION,
    stereo: STEREO,
    media: buildMedia(item, ctx.urls),
    subtitles: buildSubtitles(item, ctx.urls),
  };
}

export function itemToVideo(item: JellyfinItem, ctx: TranslationContext): HereSphereVideo {
  return {
    access: HERESPHERE_ACCESS.GRANTED,
    title: formatTitle(item),
    description: item.overview ?? '',
    thumbnailImage: thumbnailFor(item, ctx.urls),
    dateReleased: formatDate(item.premiereDate),
    dateAdded: formatDate(item.dateCreated),
    duration: ticksToMs(item.runTimeTicks),
    rating: toRating(item.communityRating),
    isFavorite: item.isFavorite,
    projection: PROJECTION,
    stereo: STEREO,
    subtitles: buildSubtitles(item, ctx.urls, ctx.subtitleLanguage),
    tags: buildTags(item),
    media: buildMedia(item, ctx.urls),
    // Nothing is written back to Jellyfin from the headset
    writeFavorite: false,
    writeRating: false,
    writeTags: false,
    writeHSP: false,
  };
}

// ============================================================================
// Collections
// ============================================================================

/** Items with a file on disk; virtual items only carry metadata */
export function playableItems(items: readonly JellyfinItem[]): JellyfinItem[] {
  return items.filter((item) => !item.isVirtual);
}

export function itemsToLibrary(
  items: readonly JellyfinItem[],
  ctx: TranslationContext,
  name: string = LIBRARY_NAME
): HereSphereLibrary {
  return {
    name,
    list: playableItems(items).map((item) => itemLink(item, ctx)),
  };
}

/**
 * Scan data for every playable item. An item that cannot be translated is
 * logged and left out; the rest of the scan is still returned.
 */
export function itemsToScan(
  items: readonly JellyfinItem[],
  ctx: TranslationContext,
  logger?: Logger
): HereSphereScan {
  const scanData: HereSphereScanEntry[] = [];
  for (const item of playableItems(items)) {
    try {
      scanData.push(itemToScanEntry(item, ctx));
    } catch (error) {
      logger?.warn('Skipping item that failed to translate', {
        itemId: item.id,
        error: describeError(error),
      });
    }
  }
  return { scanData };
}
