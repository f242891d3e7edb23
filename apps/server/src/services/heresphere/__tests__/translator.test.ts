/**
 * Jellyfin -> HereSphere translator tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  buildSubtitles,
  formatDate,
  formatTitle,
  itemToScanEntry,
  itemToVideo,
  itemsToLibrary,
  itemsToScan,
  type TranslationContext,
} from '../translator.js';
import { createMediaUrlBuilder } from '../../mediaServer/jellyfin/urls.js';
import type { JellyfinMediaSource } from '../../mediaServer/types.js';
import type { Logger } from '../../../utils/logger.js';
import { TEST_HOSTS, makeItem } from '../../../test/fakes.js';

const PUBLIC = 'https://media.example.test';
const GATEWAY = 'https://gateway.example.test';

const ctx: TranslationContext = {
  baseUrl: GATEWAY,
  urls: createMediaUrlBuilder(TEST_HOSTS, 'token-alice'),
};

const source: JellyfinMediaSource = {
  id: 'src1',
  container: 'mp4',
  size: 1024,
  width: 3840,
  height: 1920,
  subtitles: [
    { index: 2, language: 'eng', displayTitle: 'English', isTextSubtitleStream: true },
    { index: 3, language: 'ger', codec: 'vtt', isTextSubtitleStream: true },
    { index: 4, language: 'eng', codec: 'pgssub', isTextSubtitleStream: false },
  ],
};

describe('field helpers', () => {
  it('formats episode titles with zero-padded numbers', () => {
    expect(formatTitle(makeItem({ type: 'Episode', name: 'Pilot', parentIndexNumber: 1, indexNumber: 2 }))).toBe(
      'S01E02 - Pilot'
    );
    expect(formatTitle(makeItem({ type: 'Episode', name: 'Special' }))).toBe('S00E00 - Special');
    expect(formatTitle(makeItem({ name: 'Feature' }))).toBe('Feature');
  });

  it('formats dates in UTC and falls back to the epoch', () => {
    expect(formatDate(new Date('2023-06-30T23:30:00Z'))).toBe('2023-06-30');
    expect(formatDate(undefined)).toBe('1970-01-01');
  });
});

describe('buildSubtitles', () => {
  it('lists text streams only, defaulting the codec to srt', () => {
    const item = makeItem({ mediaSources: [source] });

    expect(buildSubtitles(item, ctx.urls)).toEqual([
      {
        name: 'English',
        language: 'eng',
        url: `${PUBLIC}/Videos/item1/src1/Subtitles/2/Stream.srt?api_key=token-alice`,
      },
      {
        name: 'ger',
        language: 'ger',
        url: `${PUBLIC}/Videos/item1/src1/Subtitles/3/Stream.vtt?api_key=token-alice`,
      },
    ]);
  });

  it('filters by language when one is configured', () => {
    const item = makeItem({ mediaSources: [source] });

    expect(buildSubtitles(item, ctx.urls, 'ger').map((subtitle) => subtitle.language)).toEqual(['ger']);
  });
});

describe('itemToScanEntry', () => {
  it('maps a movie', () => {
    const item = makeItem({
      premiereDate: new Date('2020-05-01T00:00:00Z'),
      dateCreated: new Date('2024-01-02T10:00:00Z'),
      runTimeTicks: 72_000_000_000,
      communityRating: 7,
      isFavorite: true,
      studios: ['A24'],
      mediaSources: [source],
    });

    const entry = itemToScanEntry(item, ctx);

    expect(entry).toMatchObject({
      link: `${GATEWAY}/heresphere/item1`,
      title: 'Test Movie',
      dateReleased: '2020-05-01',
      dateAdded: '2024-01-02',
      duration: 7_200_000,
      rating: 3.5,
      favorites: 0,
      comments: 0,
      isFavorite: true,
      projection: 'perspective',
      stereo: 'mono',
      thumbnailImage: `${PUBLIC}/Items/item1/Images/Backdrop?maxHeight=300&maxWidth=300&quality=90&api_key=token-alice`,
    });
    expect(entry.tags.map((tag) => tag.name)).toContain('Series:A24');
    expect(entry.media).toEqual([
      {
        name: 'mp4',
        sources: [
          {
            resolution: 1920,
            height: 1920,
            width: 3840,
            size: 1024,
            url: `${PUBLIC}/Items/src1/Download?api_key=token-alice`,
          },
        ],
      },
    ]);
    expect(entry.subtitles).toHaveLength(2);
  });

  it('uses the primary image for episodes', () => {
    const entry = itemToScanEntry(makeItem({ type: 'Episode' }), ctx);

    expect(entry.thumbnailImage).toBe(
      `${PUBLIC}/Items/item1/Images/Primary?maxHeight=300&maxWidth=300&quality=90&api_key=token-alice`
    );
  });

  it('keeps an item without a studio', () => {
    const entry = itemToScanEntry(makeItem({ studios: [] }), ctx);

    expect(entry.tags.some((tag) => tag.name.startsWith('Studio:'))).toBe(false);
    expect(entry.link).toBe(`${GATEWAY}/heresphere/item1`);
  });
});

describe('itemToVideo', () => {
  it('maps detail fields and applies the subtitle language', () => {
    const item = makeItem({ overview: 'A short film.', mediaSources: [source] });

    const video = itemToVideo(item, { ...ctx, subtitleLanguage: 'eng' });

    expect(video).toMatchObject({
      access: 1,
      title: 'Test Movie',
      description: 'A short film.',
      writeFavorite: false,
      writeRating: false,
      writeTags: false,
      writeHSP: false,
    });
    expect(video.subtitles.map((subtitle) => subtitle.name)).toEqual(['English']);
  });

  it('defaults a missing overview to an empty description', () => {
    expect(itemToVideo(makeItem(), ctx).description).toBe('');
  });
});

describe('collections', () => {
  const items = [
    makeItem({ id: 'a' }),
    makeItem({ id: 'virtual', isVirtual: true }),
    makeItem({ id: 'b', studios: [] }),
  ];

  it('lists playable items in one library', () => {
    expect(itemsToLibrary(items, ctx)).toEqual({
      name: 'Library',
      list: [`${GATEWAY}/heresphere/a`, `${GATEWAY}/heresphere/b`],
    });
  });

  it('skips an item that fails to translate and keeps the rest', () => {
    const broken = makeItem({ id: 'broken', premiereDate: new Date(Number.NaN) });
    const warn = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };

    const scan = itemsToScan([...items, broken], ctx, logger);

    expect(scan.scanData.map((entry) => entry.link)).toEqual([`${GATEWAY}/heresphere/a`, `${GATEWAY}/heresphere/b`]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[1]).toMatchObject({ itemId: 'broken' });
  });
});
