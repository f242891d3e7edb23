/**
 * HereSphere tag derivation
 *
 * Tags are `Category:value` strings. Simple categories come from a rule table;
 * a second table copies selected categories under additional names. Studio is
 * aliased into Series because HereSphere gives that category its own browsing
 * view, so studios show up there too.
 */

import type { HereSphereTag, TagCategory } from '@spherebridge/shared';
import { TICKS_PER_MS } from '@spherebridge/shared';
import type { JellyfinItem } from '../mediaServer/types.js';

export interface TagRule {
  category: TagCategory;
  values: (item: JellyfinItem) => Array<string | undefined>;
}

/** Order here is the order tags are emitted in */
export const TAG_RULES: readonly TagRule[] = [
  { category: 'Genre', values: (item) => item.genres },
  { category: 'Tag', values: (item) => item.tags },
  { category: 'Type', values: (item) => [item.type] },
  { category: 'Year', values: (item) => [item.productionYear?.toString()] },
  { category: 'Movie', values: (item) => (item.type === 'Movie' ? [item.name] : []) },
  { category: 'Series', values: (item) => (item.type === 'Episode' ? [item.seriesName] : []) },
  {
    category: 'Studio',
    values: (item) => (item.type === 'Episode' ? [item.seriesStudio] : item.studios),
  },
  { category: 'Season', values: (item) => [item.seasonName] },
];

/** Every tag of a key category is also emitted under each listed category */
export const TAG_ALIASES: Readonly<Partial<Record<TagCategory, readonly TagCategory[]>>> = {
  Studio: ['Series'],
};

const ticksToMs = (ticks: number) => ticks / TICKS_PER_MS;

/**
 * Chapters become timed tags on track 0. Each chapter ends where the next
 * starts; the last one ends with the item.
 */
export function chapterTags(item: JellyfinItem): HereSphereTag[] {
  const runtimeMs = ticksToMs(item.runTimeTicks ?? 0);
  return item.chapters.map((chapter, index) => {
    const next = item.chapters[index + 1];
    return {
      name: `Chapter:${chapter.name ?? 'Unknown'}`,
      start: ticksToMs(chapter.startPositionTicks),
      end: next ? ticksToMs(next.startPositionTicks) : runtimeMs,
      track: 0,
    };
  });
}

/** People are tagged by their Jellyfin person type, with and without role */
export function peopleTags(item: JellyfinItem): HereSphereTag[] {
  const tags: HereSphereTag[] = [];
  for (const person of item.people) {
    if (!person.type) continue;
    if (person.role) {
      tags.push({ name: `${person.type}:${person.name} (${person.role})` });
    }
    tags.push({ name: `${person.type}:${person.name}` });
  }
  return tags;
}

export function categoryTags(item: JellyfinItem): HereSphereTag[] {
  const tags: HereSphereTag[] = [];
  for (const rule of TAG_RULES) {
    for (const value of rule.values(item)) {
      if (!value) continue;
      tags.push({ name: `${rule.category}:${value}` });
      for (const alias of TAG_ALIASES[rule.category] ?? []) {
        tags.push({ name: `${alias}:${value}` });
      }
    }
  }
  return tags;
}

/**
 * All tags for an item. Untimed tags are unique by name; chapters by name
 * and start.
 */
export function buildTags(item: JellyfinItem): HereSphereTag[] {
  const seen = new Set<string>();
  const result: HereSphereTag[] = [];
  for (const tag of [...chapterTags(item), ...categoryTags(item), ...peopleTags(item)]) {
    const key = tag.start === undefined ? tag.name : `${tag.name}@${tag.start}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(tag);
  }
  return result;
}
