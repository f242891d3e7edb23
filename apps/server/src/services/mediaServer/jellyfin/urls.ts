/**
 * Jellyfin media URL builders
 *
 * Pure functions: links are built against the internal host, then rewritten
 * to the public host so clients outside the cluster can reach them.
 */

import type { JellyfinHosts } from '../types.js';

const THUMBNAIL_SIZE = 300;
const THUMBNAIL_QUALITY = 90;

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Replace the internal Jellyfin base URL with the public one.
 * URLs on any other host are returned unchanged.
 */
export function rewriteMediaUrl(url: string, hosts: JellyfinHosts): string {
  const internal = trimTrailingSlash(hosts.internalUrl);
  const external = trimTrailingSlash(hosts.publicUrl);
  if (internal === external) return url;

  const lower = url.toLowerCase();
  const prefix = internal.toLowerCase();
  if (lower === prefix) return external;
  if (lower.startsWith(`${prefix}/`) || lower.startsWith(`${prefix}?`)) {
    return external + url.slice(internal.length);
  }
  return url;
}

export interface MediaUrlBuilder {
  /** Resolve a Jellyfin-relative path (e.g. a TranscodingUrl) */
  resolve(path: string): string;
  image(itemId: string, imageType: 'Primary' | 'Backdrop'): string;
  download(mediaSourceId: string): string;
  hls(itemId: string, playSessionId: string, mediaSourceId: string): string;
  subtitle(itemId: string, mediaSourceId: string, streamIndex: number, codec: string): string;
}

/**
 * Build client-facing links for one user's token
 */
export function createMediaUrlBuilder(hosts: JellyfinHosts, accessToken: string): MediaUrlBuilder {
  const base = trimTrailingSlash(hosts.internalUrl);
  const withBase = (path: string) => rewriteMediaUrl(`${base}${path}`, hosts);
  const key = encodeURIComponent(accessToken);

  return {
    resolve(path: string): string {
      if (/^https?:\/\//i.test(path)) return rewriteMediaUrl(path, hosts);
      const normalized = path.startsWith('/') ? path : `/${path}`;
      const separator = normalized.includes('?') ? '&' : '?';
      const withKey = /[?&]api_key=/i.test(normalized)
        ? normalized
        : `${normalized}${separator}api_key=${key}`;
      return withBase(withKey);
    },

    image(itemId: string, imageType: 'Primary' | 'Backdrop'): string {
      const params = new URLSearchParams({
        maxHeight: String(THUMBNAIL_SIZE),
        maxWidth: String(THUMBNAIL_SIZE),
        quality: String(THUMBNAIL_QUALITY),
        api_key: accessToken,
      });
      return withBase(`/Items/${itemId}/Images/${imageType}?${params}`);
    },

    download(mediaSourceId: string): string {
      return withBase(`/Items/${mediaSourceId}/Download?api_key=${key}`);
    },

    hls(itemId: string, playSessionId: string, mediaSourceId: string): string {
      const params = new URLSearchParams({
        playSessionId,
        mediaSourceId,
        api_key: accessToken,
      });
      return withBase(`/Videos/${itemId}/master.m3u8?${params}`);
    },

    subtitle(itemId: string, mediaSourceId: string, streamIndex: number, codec: string): string {
      return withBase(
        `/Videos/${itemId}/${mediaSourceId}/Subtitles/${streamIndex}/Stream.${codec}?api_key=${key}`
      );
    },
  };
}
