/**
 * Jellyfin Client
 *
 * Implements JellyfinUpstream over Jellyfin's REST API. Stateless with respect
 * to users: access tokens are passed per call, so one instance is shared by
 * every request. Failures are mapped by utils/http and never retried here.
 */

import { fetchJson, jellyfinHeaders, request, type FetchFn } from '../../../utils/http.js';
import { NotFoundError, UpstreamRequestError } from '../../../utils/errors.js';
import { createLogger, type Logger } from '../../../utils/logger.js';
import type {
  JellyfinCredentials,
  JellyfinHosts,
  JellyfinItem,
  JellyfinPlaybackInfo,
  JellyfinUpstream,
  PlaybackReport,
  QuickConnectInitiation,
  QuickConnectPollResult,
} from '../types.js';
import {
  parseAuthResponse,
  parseItem,
  parseItemsPage,
  parsePlaybackInfo,
  parseQuickConnectResult,
} from './parser.js';
import { rewriteMediaUrl } from './urls.js';

// Client identification constants
const CLIENT_NAME = 'SphereBridge';
const CLIENT_VERSION = '0.1.0';
const DEVICE_ID = 'spherebridge-gateway';
const DEVICE_NAME = 'HereSphere';

const SERVICE = 'jellyfin';

const LIBRARY_FIELDS = [
  'DateCreated',
  'MediaSources',
  'Genres',
  'Tags',
  'Studios',
  'SeriesStudio',
  'People',
  'Chapters',
  'Overview',
  'ProductionYear',
  'PremiereDate',
].join(',');

export interface JellyfinClientConfig {
  hosts: JellyfinHosts;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Items per page when listing the library */
  pageSize?: number;
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * Jellyfin client implementation
 *
 * @example
 * const client = new JellyfinClient({ hosts: { internalUrl: 'http://jellyfin:8096', publicUrl: 'https://media.example.com' } });
 * const { secret, code } = await client.quickConnectInitiate();
 */
export class JellyfinClient implements JellyfinUpstream {
  readonly hosts: JellyfinHosts;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly pageSize: number;
  private readonly fetchFn: FetchFn | undefined;
  private readonly log: Logger;

  constructor(config: JellyfinClientConfig) {
    this.hosts = config.hosts;
    this.baseUrl = config.hosts.internalUrl.replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.pageSize = config.pageSize ?? 200;
    this.fetchFn = config.fetch;
    this.log = config.logger ?? createLogger('jellyfin');
  }

  // ==========================================================================
  // Protected Helpers
  // ==========================================================================

  /**
   * Build X-Emby-Authorization header value
   */
  protected buildAuthHeader(token?: string): string {
    const tokenPart = token ? `, Token="${token}"` : '';
    return `MediaBrowser Client="${CLIENT_NAME}", Device="${DEVICE_NAME}", DeviceId="${DEVICE_ID}", Version="${CLIENT_VERSION}"${tokenPart}`;
  }

  protected buildHeaders(token?: string): Record<string, string> {
    return {
      'X-Emby-Authorization': this.buildAuthHeader(token),
      ...jellyfinHeaders(),
    };
  }

  private getJson(path: string, token?: string): Promise<unknown> {
    return fetchJson(`${this.baseUrl}${path}`, {
      headers: this.buildHeaders(token),
      service: SERVICE,
      timeout: this.timeoutMs,
      fetch: this.fetchFn,
    });
  }

  private postJson(path: string, body: unknown, token?: string): Promise<unknown> {
    return fetchJson(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: this.buildHeaders(token),
      body,
      service: SERVICE,
      timeout: this.timeoutMs,
      fetch: this.fetchFn,
    });
  }

  private async post(path: string, body: unknown, token: string): Promise<void> {
    await request(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: this.buildHeaders(token),
      body,
      service: SERVICE,
      timeout: this.timeoutMs,
      fetch: this.fetchFn,
    });
  }

  // ==========================================================================
  // QuickConnect
  // ==========================================================================

  async quickConnectInitiate(): Promise<QuickConnectInitiation> {
    const data = await this.postJson('/QuickConnect/Initiate', undefined);
    const { secret, code } = parseQuickConnectResult(data);
    return { secret, code };
  }

  /**
   * Poll a QuickConnect secret. Once the user has approved the code, the
   * secret is exchanged for an access token in the same call.
   */
  async quickConnectPoll(secret: string): Promise<QuickConnectPollResult> {
    let authenticated: boolean;
    try {
      const data = await this.getJson(`/QuickConnect/Connect?${new URLSearchParams({ Secret: secret })}`);
      authenticated = parseQuickConnectResult(data).authenticated;
    } catch (error) {
      // Jellyfin forgets secrets once they expire
      if (error instanceof UpstreamRequestError && error.upstreamStatus === 404) {
        return { status: 'expired' };
      }
      throw error;
    }

    if (!authenticated) return { status: 'pending' };

    const auth = parseAuthResponse(
      await this.postJson('/Users/AuthenticateWithQuickConnect', { Secret: secret })
    );
    this.log.info('QuickConnect approved', { userId: auth.userId, username: auth.username });
    return { status: 'approved', ...auth };
  }

  async reportCapabilities(accessToken: string): Promise<void> {
    await this.post(
      '/Sessions/Capabilities/Full',
      {
        PlayableMediaTypes: ['Video'],
        SupportedCommands: [],
        SupportsMediaControl: false,
        SupportsPersistentIdentifier: false,
      },
      accessToken
    );
  }

  // ==========================================================================
  // Library
  // ==========================================================================

  /**
   * Iterate every playable item of the user's library, one page per request.
   * Items without an id are skipped.
   */
  async *listLibrary(credentials: JellyfinCredentials): AsyncGenerator<JellyfinItem, void, undefined> {
    let startIndex = 0;
    let skipped = 0;

    for (;;) {
      const params = new URLSearchParams({
        SortBy: 'SortName,ProductionYear',
        SortOrder: 'Ascending',
        IncludeItemTypes: 'Movie,Episode',
        Recursive: 'true',
        Fields: LIBRARY_FIELDS,
        ImageTypeLimit: '1',
        EnableImageTypes: 'Primary,Backdrop',
        // IsMissing=false excludes episodes Jellyfin knows about without files
        IsMissing: 'false',
        StartIndex: String(startIndex),
        Limit: String(this.pageSize),
      });

      const data = await this.getJson(
        `/Users/${encodeURIComponent(credentials.userId)}/Items?${params}`,
        credentials.accessToken
      );
      const page = parseItemsPage(data);

      for (const raw of page.items) {
        const item = parseItem(raw);
        if (item) yield item;
        else skipped++;
      }

      startIndex += page.items.length;
      const total = page.totalCount ?? startIndex;
      if (page.items.length < this.pageSize || startIndex >= total) break;
    }

    if (skipped > 0) {
      this.log.warn('Skipped library items without an id', { skipped });
    }
  }

  async getItem(credentials: JellyfinCredentials, itemId: string): Promise<JellyfinItem> {
    let data: unknown;
    try {
      data = await this.getJson(
        `/Users/${encodeURIComponent(credentials.userId)}/Items/${encodeURIComponent(itemId)}`,
        credentials.accessToken
      );
    } catch (error) {
      if (error instanceof UpstreamRequestError && error.upstreamStatus === 404) {
        throw new NotFoundError(`Item ${itemId} not found`);
      }
      throw error;
    }

    const item = parseItem(data);
    if (!item) throw new NotFoundError(`Item ${itemId} not found`);
    return item;
  }

  async getPlaybackInfo(credentials: JellyfinCredentials, itemId: string): Promise<JellyfinPlaybackInfo> {
    const params = new URLSearchParams({ UserId: credentials.userId });
    const data = await this.getJson(
      `/Items/${encodeURIComponent(itemId)}/PlaybackInfo?${params}`,
      credentials.accessToken
    );
    return parsePlaybackInfo(data, itemId);
  }

  // ==========================================================================
  // Playback Reporting
  // ==========================================================================

  async reportProgress(credentials: JellyfinCredentials, report: PlaybackReport): Promise<void> {
    const body = {
      ItemId: report.itemId,
      PositionTicks: Math.round(report.positionTicks),
      PlaySessionId: report.playSessionId,
      MediaSourceId: report.mediaSourceId,
    };

    switch (report.kind) {
      case 'start':
        await this.post(
          '/Sessions/Playing',
          { ...body, IsPaused: report.isPaused ?? false, CanSeek: true, PlayMethod: 'DirectStream' },
          credentials.accessToken
        );
        return;
      case 'progress':
        await this.post(
          '/Sessions/Playing/Progress',
          {
            ...body,
            IsPaused: report.isPaused ?? false,
            CanSeek: true,
            EventName: report.isPaused ? 'Pause' : 'TimeUpdate',
          },
          credentials.accessToken
        );
        return;
      case 'stop':
        await this.post('/Sessions/Playing/Stopped', body, credentials.accessToken);
        return;
      case 'watched':
        await this.post('/Sessions/Playing/Stopped', body, credentials.accessToken);
        await this.post(
          `/Users/${encodeURIComponent(credentials.userId)}/PlayedItems/${encodeURIComponent(report.itemId)}`,
          undefined,
          credentials.accessToken
        );
        return;
    }
  }

  // ==========================================================================
  // Misc
  // ==========================================================================

  rewriteMediaUrl(url: string): string {
    return rewriteMediaUrl(url, this.hosts);
  }

  /**
   * Test connection to the server
   */
  async ping(): Promise<boolean> {
    try {
      await this.getJson('/System/Info/Public');
      return true;
    } catch {
      return false;
    }
  }
}
