/**
 * HereSphere service
 *
 * Orchestrates one HereSphere request: resolve the caller to a session, pull
 * what is needed from Jellyfin with that session's token, and shape it with
 * the translator. Playback callbacks are mapped onto the tracker.
 */

import type {
  HereSphereEvent,
  HereSphereIndex,
  HereSphereScan,
  HereSphereVideo,
} from '@spherebridge/shared';
import { HERESPHERE_ACCESS, HERESPHERE_EVENTS, TICKS_PER_MS, WATCHED_THRESHOLD } from '@spherebridge/shared';
import type { SessionRecord } from '../../db/records.js';
import type { AuthSessionManager } from '../auth.js';
import { sessionCredentials } from '../auth.js';
import type { LibraryCacheService } from '../cache.js';
import type { PlaybackReportInput, PlaybackTracker, ReportResult } from '../playback.js';
import type { JellyfinItem, JellyfinUpstream } from '../mediaServer/types.js';
import { createMediaUrlBuilder } from '../mediaServer/jellyfin/urls.js';
import { itemToVideo, itemsToLibrary, itemsToScan, type TranslationContext } from './translator.js';
import { AuthExpiredError, describeError } from '../../utils/errors.js';
import { withRetry, type RetryOptions } from '../../utils/retry.js';
import { createLogger, type Logger } from '../../utils/logger.js';

export interface HereSphereCredentials {
  /** Value of the auth-token header */
  token?: string;
  username?: string;
  password?: string;
}

export interface HereSphereServiceOptions {
  auth: AuthSessionManager;
  jellyfin: JellyfinUpstream;
  tracker: PlaybackTracker;
  cache: LibraryCacheService;
  subtitleLanguage?: string;
  retry?: Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'maxDelayMs' | 'sleep'>;
  logger?: Logger;
}

type EventMapping = Pick<PlaybackReportInput, 'kind' | 'isPaused'>;

/**
 * Map a HereSphere event onto a playback report kind. A close near the end
 * of the runtime marks the item watched.
 */
export function mapEvent(event: HereSphereEvent['event'], positionTicks: number, runtimeTicks?: number): EventMapping {
  switch (event) {
    case HERESPHERE_EVENTS.OPEN:
      return { kind: 'start', isPaused: true };
    case HERESPHERE_EVENTS.PLAY:
      return { kind: 'progress', isPaused: false };
    case HERESPHERE_EVENTS.PAUSE:
      return { kind: 'progress', isPaused: true };
    case HERESPHERE_EVENTS.CLOSE: {
      const watched = runtimeTicks !== undefined && runtimeTicks > 0 && positionTicks >= runtimeTicks * WATCHED_THRESHOLD;
      return { kind: watched ? 'watched' : 'stop', isPaused: true };
    }
  }
}

export class HereSphereService {
  private readonly auth: AuthSessionManager;
  private readonly jellyfin: JellyfinUpstream;
  private readonly tracker: PlaybackTracker;
  private readonly cache: LibraryCacheService;
  private readonly subtitleLanguage: string | undefined;
  private readonly retry: HereSphereServiceOptions['retry'];
  private readonly log: Logger;

  constructor(options: HereSphereServiceOptions) {
    this.auth = options.auth;
    this.jellyfin = options.jellyfin;
    this.tracker = options.tracker;
    this.cache = options.cache;
    this.subtitleLanguage = options.subtitleLanguage;
    this.retry = options.retry;
    this.log = options.logger ?? createLogger('heresphere');
  }

  // ==========================================================================
  // Authentication
  // ==========================================================================

  /**
   * Resolve a request to a live session. The auth-token header wins over
   * credentials in the body.
   */
  async authenticate(credentials: HereSphereCredentials): Promise<SessionRecord | null> {
    if (credentials.token) {
      return this.auth.resolveAuthToken(credentials.token);
    }
    if (credentials.username && credentials.password) {
      return this.auth.authenticateLocal(credentials.username, credentials.password);
    }
    return null;
  }

  async login(username: string, password: string): Promise<{ token: string; session: SessionRecord } | null> {
    const session = await this.auth.authenticateLocal(username, password);
    if (!session) return null;
    this.log.info('HereSphere login', { username });
    return { token: this.auth.issueAuthToken(session), session };
  }

  // ==========================================================================
  // Library
  // ==========================================================================

  async getIndex(session: SessionRecord, baseUrl: string): Promise<HereSphereIndex> {
    const items = await this.loadLibrary(session);
    return {
      access: HERESPHERE_ACCESS.GRANTED,
      library: [itemsToLibrary(items, this.context(session, baseUrl))],
    };
  }

  async getScan(session: SessionRecord, baseUrl: string): Promise<HereSphereScan> {
    const items = await this.loadLibrary(session);
    return itemsToScan(items, this.context(session, baseUrl), this.log);
  }

  /**
   * Video detail. When the client is about to play, a Jellyfin playback
   * session is opened, its stream is listed first and the event server is
   * pointed at this session and item.
   */
  async getVideo(
    session: SessionRecord,
    itemId: string,
    baseUrl: string,
    needsMediaSource: boolean
  ): Promise<HereSphereVideo> {
    const credentials = sessionCredentials(session);
    const ctx = this.context(session, baseUrl);

    const item = await this.upstream(session, () => this.jellyfin.getItem(credentials, itemId));
    const video = itemToVideo(item, ctx);
    if (!needsMediaSource) return video;

    const info = await this.upstream(session, () => this.jellyfin.getPlaybackInfo(credentials, itemId));
    const streamUrl = info.transcodingUrl
      ? ctx.urls.resolve(info.transcodingUrl)
      : ctx.urls.hls(item.id, info.playSessionId, info.mediaSourceId);

    const started = await this.tracker.report({
      sessionId: session.id,
      itemId: item.id,
      positionTicks: 0,
      kind: 'start',
      isPaused: true,
      playSessionId: info.playSessionId,
      mediaSourceId: info.mediaSourceId,
      runtimeTicks: item.runTimeTicks,
    });
    this.log.debug('Playback opened', { itemId: item.id, outcome: started.outcome });

    const runtime = item.runTimeTicks ? `?runtime=${item.runTimeTicks}` : '';
    return {
      ...video,
      media: [{ name: 'Stream', sources: [{ url: streamUrl }] }, ...video.media],
      eventServer: `${ctx.baseUrl}/heresphere/events/${encodeURIComponent(session.id)}/${encodeURIComponent(item.id)}${runtime}`,
    };
  }

  // ==========================================================================
  // Playback Events
  // ==========================================================================

  /**
   * Apply a HereSphere playback callback.
   *
   * @returns The tracker result, or null when the session is not live
   */
  async handleEvent(
    sessionId: string,
    itemId: string,
    event: HereSphereEvent,
    runtimeTicks?: number
  ): Promise<ReportResult | null> {
    const session = await this.auth.getSession(sessionId);
    if (!session) return null;

    const positionTicks = Math.round(event.time * TICKS_PER_MS);
    const runtime = runtimeTicks ?? (await this.tracker.getState(sessionId, itemId))?.runtimeTicks;
    const mapping = mapEvent(event.event, positionTicks, runtime);

    const result = await this.tracker.report({
      sessionId,
      itemId,
      positionTicks,
      kind: mapping.kind,
      isPaused: mapping.isPaused,
      speed: event.speed,
      reportedAt: event.utc,
      runtimeTicks: runtime,
    });
    this.log.debug('Playback event', { sessionId, itemId, event: event.event, outcome: result.outcome });
    return result;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private context(session: SessionRecord, baseUrl: string): TranslationContext {
    return {
      baseUrl: baseUrl.replace(/\/+$/, ''),
      urls: createMediaUrlBuilder(this.jellyfin.hosts, session.accessToken),
      subtitleLanguage: this.subtitleLanguage,
    };
  }

  private loadLibrary(session: SessionRecord): Promise<JellyfinItem[]> {
    const credentials = sessionCredentials(session);
    return this.cache.getOrLoad(session.jellyfinUserId, () =>
      this.upstream(session, async () => {
        const items: JellyfinItem[] = [];
        for await (const item of this.jellyfin.listLibrary(credentials)) {
          items.push(item);
        }
        this.log.debug('Library enumerated', { userId: session.jellyfinUserId, count: items.length });
        return items;
      })
    );
  }

  /**
   * Run an upstream call with bounded retries. A rejected token retires the
   * session before the error propagates.
   */
  private async upstream<T>(session: SessionRecord, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, {
        ...this.retry,
        onRetry: (error, attempt) =>
          this.log.warn('Jellyfin call failed, retrying', { attempt, error: describeError(error) }),
      });
    } catch (error) {
      if (error instanceof AuthExpiredError) {
        this.cache.invalidate(session.jellyfinUserId);
        await this.auth.invalidateSession(session.id);
      }
      throw error;
    }
  }
}
