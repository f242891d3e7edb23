/**
 * Playback Tracker
 *
 * Ingests playback reports from the VR client, keeps the last-known state per
 * (session, item) and relays accepted reports to Jellyfin.
 *
 * Local state is the durable record of what the client last told us. Relaying
 * happens after the write and never rolls it back; a failed relay is logged,
 * not retried, so the client's playback loop is never blocked on Jellyfin.
 */

import type { PlaybackEventKind } from '@spherebridge/shared';
import { TICKS_PER_MS } from '@spherebridge/shared';
import type { KeyValueStore, Versioned } from '../db/store.js';
import { PlaybackRecordType, playbackKey, type PlaybackRecord, type SessionRecord } from '../db/records.js';
import type { JellyfinUpstream, PlaybackReport } from './mediaServer/types.js';
import { sessionCredentials } from './auth.js';
import { AuthExpiredError, ConflictError, describeError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

/** Bound on read-modify-write attempts for one report */
const MAX_CAS_ATTEMPTS = 5;

// ============================================================================
// Types
// ============================================================================

/** The part of the session manager the tracker needs */
export interface SessionDirectory {
  getSession(sessionId: string): Promise<SessionRecord | null>;
  invalidateSession(sessionId: string): Promise<void>;
}

export interface PlaybackReportInput {
  sessionId: string;
  itemId: string;
  positionTicks: number;
  kind: PlaybackEventKind;
  /**
   * Client-side timestamp (epoch ms); orders reports for one item. Reports the
   * gateway originates leave it out and take the stored client timestamp, so
   * every report for an item is ordered on the headset's clock.
   */
  reportedAt?: number;
  isPaused?: boolean;
  speed?: number;
  playSessionId?: string;
  mediaSourceId?: string;
  runtimeTicks?: number;
}

export type ReportOutcome = 'applied' | 'duplicate' | 'stale';

export type RelayOutcome = 'relayed' | 'skipped' | 'failed' | 'session-expired';

export interface ReportResult {
  outcome: ReportOutcome;
  /** State after the report */
  state: PlaybackRecord;
  /** Settles once the upstream relay finished; never rejects */
  relay: Promise<RelayOutcome>;
}

export interface PlaybackTrackerOptions {
  store: KeyValueStore;
  jellyfin: JellyfinUpstream;
  sessions: SessionDirectory;
  now?: () => number;
  logger?: Logger;
}

function sameReport(a: PlaybackRecord, b: PlaybackRecord): boolean {
  return (
    a.positionTicks === b.positionTicks &&
    a.lastEvent === b.lastEvent &&
    a.isPaused === b.isPaused &&
    a.speed === b.speed &&
    a.watched === b.watched &&
    a.playSessionId === b.playSessionId &&
    a.mediaSourceId === b.mediaSourceId &&
    a.runtimeTicks === b.runtimeTicks
  );
}

// ============================================================================
// Tracker
// ============================================================================

export class PlaybackTracker {
  private readonly store: KeyValueStore;
  private readonly jellyfin: JellyfinUpstream;
  private readonly sessions: SessionDirectory;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: PlaybackTrackerOptions) {
    this.store = options.store;
    this.jellyfin = options.jellyfin;
    this.sessions = options.sessions;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger('playback');
  }

  /**
   * Apply a report with last-writer-wins on `reportedAt`.
   *
   * Older reports are stale and an identical retry is a duplicate; neither
   * writes nor relays. The final state does not depend on arrival order.
   */
  async report(input: PlaybackReportInput): Promise<ReportResult> {
    const key = playbackKey(input.sessionId, input.itemId);

    for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
      const current = await this.store.get(PlaybackRecordType, key);
      const reportedAt = input.reportedAt ?? current?.value.lastReportedAt ?? 0;
      const next = this.buildState(input, reportedAt, current?.value);

      if (current) {
        if (reportedAt < current.value.lastReportedAt) {
          return this.unchanged('stale', current.value);
        }
        if (reportedAt === current.value.lastReportedAt && sameReport(current.value, next)) {
          return this.unchanged('duplicate', current.value);
        }
      }

      try {
        await this.store.compareAndSwap(PlaybackRecordType, key, current?.version ?? null, next);
      } catch (error) {
        if (error instanceof ConflictError && attempt < MAX_CAS_ATTEMPTS) continue;
        throw error;
      }

      this.log.debug('Playback state updated', {
        sessionId: input.sessionId,
        itemId: input.itemId,
        kind: input.kind,
        positionTicks: next.positionTicks,
      });

      return {
        outcome: 'applied',
        state: next,
        relay: this.relay(input.sessionId, {
          itemId: next.itemId,
          positionTicks: next.positionTicks,
          kind: input.kind,
          isPaused: next.isPaused,
          playSessionId: next.playSessionId,
          mediaSourceId: next.mediaSourceId,
        }),
      };
    }

    // Loop either returns or throws on its last attempt
    throw new ConflictError(key, null, null);
  }

  async getState(sessionId: string, itemId: string): Promise<PlaybackRecord | null> {
    const entry = await this.store.get(PlaybackRecordType, playbackKey(sessionId, itemId));
    return entry?.value ?? null;
  }

  /**
   * Extrapolate the position of every item that is still playing and relay it
   * as progress. Estimates go upstream only; stored state is never touched, so
   * an estimate cannot outrank a real client report.
   *
   * @returns Number of items relayed
   */
  async estimateProgress(now: number = this.now()): Promise<number> {
    const entries = await this.store.list(PlaybackRecordType);
    const relays: Array<Promise<RelayOutcome>> = [];

    for (const entry of entries) {
      const estimate = this.estimatePosition(entry, now);
      if (estimate === null) continue;

      relays.push(
        this.relay(entry.value.sessionId, {
          itemId: entry.value.itemId,
          positionTicks: estimate,
          kind: 'progress',
          isPaused: false,
          playSessionId: entry.value.playSessionId,
          mediaSourceId: entry.value.mediaSourceId,
        })
      );
    }

    const outcomes = await Promise.all(relays);
    const relayed = outcomes.filter((outcome) => outcome === 'relayed').length;
    this.log.debug('Estimated playback positions', { candidates: relays.length, relayed });
    return relayed;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private buildState(
    input: PlaybackReportInput,
    reportedAt: number,
    previous: PlaybackRecord | undefined
  ): PlaybackRecord {
    // The playback session, media source and runtime are only known when the video is opened
    return {
      sessionId: input.sessionId,
      itemId: input.itemId,
      positionTicks: Math.max(0, Math.round(input.positionTicks)),
      watched: input.kind === 'watched',
      isPaused: input.isPaused ?? input.kind === 'stop',
      speed: input.speed ?? 1,
      lastEvent: input.kind,
      lastReportedAt: reportedAt,
      playSessionId: input.playSessionId ?? previous?.playSessionId,
      mediaSourceId: input.mediaSourceId ?? previous?.mediaSourceId,
      runtimeTicks: input.runtimeTicks ?? previous?.runtimeTicks,
    };
  }

  private unchanged(outcome: 'stale' | 'duplicate', state: PlaybackRecord): ReportResult {
    this.log.debug('Playback report ignored', { outcome, sessionId: state.sessionId, itemId: state.itemId });
    return { outcome, state, relay: Promise.resolve('skipped') };
  }

  private estimatePosition(entry: Versioned<PlaybackRecord>, now: number): number | null {
    const state = entry.value;
    if (state.isPaused || state.watched) return null;
    if (state.lastEvent !== 'start' && state.lastEvent !== 'progress') return null;

    // Elapsed time is measured on the server clock, from the last write
    const elapsedMs = Math.max(0, now - entry.updatedAt);
    const estimate = state.positionTicks + Math.round(elapsedMs * state.speed) * TICKS_PER_MS;
    if (state.runtimeTicks !== undefined && state.runtimeTicks > 0 && estimate > state.runtimeTicks) {
      return null;
    }
    return estimate;
  }

  /**
   * Forward a report with the session's token. Resolves with what happened;
   * a rejected token retires the session.
   */
  private async relay(sessionId: string, report: PlaybackReport): Promise<RelayOutcome> {
    try {
      const session = await this.sessions.getSession(sessionId);
      if (!session) {
        this.log.warn('Playback relay skipped, session is not live', { sessionId, itemId: report.itemId });
        return 'skipped';
      }

      await this.jellyfin.reportProgress(sessionCredentials(session), report);
      return 'relayed';
    } catch (error) {
      if (error instanceof AuthExpiredError) {
        this.log.warn('Jellyfin rejected session token during playback relay', { sessionId });
        try {
          await this.sessions.invalidateSession(sessionId);
        } catch (invalidateError) {
          this.log.error('Failed to invalidate session', {
            sessionId,
            error: describeError(invalidateError),
          });
        }
        return 'session-expired';
      }

      this.log.error('Playback relay failed', {
        sessionId,
        itemId: report.itemId,
        kind: report.kind,
        error: describeError(error),
      });
      return 'failed';
    }
  }
}
