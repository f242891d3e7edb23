/**
 * Background job that keeps Jellyfin's view of in-progress playback current.
 *
 * HereSphere only calls back on open, play, pause and close, so without this
 * Jellyfin would see a position frozen at the last event.
 */

import type { PlaybackTracker } from '../services/playback.js';
import { describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('progress-estimator');

let estimatorInterval: NodeJS.Timeout | null = null;
let tracker: PlaybackTracker | null = null;
let running = false;

export interface ProgressEstimatorConfig {
  enabled: boolean;
  intervalMs: number;
}

const defaultConfig: ProgressEstimatorConfig = {
  enabled: false,
  intervalMs: 30_000,
};

/**
 * Relay estimated positions for every playing item
 */
async function estimate(): Promise<void> {
  if (!tracker || running) return;
  running = true;
  try {
    const relayed = await tracker.estimateProgress();
    if (relayed > 0) log.info('Updated playback positions', { relayed });
  } catch (error) {
    log.error('Progress estimation failed', { error: describeError(error) });
  } finally {
    running = false;
  }
}

export function initializeProgressEstimator(playbackTracker: PlaybackTracker): void {
  tracker = playbackTracker;
}

/**
 * Start the estimator job
 */
export function startProgressEstimator(config: Partial<ProgressEstimatorConfig> = {}): void {
  const mergedConfig = { ...defaultConfig, ...config };

  if (!mergedConfig.enabled) {
    log.info('Progress estimator disabled');
    return;
  }

  if (estimatorInterval) {
    log.warn('Progress estimator already running');
    return;
  }

  log.info(`Starting progress estimator with ${mergedConfig.intervalMs}ms interval`);
  estimatorInterval = setInterval(() => void estimate(), mergedConfig.intervalMs);
}

/**
 * Stop the estimator job
 */
export function stopProgressEstimator(): void {
  if (estimatorInterval) {
    clearInterval(estimatorInterval);
    estimatorInterval = null;
    log.info('Progress estimator stopped');
  }
}

/**
 * Force an immediate estimation pass
 */
export async function triggerEstimate(): Promise<void> {
  await estimate();
}
