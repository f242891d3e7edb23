import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  initializeProgressEstimator,
  startProgressEstimator,
  stopProgressEstimator,
  triggerEstimate,
} from '../progressEstimator.js';
import { PlaybackTracker } from '../../services/playback.js';
import { silentLogger } from '../../utils/logger.js';
import { FakeJellyfin, createTestStore } from '../../test/fakes.js';

function createTracker() {
  const ctx = createTestStore();
  const tracker = new PlaybackTracker({
    store: ctx.store,
    jellyfin: new FakeJellyfin(),
    sessions: { getSession: async () => null, invalidateSession: async () => {} },
    logger: silentLogger,
  });
  return { ctx, tracker };
}

describe('progressEstimator', () => {
  afterEach(() => {
    stopProgressEstimator();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('runs an estimation pass on demand', async () => {
    const { ctx, tracker } = createTracker();
    const estimate = vi.spyOn(tracker, 'estimateProgress').mockResolvedValue(2);
    initializeProgressEstimator(tracker);

    await triggerEstimate();

    expect(estimate).toHaveBeenCalledTimes(1);
    ctx.handle.close();
  });

  it('keeps running after a failed pass', async () => {
    const { ctx, tracker } = createTracker();
    const estimate = vi
      .spyOn(tracker, 'estimateProgress')
      .mockRejectedValueOnce(new Error('store down'))
      .mockResolvedValueOnce(0);
    initializeProgressEstimator(tracker);

    await triggerEstimate();
    await triggerEstimate();

    expect(estimate).toHaveBeenCalledTimes(2);
    ctx.handle.close();
  });

  it('ticks on its interval only when enabled', async () => {
    vi.useFakeTimers();
    const { ctx, tracker } = createTracker();
    const estimate = vi.spyOn(tracker, 'estimateProgress').mockResolvedValue(0);
    initializeProgressEstimator(tracker);

    startProgressEstimator({ enabled: false, intervalMs: 1000 });
    await vi.advanceTimersByTimeAsync(3000);
    expect(estimate).not.toHaveBeenCalled();

    startProgressEstimator({ enabled: true, intervalMs: 1000 });
    await vi.advanceTimersByTimeAsync(3000);
    expect(estimate).toHaveBeenCalledTimes(3);

    stopProgressEstimator();
    await vi.advanceTimersByTimeAsync(3000);
    expect(estimate).toHaveBeenCalledTimes(3);
    ctx.handle.close();
  });
});
