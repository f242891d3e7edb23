/**
 * Background job that clears finished QuickConnect requests, so an approved
 * request's plaintext password does not outlive its reveal window when the
 * browser never comes back.
 */

import type { AuthSessionManager } from '../services/auth.js';
import { describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('login-sweeper');

let sweepInterval: NodeJS.Timeout | null = null;
let authManager: AuthSessionManager | null = null;
let running = false;

export interface LoginSweeperConfig {
  intervalMs: number;
}

const defaultConfig: LoginSweeperConfig = {
  intervalMs: 60_000,
};

async function sweep(): Promise<void> {
  if (!authManager || running) return;
  running = true;
  try {
    await authManager.sweepLoginRequests();
  } catch (error) {
    log.error('QuickConnect sweep failed', { error: describeError(error) });
  } finally {
    running = false;
  }
}

export function initializeLoginSweeper(auth: AuthSessionManager): void {
  authManager = auth;
}

export function startLoginSweeper(config: Partial<LoginSweeperConfig> = {}): void {
  const mergedConfig = { ...defaultConfig, ...config };

  if (sweepInterval) {
    log.warn('Login sweeper already running');
    return;
  }

  log.info(`Starting login sweeper with ${mergedConfig.intervalMs}ms interval`);
  sweepInterval = setInterval(() => void sweep(), mergedConfig.intervalMs);
}

export function stopLoginSweeper(): void {
  if (sweepInterval) {
    clearInterval(sweepInterval);
    sweepInterval = null;
    log.info('Login sweeper stopped');
  }
}

/**
 * Force an immediate sweep
 */
export async function triggerSweep(): Promise<void> {
  await sweep();
}
