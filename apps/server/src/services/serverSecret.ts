/**
 * Server secret used to sign cookies and HereSphere auth tokens.
 *
 * An explicit SESSION_SECRET wins. Otherwise one is generated on first start
 * and kept in the store, so issued tokens survive restarts.
 */

import type { KeyValueStore } from '../db/store.js';
import { MetaRecordType } from '../db/records.js';
import { ConflictError } from '../utils/errors.js';
import { generateSecret } from '../utils/crypto.js';
import { createLogger } from '../utils/logger.js';

const SECRET_KEY = 'session_secret';

const log = createLogger('secret');

export async function resolveServerSecret(store: KeyValueStore, configured?: string): Promise<string> {
  if (configured) return configured;

  const existing = await store.get(MetaRecordType, SECRET_KEY);
  if (existing) return existing.value.value;

  try {
    const created = await store.compareAndSwap(MetaRecordType, SECRET_KEY, null, { value: generateSecret() });
    log.info('Generated server secret');
    return created.value.value;
  } catch (error) {
    if (!(error instanceof ConflictError)) throw error;
    // Another process created it first
    const winner = await store.get(MetaRecordType, SECRET_KEY);
    if (!winner) throw error;
    return winner.value.value;
  }
}
