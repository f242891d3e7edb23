/**
 * Health routes
 *
 * /health is liveness only and touches nothing. /health/ready checks the
 * store and Jellyfin and answers 503 when either is down.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { ReadinessReport } from '@spherebridge/shared';
import type { KeyValueStore } from '../db/store.js';
import type { AuthSessionManager } from '../services/auth.js';
import type { JellyfinUpstream } from '../services/mediaServer/types.js';
import { describeError } from '../utils/errors.js';

export interface HealthRouteOptions {
  store: KeyValueStore;
  jellyfin: JellyfinUpstream;
  auth: AuthSessionManager;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app, opts) => {
  const { store, jellyfin, auth } = opts;

  app.get('/', async () => ({ status: 'ok' }));

  app.get('/ready', async (request, reply) => {
    const [storeUp, jellyfinUp] = await Promise.all([store.ping(), jellyfin.ping()]);

    let sessions = 0;
    if (storeUp) {
      try {
        sessions = await auth.countSessions();
      } catch (error) {
        request.log.warn({ error: describeError(error) }, 'Failed to count sessions');
      }
    }

    const report: ReadinessReport = {
      status: storeUp && jellyfinUp ? 'ok' : 'degraded',
      store: storeUp,
      jellyfin: jellyfinUp,
      sessions,
    };
    return reply.status(report.status === 'ok' ? 200 : 503).send(report);
  });
};
