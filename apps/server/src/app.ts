/**
 * Fastify application factory
 *
 * Takes fully constructed services so tests can build the app against an
 * in-memory store and a fake Jellyfin.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import helmet from '@fastify/helmet';
import sensible from '@fastify/sensible';
import cookie from '@fastify/cookie';
import rateLimit from '@fastify/rate-limit';

import type { KeyValueStore } from './db/store.js';
import type { AuthSessionManager } from './services/auth.js';
import type { HereSphereService } from './services/heresphere/service.js';
import type { JellyfinUpstream } from './services/mediaServer/types.js';
import validationPlugin from './plugins/validation.js';
import errorHandlerPlugin from './plugins/errorHandler.js';
import { dashboardRoutes } from './routes/dashboard.js';
import { heresphereRoutes } from './routes/heresphere.js';
import { healthRoutes } from './routes/health.js';

export interface AppServices {
  store: KeyValueStore;
  jellyfin: JellyfinUpstream;
  auth: AuthSessionManager;
  heresphere: HereSphereService;
}

export interface BuildAppOptions {
  services: AppServices;
  /** Signs browser cookies */
  cookieSecret: string;
  logger?: FastifyServerOptions['logger'];
  /** Requests per minute per client across all routes */
  rateLimitMax?: number;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { services } = options;

  const app = Fastify({
    logger: options.logger ?? false,
    // Links handed to the player are built from the forwarded host and proto
    trustProxy: true,
  });

  // Security plugins
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });
  await app.register(rateLimit, {
    max: options.rateLimitMax ?? 300,
    timeWindow: '1 minute',
  });

  // Utility plugins
  await app.register(sensible);
  await app.register(cookie, {
    secret: options.cookieSecret,
  });
  await app.register(validationPlugin);
  await app.register(errorHandlerPlugin);

  // Routes
  await app.register(healthRoutes, {
    prefix: '/health',
    store: services.store,
    jellyfin: services.jellyfin,
    auth: services.auth,
  });
  await app.register(dashboardRoutes, { auth: services.auth });
  await app.register(heresphereRoutes, { prefix: '/heresphere', heresphere: services.heresphere });

  return app;
}
