import 'dotenv/config';

import { loadConfig } from './config.js';
import { buildApp } from './app.js';
import { openDatabase } from './db/client.js';
import { SqliteStore } from './db/store.js';
import { JellyfinClient } from './services/mediaServer/jellyfin/client.js';
import { AuthSessionManager } from './services/auth.js';
import { PlaybackTracker } from './services/playback.js';
import { createLibraryCache } from './services/cache.js';
import { HereSphereService } from './services/heresphere/service.js';
import { resolveServerSecret } from './services/serverSecret.js';
import {
  initializeProgressEstimator,
  startProgressEstimator,
  stopProgressEstimator,
} from './jobs/progressEstimator.js';
import { initializeLoginSweeper, startLoginSweeper, stopLoginSweeper } from './jobs/loginSweeper.js';

async function start() {
  const config = loadConfig();

  const database = openDatabase(config.dataPath);
  const store = new SqliteStore(database.db);
  const secret = await resolveServerSecret(store, config.sessionSecret);

  const jellyfin = new JellyfinClient({
    hosts: { internalUrl: config.jellyfin.internalUrl, publicUrl: config.jellyfin.publicUrl },
    timeoutMs: config.jellyfin.timeoutMs,
    pageSize: config.jellyfin.pageSize,
  });
  const auth = new AuthSessionManager({
    store,
    jellyfin,
    tokenSecret: secret,
    quickConnectTtlMs: config.quickConnectTtlMs,
  });
  const tracker = new PlaybackTracker({ store, jellyfin, sessions: auth });
  const heresphere = new HereSphereService({
    auth,
    jellyfin,
    tracker,
    cache: createLibraryCache({ ttlMs: config.libraryCacheTtlMs }),
    subtitleLanguage: config.subtitleLanguage,
  });

  const app = await buildApp({
    services: { store, jellyfin, auth, heresphere },
    cookieSecret: secret,
    logger: {
      level: config.logLevel,
      transport: config.isDevelopment ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
    },
  });

  initializeProgressEstimator(tracker);
  startProgressEstimator({ enabled: config.watchtimeTracking, intervalMs: config.progressIntervalMs });
  initializeLoginSweeper(auth);
  startLoginSweeper();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    app.log.info(`Received ${signal}, shutting down`);
    stopProgressEstimator();
    stopLoginSweeper();
    try {
      await app.close();
    } finally {
      database.close();
    }
  };
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('Shutdown failed:', err);
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info(`SphereBridge running at http://${config.server.host}:${config.server.port}`);
}

start().catch((err: unknown) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
