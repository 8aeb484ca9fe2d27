import 'dotenv/config';
import { createServer } from 'http';
import {
  closePool,
  createSchemaGate,
  initPool,
  mathRandomSource,
  systemClock,
} from '@rover/adapters';
import { buildApp, createPgStore } from './app.js';
import { loadAppConfig } from './config/app-config.js';

async function main() {
  const config = loadAppConfig();

  const pool = initPool(config.store);
  const schemaReady = pool ? createSchemaGate(pool) : undefined;
  if (schemaReady) {
    // Non-fatal: telemetry is served even when the store is down
    try {
      await schemaReady();
      console.log('[schema] store schema ready');
    } catch (err) {
      console.warn(
        '[schema] ⚠ store unreachable on startup, retrying on the next store call.',
        err instanceof Error ? err.message : err,
      );
    }
  } else {
    console.warn('[server] DATABASE_URL not set, running without a store');
  }

  const store = createPgStore(pool, config.store?.databaseName ?? null, schemaReady);
  const app = buildApp({ config, store, clock: systemClock, random: mathRandomSource });
  const httpServer = createServer(app);

  httpServer.listen(config.port, config.host, () => {
    console.log(`[server] listening on http://${config.host}:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
