import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { ClockPort, RandomSourcePort } from '@rover/domain';
import {
  PgSessionRepository,
  PgStoreDiagnostics,
  PgTelemetryRepository,
  createSchemaGate,
  type DbPool,
  type SchemaGate,
} from '@rover/adapters';

import type { AppConfig } from './config/app-config.js';
import type { RoverStore } from './services/store.js';
import { TelemetrySynthesizer } from './services/telemetry/telemetry-synthesizer.js';
import { SessionRecorder } from './services/recording/session-recorder.service.js';
import { TelemetryQueryService } from './services/history/telemetry-query.service.js';
import { createRootRouter } from './controllers/root.controller.js';
import { createTelemetryRouter } from './controllers/telemetry.controller.js';
import { createSessionRouter } from './controllers/session.controller.js';
import { createExportRouter } from './controllers/export.controller.js';
import { createMetricsRouter } from './controllers/metrics.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppDeps {
  config: AppConfig;
  store: RoverStore | null;
  clock: ClockPort;
  random: RandomSourcePort;
}

/**
 * Binds the PostgreSQL repositories to a pool; no pool means no store.
 * Repositories create the schema before their first query.
 */
export function createPgStore(
  pool: DbPool | null,
  databaseName: string | null,
  schemaReady?: SchemaGate,
): RoverStore | null {
  if (!pool) return null;
  const ready = schemaReady ?? createSchemaGate(pool);
  return {
    sessions: new PgSessionRepository(pool, ready),
    telemetry: new PgTelemetryRepository(pool, ready),
    diagnostics: new PgStoreDiagnostics(pool, databaseName),
  };
}

export function buildApp({ config, store, clock, random }: AppDeps): ReturnType<typeof express> {
  const app = express();

  const synthesizer = new TelemetrySynthesizer({ clock, random, imageUrl: config.imageUrl });
  const recorder = new SessionRecorder(store, clock);
  const queries = new TelemetryQueryService(store, clock);

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: '*', methods: '*', allowedHeaders: '*' }));
  app.use(morgan('combined', { skip: () => process.env['NODE_ENV'] === 'test' }));
  app.use(express.json({ limit: '100kb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use(createRootRouter({ config, store, clock }));
  app.use('/api', createTelemetryRouter({ synthesizer, recorder, queries, imageUrl: config.imageUrl }));
  app.use('/api/session', createSessionRouter(recorder));
  app.use('/api/export', createExportRouter(queries));
  app.use('/api/metrics', createMetricsRouter(queries));

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
