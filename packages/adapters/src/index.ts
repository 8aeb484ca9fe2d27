// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export {
  initPool,
  closePool,
  withTransaction,
  guardStore,
} from './postgres/pool.js';
export type { DbPool, DbClient, StoreSettings } from './postgres/pool.js';
export { ensureSchema, createSchemaGate, STORE_SCHEMA } from './postgres/schema.js';
export type { SchemaGate } from './postgres/schema.js';
export { PgSessionRepository } from './postgres/session.repository.js';
export { PgTelemetryRepository } from './postgres/telemetry.repository.js';
export { PgStoreDiagnostics } from './postgres/store-diagnostics.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export {
  DeterministicClock,
  SeededRng,
  systemClock,
  mathRandomSource,
} from './clock/deterministic-clock.js';
