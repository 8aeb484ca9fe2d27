import type { DbPool } from './pool.js';

export const STORE_SCHEMA = 'rover';

const SCHEMA_STATEMENTS = [
  `CREATE SCHEMA IF NOT EXISTS ${STORE_SCHEMA}`,
  `CREATE TABLE IF NOT EXISTS ${STORE_SCHEMA}.sessions (
     id          BIGSERIAL PRIMARY KEY,
     active      BOOLEAN     NOT NULL DEFAULT TRUE,
     started_at  TIMESTAMPTZ NOT NULL,
     ended_at    TIMESTAMPTZ,
     note        TEXT        NOT NULL DEFAULT ''
   )`,
  `CREATE INDEX IF NOT EXISTS sessions_active_idx ON ${STORE_SCHEMA}.sessions (active) WHERE active`,
  `CREATE TABLE IF NOT EXISTS ${STORE_SCHEMA}.telemetry (
     id          BIGSERIAL PRIMARY KEY,
     document    JSONB       NOT NULL,
     created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
   )`,
  `CREATE INDEX IF NOT EXISTS telemetry_created_at_idx ON ${STORE_SCHEMA}.telemetry (created_at DESC)`,
];

/** Creates the schema, tables and indexes if missing. Idempotent. */
export async function ensureSchema(pool: DbPool): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await pool.query(statement);
  }
}

export type SchemaGate = () => Promise<void>;

/**
 * Runs `ensureSchema` once per pool. A failed attempt is forgotten so the
 * next caller retries, which lets the API start before the database does.
 */
export function createSchemaGate(pool: DbPool): SchemaGate {
  let pending: Promise<void> | null = null;
  return () => {
    if (!pending) {
      pending = ensureSchema(pool).catch((err: unknown) => {
        pending = null;
        throw err;
      });
    }
    return pending;
  };
}
