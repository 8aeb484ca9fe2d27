import pg from 'pg';
import { StoreOperationFailedError } from '@rover/domain';

const { Pool } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;

export interface StoreSettings {
  connectionString: string;
  /** Overrides the database named in the connection string. */
  databaseName?: string;
  timeoutMs: number;
}

let _pool: pg.Pool | null = null;

export function createPool(settings: StoreSettings): pg.Pool {
  const pool = new Pool({
    connectionString: settings.connectionString,
    ...(settings.databaseName ? { database: settings.databaseName } : {}),
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: settings.timeoutMs,
    query_timeout: settings.timeoutMs,
    application_name: 'rover-telemetry-api',
  });
  pool.on('error', (err) => {
    console.error('[pg-pool] unexpected error on idle client', err);
  });
  return pool;
}

/** Creates the process-wide pool. Without settings no store is configured. */
export function initPool(settings: StoreSettings | null): pg.Pool | null {
  _pool = settings ? createPool(settings) : null;
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}

/**
 * Run a callback inside a transaction; rolls back on error. A failed
 * transaction hands its error to `release` so pg discards the connection.
 */
export async function withTransaction<T>(
  pool: DbPool,
  fn: (client: DbClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  let failure: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    failure = err instanceof Error ? err : new Error(String(err));
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      console.warn(
        '[pg-pool] rollback failed',
        rollbackErr instanceof Error ? rollbackErr.message : rollbackErr,
      );
    }
    throw err;
  } finally {
    client.release(failure);
  }
}

/** Rethrows any driver error as a StoreOperationFailedError. */
export async function guardStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new StoreOperationFailedError(operation, err);
  }
}
