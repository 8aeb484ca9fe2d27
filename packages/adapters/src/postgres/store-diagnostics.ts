import type { StoreDiagnosticsPort } from '@rover/domain';
import { guardStore, type DbPool } from './pool.js';
import { STORE_SCHEMA } from './schema.js';

export class PgStoreDiagnostics implements StoreDiagnosticsPort {
  constructor(
    private readonly pool: DbPool,
    readonly databaseName: string | null,
  ) {}

  async listCollections(limit: number): Promise<string[]> {
    return guardStore('collection listing', async () => {
      const { rows } = await this.pool.query<{ table_name: string }>(
        `SELECT table_name
         FROM information_schema.tables
         WHERE table_schema = $1
         ORDER BY table_name
         LIMIT $2`,
        [STORE_SCHEMA, limit],
      );
      return rows.map((r) => r.table_name);
    });
  }
}
