import type {
  StoredTelemetry,
  TelemetryDocument,
  TelemetryRepositoryPort,
  TelemetrySnapshot,
  TelemetryWindowQuery,
} from '@rover/domain';
import { guardStore, type DbPool } from './pool.js';
import type { SchemaGate } from './schema.js';

type TelemetryRow = {
  id: string;
  document: TelemetryDocument | null;
  created_at: Date;
};

const TELEMETRY_COLUMNS = `id::text AS id, document, created_at`;

export class PgTelemetryRepository implements TelemetryRepositoryPort {
  constructor(
    private readonly pool: DbPool,
    private readonly schemaReady: SchemaGate = async () => {},
  ) {}

  async append(snapshot: TelemetrySnapshot, createdAt: Date): Promise<StoredTelemetry> {
    return guardStore('telemetry insert', async () => {
      await this.schemaReady();
      const { rows } = await this.pool.query<TelemetryRow>(
        `INSERT INTO rover.telemetry (document, created_at)
         VALUES ($1::jsonb, $2)
         RETURNING ${TELEMETRY_COLUMNS}`,
        [JSON.stringify(snapshot), createdAt],
      );
      const row = rows[0];
      if (!row) throw new Error('telemetry insert returned no row');
      return mapTelemetryRow(row);
    });
  }

  async readLatest(query: TelemetryWindowQuery): Promise<StoredTelemetry[]> {
    return guardStore('telemetry history query', async () => {
      await this.schemaReady();
      const params: unknown[] = [];
      let where = '';
      if (query.since) {
        params.push(query.since);
        where = `WHERE created_at >= $1`;
      }
      params.push(query.limit);
      const { rows } = await this.pool.query<TelemetryRow>(
        `SELECT * FROM (
           SELECT ${TELEMETRY_COLUMNS}
           FROM rover.telemetry
           ${where}
           ORDER BY created_at DESC, telemetry.id DESC
           LIMIT $${params.length}
         ) t ORDER BY created_at ASC, id::bigint ASC`,
        params,
      );
      return rows.map(mapTelemetryRow);
    });
  }

  async readSince(since: Date): Promise<StoredTelemetry[]> {
    return guardStore('telemetry window query', async () => {
      await this.schemaReady();
      const { rows } = await this.pool.query<TelemetryRow>(
        `SELECT ${TELEMETRY_COLUMNS}
         FROM rover.telemetry
         WHERE created_at >= $1
         ORDER BY created_at ASC, telemetry.id ASC`,
        [since],
      );
      return rows.map(mapTelemetryRow);
    });
  }
}

function mapTelemetryRow(row: TelemetryRow): StoredTelemetry {
  return {
    id: row.id,
    document: row.document ?? {},
    createdAt: row.created_at,
  };
}
