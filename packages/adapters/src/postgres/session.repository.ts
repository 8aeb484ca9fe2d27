import type {
  NewRecordingSession,
  RecordingSession,
  SessionRepositoryPort,
} from '@rover/domain';
import { guardStore, withTransaction, type DbPool } from './pool.js';
import type { SchemaGate } from './schema.js';

type SessionRow = {
  id: string;
  active: boolean;
  started_at: Date;
  ended_at: Date | null;
  note: string | null;
};

const SESSION_COLUMNS = `id::text AS id, active, started_at, ended_at, note`;

export class PgSessionRepository implements SessionRepositoryPort {
  constructor(
    private readonly pool: DbPool,
    private readonly schemaReady: SchemaGate = async () => {},
  ) {}

  async replaceActive(session: NewRecordingSession): Promise<RecordingSession> {
    return guardStore('session start', async () => {
      await this.schemaReady();
      return withTransaction(this.pool, async (client) => {
        await client.query(
          `UPDATE rover.sessions
           SET active = FALSE, ended_at = $1
           WHERE active = TRUE`,
          [session.startedAt],
        );
        const { rows } = await client.query<SessionRow>(
          `INSERT INTO rover.sessions (active, started_at, note)
           VALUES (TRUE, $1, $2)
           RETURNING ${SESSION_COLUMNS}`,
          [session.startedAt, session.note],
        );
        const row = rows[0];
        if (!row) throw new Error('session insert returned no row');
        return mapSessionRow(row);
      });
    });
  }

  async deactivateAll(endedAt: Date): Promise<number> {
    return guardStore('session stop', async () => {
      await this.schemaReady();
      const result = await this.pool.query(
        `UPDATE rover.sessions
         SET active = FALSE, ended_at = $1
         WHERE active = TRUE`,
        [endedAt],
      );
      return result.rowCount ?? 0;
    });
  }

  async findActive(): Promise<RecordingSession | null> {
    return guardStore('active session lookup', async () => {
      await this.schemaReady();
      const { rows } = await this.pool.query<SessionRow>(
        `SELECT ${SESSION_COLUMNS}
         FROM rover.sessions
         WHERE active = TRUE
         ORDER BY started_at DESC
         LIMIT 1`,
      );
      return rows[0] ? mapSessionRow(rows[0]) : null;
    });
  }
}

function mapSessionRow(row: SessionRow): RecordingSession {
  return {
    id: row.id,
    active: row.active,
    startedAt: row.started_at,
    ...(row.ended_at && { endedAt: row.ended_at }),
    note: row.note ?? '',
  };
}
