import type { TelemetrySnapshot } from '../../entities/telemetry-snapshot.js';
import type { StoredTelemetry } from '../../entities/stored-telemetry.js';

export interface TelemetryWindowQuery {
  /** Inclusive lower bound on `createdAt`; unbounded when omitted. */
  since?: Date;
  limit: number;
}

export interface TelemetryRepositoryPort {
  append(snapshot: TelemetrySnapshot, createdAt: Date): Promise<StoredTelemetry>;
  /** Newest `limit` documents in the window, returned oldest first. */
  readLatest(query: TelemetryWindowQuery): Promise<StoredTelemetry[]>;
  /** Every document created at or after `since`, oldest first. */
  readSince(since: Date): Promise<StoredTelemetry[]>;
}
