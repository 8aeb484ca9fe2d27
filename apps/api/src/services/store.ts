import {
  StoreUnavailableError,
  type SessionRepositoryPort,
  type StoreDiagnosticsPort,
  type TelemetryRepositoryPort,
} from '@rover/domain';

/** Repositories bound to one configured store. `null` wherever no store is configured. */
export interface RoverStore {
  sessions: SessionRepositoryPort;
  telemetry: TelemetryRepositoryPort;
  diagnostics: StoreDiagnosticsPort;
}

export function requireStore(store: RoverStore | null): RoverStore {
  if (!store) throw new StoreUnavailableError();
  return store;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
