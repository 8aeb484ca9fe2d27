/**
 * Persisted telemetry as read back from the store. The document is whatever
 * was written at the time, so nested fields are not guaranteed to be present
 * or numeric.
 */
export type TelemetryDocument = Record<string, unknown>;

export interface StoredTelemetry {
  readonly id: string;
  readonly document: TelemetryDocument;
  readonly createdAt: Date;
}
