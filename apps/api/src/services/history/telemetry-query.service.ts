import type { ClockPort, StoredTelemetry, TelemetryDocument } from '@rover/domain';
import { requireStore, type RoverStore } from '../store.js';
import { csvLines } from './csv-format.js';
import { readPath, toFiniteNumber, type FieldPath } from './document-fields.js';

export const SUMMARY_FIELDS = {
  ambient_temp_c: ['environment', 'ambient_temp_c'],
  surface_temp_c: ['environment', 'surface_temp_c'],
  uv_index: ['environment', 'uv_index'],
  light_lux: ['environment', 'light_lux'],
  battery_pct: ['power', 'battery_pct'],
  speed_mps: ['navigation', 'speed_mps'],
} as const satisfies Record<string, FieldPath>;

export type SummaryField = keyof typeof SUMMARY_FIELDS;

export interface FieldStats {
  min: number | null;
  max: number | null;
  avg: number | null;
}

export interface MetricsSummary {
  items: number;
  summary: Partial<Record<SummaryField, FieldStats>>;
}

export type HistoryItem = TelemetryDocument & { id: string; created_at: string };

export interface HistoryQuery {
  limit: number;
  minutes?: number;
}

export interface ExportQuery {
  limit: number;
  minutes?: number;
}

export function serializeStored(item: StoredTelemetry): HistoryItem {
  return {
    ...item.document,
    id: item.id,
    created_at: item.createdAt.toISOString(),
  };
}

export function summarizeField(items: readonly StoredTelemetry[], path: FieldPath): FieldStats {
  let count = 0;
  let total = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const item of items) {
    const v = toFiniteNumber(readPath(item.document, path));
    if (v === null) continue;
    count += 1;
    total += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  if (count === 0) return { min: null, max: null, avg: null };
  return { min, max, avg: Number((total / count).toFixed(2)) };
}

/** Read-only queries over persisted telemetry. All of them require a store. */
export class TelemetryQueryService {
  constructor(
    private readonly store: RoverStore | null,
    private readonly clock: ClockPort,
  ) {}

  private windowStart(minutes: number): Date {
    return new Date(this.clock.now().getTime() - minutes * 60_000);
  }

  /** Newest `limit` documents in the window, oldest first. */
  async history(query: HistoryQuery): Promise<HistoryItem[]> {
    const { telemetry } = requireStore(this.store);
    const items = await telemetry.readLatest({
      limit: query.limit,
      ...(query.minutes !== undefined && { since: this.windowStart(query.minutes) }),
    });
    return items.map(serializeStored);
  }

  /** Same selection as history, rendered as CSV lines (header first). */
  async exportCsv(query: ExportQuery): Promise<Iterable<string>> {
    const { telemetry } = requireStore(this.store);
    const items = await telemetry.readLatest({
      limit: query.limit,
      ...(query.minutes !== undefined && { since: this.windowStart(query.minutes) }),
    });
    return csvLines(items);
  }

  async metricsSummary(minutes: number): Promise<MetricsSummary> {
    const { telemetry } = requireStore(this.store);
    const items = await telemetry.readSince(this.windowStart(minutes));
    if (items.length === 0) return { items: 0, summary: {} };

    const summary: Partial<Record<SummaryField, FieldStats>> = {};
    for (const [field, path] of Object.entries(SUMMARY_FIELDS)) {
      if (isSummaryField(field)) summary[field] = summarizeField(items, path);
    }
    return { items: items.length, summary };
  }
}

function isSummaryField(field: string): field is SummaryField {
  return field in SUMMARY_FIELDS;
}
