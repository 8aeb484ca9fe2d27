import type { StoredTelemetry } from '@rover/domain';
import { readPath, type FieldPath } from './document-fields.js';

interface CsvColumn {
  header: string;
  path: FieldPath;
}

export const CSV_COLUMNS: readonly CsvColumn[] = [
  { header: 'timestamp', path: ['timestamp'] },
  { header: 'ambient_temp_c', path: ['environment', 'ambient_temp_c'] },
  { header: 'surface_temp_c', path: ['environment', 'surface_temp_c'] },
  { header: 'uv_index', path: ['environment', 'uv_index'] },
  { header: 'ir_mw_m2', path: ['environment', 'ir_mw_m2'] },
  { header: 'light_lux', path: ['environment', 'light_lux'] },
  { header: 'battery_pct', path: ['power', 'battery_pct'] },
  { header: 'battery_voltage', path: ['power', 'battery_voltage'] },
  { header: 'pitch', path: ['attitude', 'pitch'] },
  { header: 'roll', path: ['attitude', 'roll'] },
  { header: 'yaw', path: ['attitude', 'yaw'] },
  { header: 'lat', path: ['navigation', 'lat'] },
  { header: 'lon', path: ['navigation', 'lon'] },
  { header: 'speed_mps', path: ['navigation', 'speed_mps'] },
  { header: 'heading', path: ['navigation', 'heading'] },
  { header: 'target_azimuth', path: ['solar', 'target_azimuth'] },
  { header: 'panel_azimuth', path: ['solar', 'panel_azimuth'] },
  { header: 'danger_level', path: ['danger_level'] },
];

export const CSV_HEADER = [...CSV_COLUMNS.map((c) => c.header), 'created_at'].join(',');

/** Separators and line breaks are dropped so every row keeps its column count. */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
  if (typeof value === 'string') return value.replace(/,/g, '').replace(/[\r\n]+/g, ' ');
  if (typeof value === 'boolean') return String(value);
  return '';
}

export function formatCsvRow(item: StoredTelemetry): string {
  const cells = CSV_COLUMNS.map((c) => formatCell(readPath(item.document, c.path)));
  cells.push(item.createdAt.toISOString());
  return cells.join(',');
}

export function* csvLines(items: readonly StoredTelemetry[]): Generator<string> {
  yield `${CSV_HEADER}\n`;
  for (const item of items) {
    yield `${formatCsvRow(item)}\n`;
  }
}
