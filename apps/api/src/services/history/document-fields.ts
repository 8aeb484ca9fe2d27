import type { TelemetryDocument } from '@rover/domain';

export type FieldPath = readonly string[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Walks nested objects; any missing or non-object hop yields undefined. */
export function readPath(doc: TelemetryDocument, path: FieldPath): unknown {
  let current: unknown = doc;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** Numbers and numeric strings; everything else (including '') is null. */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
