import type { GeoJsonObject, JsonValue } from '../types/nodes';

export function isJsonObject(value: unknown): value is GeoJsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Documents (floor maps, footprints, POI metadata) are stored as JSON
 * strings. Objects pass through; anything unparseable reads as null.
 */
export function parseJsonDocument(value: unknown): GeoJsonObject | null {
  if (value == null) return null;
  if (isJsonObject(value)) return value;
  if (typeof value !== 'string' || !value.trim()) return null;

  try {
    const parsed: unknown = JSON.parse(value);
    return isJsonObject(parsed) ? parsed : null;
  } catch (err) {
    console.warn('[store] Ignoring malformed JSON document:', err instanceof Error ? err.message : err);
    return null;
  }
}

export function parseMetadata(value: unknown): Record<string, JsonValue> {
  return parseJsonDocument(value) ?? {};
}
