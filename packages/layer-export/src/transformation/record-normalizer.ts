/**
 * Record Normalizer
 *
 * Converts one raw source row into the serialization-ready record model.
 * Pure: identical input always yields an identical record.
 */

import type { Geometry } from 'geojson';
import { GEOMETRY_KEY } from '../core/constants.js';
import type {
  FieldValue,
  JsonPrimitive,
  NormalizedRecord,
  RawField,
} from '../core/types.js';
import { formatTimestamp } from './timestamp.js';

/**
 * Convert a tagged field value to its JSON-safe form
 */
export function normalizeValue(value: FieldValue): JsonPrimitive {
  switch (value.kind) {
    case 'string':
    case 'number':
    case 'boolean':
      return value.value;
    case 'timestamp':
      return formatTimestamp(value.value);
    case 'null':
      return null;
  }
}

/**
 * Normalize one row. Field names and order are kept exactly as the source
 * reported them.
 */
export function normalizeRecord(
  fields: readonly RawField[],
  geometry: Geometry | null
): NormalizedRecord {
  return {
    properties: fields.map((field) => [field.name, normalizeValue(field.value)] as const),
    geometry,
  };
}

/**
 * Attribute pairs in order followed by the `geometry` pair
 */
export function recordEntries(
  record: NormalizedRecord
): Array<readonly [string, JsonPrimitive | Geometry]> {
  return [...record.properties, [GEOMETRY_KEY, record.geometry] as const];
}

/**
 * Column names a record produces: attributes then `geometry`
 */
export function recordKeys(record: NormalizedRecord): string[] {
  return [...record.properties.map(([name]) => name), GEOMETRY_KEY];
}
