/**
 * Type Guards for Layer Export
 *
 * Runtime narrowing for values that arrive untyped: decoded geometries,
 * CLI strings and configuration file contents.
 */

import type { Geometry, Position } from 'geojson';
import { EXPORT_FORMATS } from './constants.js';
import type { ExportFormat } from './types.js';

/**
 * Type guard for export formats
 */
export function isExportFormat(value: unknown): value is ExportFormat {
  return typeof value === 'string' && EXPORT_FORMATS.some((format) => format === value);
}

/**
 * Type guard for a GeoJSON position: two or more finite numbers
 */
export function isPosition(value: unknown): value is Position {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    value.every((n) => typeof n === 'number' && Number.isFinite(n))
  );
}

function isNested(value: unknown, depth: number): boolean {
  if (depth === 0) return isPosition(value);
  return Array.isArray(value) && value.every((item) => isNested(item, depth - 1));
}

/**
 * Coordinate nesting depth per geometry type (0 = a single position)
 */
const COORDINATE_DEPTH: Readonly<Record<string, number>> = {
  Point: 0,
  MultiPoint: 1,
  LineString: 1,
  MultiLineString: 2,
  Polygon: 2,
  MultiPolygon: 3,
};

/**
 * Type guard for GeoJSON geometry
 *
 * Validates the type tag and the coordinate nesting, recursing into
 * GeometryCollection members.
 */
export function isGeometry(value: unknown): value is Geometry {
  if (value === null || typeof value !== 'object') return false;
  if (!('type' in value) || typeof value.type !== 'string') return false;

  if (value.type === 'GeometryCollection') {
    return (
      'geometries' in value &&
      Array.isArray(value.geometries) &&
      value.geometries.every(isGeometry)
    );
  }

  const depth = COORDINATE_DEPTH[value.type];
  if (depth === undefined) return false;

  return 'coordinates' in value && isNested(value.coordinates, depth);
}
