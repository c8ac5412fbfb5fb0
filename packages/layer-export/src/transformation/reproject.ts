/**
 * Geometry Normalizer
 *
 * Brings source geometries into EPSG:4326 as plain GeoJSON geometry objects.
 * Source drivers wrap their decoded geometry in `SourceGeometry`; the rest
 * of the pipeline only sees the `Reprojectable` capability.
 */

import type { Geometry, Position } from 'geojson';
import type { Reprojectable } from '../core/types.js';
import type { LazyTransform, PositionTransform } from './crs.js';

/**
 * Reproject every position of a geometry, preserving its structure
 */
export function reprojectGeometry(
  geometry: Geometry,
  transform: PositionTransform
): Geometry {
  const line = (coords: Position[]): Position[] => coords.map(transform);

  switch (geometry.type) {
    case 'Point':
      return { type: 'Point', coordinates: transform(geometry.coordinates) };

    case 'MultiPoint':
      return { type: 'MultiPoint', coordinates: line(geometry.coordinates) };

    case 'LineString':
      return { type: 'LineString', coordinates: line(geometry.coordinates) };

    case 'MultiLineString':
      return {
        type: 'MultiLineString',
        coordinates: geometry.coordinates.map(line),
      };

    case 'Polygon':
      return {
        type: 'Polygon',
        coordinates: geometry.coordinates.map(line),
      };

    case 'MultiPolygon':
      return {
        type: 'MultiPolygon',
        coordinates: geometry.coordinates.map((polygon) => polygon.map(line)),
      };

    case 'GeometryCollection':
      return {
        type: 'GeometryCollection',
        geometries: geometry.geometries.map((member) => reprojectGeometry(member, transform)),
      };
  }
}

/**
 * Adapter binding a decoded source geometry to its layer's CRS
 */
export class SourceGeometry implements Reprojectable {
  constructor(
    private readonly geometry: Geometry,
    private readonly transform: LazyTransform
  ) {}

  toTargetCRS(): Geometry {
    return reprojectGeometry(this.geometry, (position) => this.transform.forward(position));
  }
}

/**
 * Normalize a geometry handle. Records without geometry pass through as null.
 *
 * @throws ReprojectionError when the handle cannot be reprojected; this is
 * fatal for the whole export
 */
export function normalizeGeometry(handle: Reprojectable | null): Geometry | null {
  if (handle === null) {
    return null;
  }
  return handle.toTargetCRS();
}
