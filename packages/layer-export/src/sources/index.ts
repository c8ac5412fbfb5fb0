/**
 * Source driver resolution
 */

import { extname } from 'node:path';
import { GeoPackageSource } from './geopackage-source.js';
import { ShapefileSourceDriver } from './shapefile-source.js';
import type { FeatureSource } from './types.js';

/**
 * Pick the driver for a source location: `*.gpkg` files are GeoPackages,
 * anything else is read as a directory of shapefiles
 */
export function resolveSource(location: string): FeatureSource {
  return extname(location).toLowerCase() === '.gpkg'
    ? new GeoPackageSource()
    : new ShapefileSourceDriver();
}

export { GeoPackageSource } from './geopackage-source.js';
export { ShapefileSourceDriver } from './shapefile-source.js';
export { decodeGeoPackageGeometry, encodeGeoPackageGeometry } from './geopackage-binary.js';
export { toFieldValue, hintFromDeclaredType } from './field-values.js';
export type { FieldHint } from './field-values.js';
export type { FeatureCursor, FeatureSource } from './types.js';
