/**
 * Coordinate reference resolution
 *
 * Turns what a source declares about its CRS into a position transform
 * targeting EPSG:4326. Resolution is lazy: a layer whose CRS is unusable
 * only fails once a non-null geometry actually needs reprojecting.
 */

import proj4 from 'proj4';
import type { Position } from 'geojson';
import { TARGET_CRS, TARGET_EPSG_CODE } from '../core/constants.js';
import { ReprojectionError, errorMessage } from '../core/errors.js';

/**
 * What a source knows about its coordinate reference system
 */
export type CoordinateReference =
  | {
      readonly kind: 'epsg';
      readonly code: number;
      /** Stored definition (WKT or proj string), used when proj4 lacks the code */
      readonly definition?: string;
    }
  | { readonly kind: 'definition'; readonly definition: string }
  | { readonly kind: 'undefined'; readonly reason: string };

export type PositionTransform = (position: Position) => Position;

/** The part of a proj4 converter used here */
interface Converter {
  forward(coordinates: number[]): number[];
}

/**
 * Describe a CRS for logs and error messages
 */
export function describeCrs(crs: CoordinateReference): string {
  switch (crs.kind) {
    case 'epsg':
      return `EPSG:${crs.code}`;
    case 'definition':
      return crs.definition.length > 60 ? `${crs.definition.slice(0, 57)}...` : crs.definition;
    case 'undefined':
      return `undefined (${crs.reason})`;
  }
}

function identity(position: Position): Position {
  return position;
}

function converterFor(source: string, label: string): Converter {
  try {
    return proj4(source, TARGET_CRS);
  } catch (error) {
    throw new ReprojectionError(
      `Cannot build transform from ${label} to ${TARGET_CRS}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Build the transform for a CRS.
 *
 * @throws ReprojectionError when the CRS is undefined or proj4 rejects it
 */
export function createTransform(crs: CoordinateReference): PositionTransform {
  let converter: Converter;

  switch (crs.kind) {
    case 'undefined':
      throw new ReprojectionError(
        `Source coordinate reference is undefined (${crs.reason}); refusing to export unprojected coordinates`
      );

    case 'epsg': {
      if (crs.code === TARGET_EPSG_CODE) {
        return identity;
      }
      const code = `EPSG:${crs.code}`;
      if (proj4.defs(code)) {
        converter = converterFor(code, code);
      } else if (crs.definition) {
        converter = converterFor(crs.definition, code);
      } else {
        throw new ReprojectionError(`No projection definition available for ${code}`);
      }
      break;
    }

    case 'definition':
      converter = converterFor(crs.definition, describeCrs(crs));
      break;
  }

  const label = describeCrs(crs);
  return (position: Position): Position => {
    const projected = converter.forward([...position]);
    if (!projected.every((n) => Number.isFinite(n))) {
      throw new ReprojectionError(
        `Reprojecting [${position.join(', ')}] from ${label} produced non-finite coordinates`
      );
    }
    return projected;
  };
}

/**
 * Memoizing wrapper so a cursor resolves its CRS once, on first use
 */
export class LazyTransform {
  private transform: PositionTransform | null = null;

  constructor(public readonly crs: CoordinateReference) {}

  forward(position: Position): Position {
    if (!this.transform) {
      this.transform = createTransform(this.crs);
    }
    return this.transform(position);
  }
}
