/**
 * Source Accessor contracts
 *
 * A source driver resolves a layer inside a location (a GeoPackage file, a
 * shapefile directory) and hands out a forward-only cursor over its rows.
 */

import type { RawRecord } from '../core/types.js';

/**
 * Single-pass reader over the rows of one layer.
 *
 * Iterating a second time throws; re-reading requires opening again.
 * `close()` releases the underlying handle and may be called repeatedly.
 */
export interface FeatureCursor extends AsyncIterable<RawRecord> {
  /** Layer name the cursor reads */
  readonly layer: string;
  /** Attribute names in source order; the geometry column is not listed */
  readonly fields: readonly string[];
  close(): Promise<void>;
}

export interface FeatureSource {
  /** Driver name for logs */
  readonly driver: string;
  exists(location: string, identifier: string): Promise<boolean>;
  /**
   * @throws SourceNotFoundError when the layer does not exist; existence is
   * checked before the schema is read
   */
  open(location: string, identifier: string): Promise<FeatureCursor>;
  listLayers(location: string): Promise<string[]>;
}
