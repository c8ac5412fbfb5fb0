/**
 * Layer Export Core Types
 *
 * Record model shared by the source drivers, the normalizers, the encoders
 * and the export orchestrator.
 *
 * TYPE SAFETY: Field values are a closed tagged union. Encoders and
 * normalizers switch on `kind`; nothing inspects raw runtime types past the
 * source boundary.
 */

import type { Geometry } from 'geojson';

// ============================================================================
// Export Formats
// ============================================================================

/**
 * Output formats the pipeline can write
 */
export type ExportFormat = 'csv' | 'json' | 'geojson';

// ============================================================================
// Field Values
// ============================================================================

/**
 * Date-time as the source stores it. Nothing is converted: a zone
 * designator the source wrote is carried along verbatim, and none is
 * inferred when it wrote none.
 */
export interface LocalDateTime {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  /** Fractional-second digits as stored, e.g. `'5'` or `'123456'` */
  readonly fraction?: string;
  /** `Z` or a UTC offset such as `+03:00`, as stored */
  readonly offset?: string;
}

export type FieldValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'timestamp'; readonly value: LocalDateTime }
  | { readonly kind: 'null' };

/**
 * One attribute of a raw record
 */
export interface RawField {
  readonly name: string;
  readonly value: FieldValue;
}

// ============================================================================
// Geometry
// ============================================================================

/**
 * Geometry handle produced by a source driver.
 *
 * The core only ever asks a handle for its EPSG:4326 rendition; the concrete
 * projection library stays behind the adapter.
 */
export interface Reprojectable {
  toTargetCRS(): Geometry;
}

// ============================================================================
// Records
// ============================================================================

/**
 * One row read from a source cursor: attributes in schema order plus at
 * most one geometry handle.
 */
export interface RawRecord {
  readonly fields: readonly RawField[];
  readonly geometry: Reprojectable | null;
}

/**
 * JSON-safe attribute value
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Serialization-ready record. `properties` keeps the schema order; the
 * geometry is always in EPSG:4326 (or null).
 */
export interface NormalizedRecord {
  readonly properties: ReadonlyArray<readonly [string, JsonPrimitive]>;
  readonly geometry: Geometry | null;
}

// ============================================================================
// Requests and Results
// ============================================================================

export interface ExportRequest {
  /** GeoPackage file or shapefile directory */
  readonly sourceLocation: string;
  /** Layer (feature table) name inside the location */
  readonly sourceIdentifier: string;
  readonly outputDirectory: string;
  readonly format: ExportFormat;
  /** File name without extension; derived from the identifier when absent */
  readonly outputName?: string;
}

export type ExportErrorKind =
  | 'MissingInput'
  | 'NotFound'
  | 'SourceReadFault'
  | 'WriteFault';

export type ExportResult =
  | {
      readonly status: 'succeeded';
      readonly outputPath: string;
      readonly format: ExportFormat;
      readonly recordCount: number;
    }
  | {
      readonly status: 'empty';
      readonly sourceIdentifier: string;
    }
  | {
      readonly status: 'failed';
      readonly error: {
        readonly kind: ExportErrorKind;
        readonly message: string;
      };
    };

/**
 * Orchestrator phases, in the order an export moves through them
 */
export type ExportPhase =
  | 'idle'
  | 'validating'
  | 'reading'
  | 'normalizing'
  | 'encoding'
  | 'writing'
  | 'succeeded'
  | 'failed';
