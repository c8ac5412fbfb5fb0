/**
 * GeoPackage Source Driver
 *
 * Reads feature tables from an OGC GeoPackage (an SQLite file) through
 * better-sqlite3. The database is opened read-only and closed when the
 * cursor is closed.
 *
 * ARCHITECTURE:
 * - Layer lookup through gpkg_contents (data_type = 'features')
 * - Geometry column and srs_id from gpkg_geometry_columns
 * - CRS definition from gpkg_spatial_ref_sys
 * - Rows streamed with Statement.iterate() in raw (positional) mode
 */

import Database from 'better-sqlite3';
import { existsSync } from 'node:fs';
import { GEOMETRY_KEY } from '../core/constants.js';
import { SourceNotFoundError, SourceReadError } from '../core/errors.js';
import type { RawField, RawRecord } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { LazyTransform, type CoordinateReference } from '../transformation/crs.js';
import { SourceGeometry } from '../transformation/reproject.js';
import { hintFromDeclaredType, toFieldValue, type FieldHint } from './field-values.js';
import { decodeGeoPackageGeometry } from './geopackage-binary.js';
import type { FeatureCursor, FeatureSource } from './types.js';

const log = createLogger({ module: 'geopackage' });

// ============================================================================
// Database Row Types (internal)
// ============================================================================

interface ContentsRow {
  readonly table_name: string;
}

interface GeometryColumnRow {
  readonly column_name: string;
  readonly srs_id: number | bigint;
}

interface SpatialRefRow {
  readonly organization: string;
  readonly organization_coordsys_id: number | bigint;
  readonly definition: string;
}

interface TableInfoRow {
  readonly name: string;
  readonly type: string;
}

interface ColumnSpec {
  readonly name: string;
  readonly hint: FieldHint;
}

/**
 * Quote an SQLite identifier
 */
function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function findLayer(db: Database.Database, identifier: string): string | null {
  const row = db
    .prepare<[string], ContentsRow>(
      `SELECT table_name FROM gpkg_contents
       WHERE data_type = 'features' AND table_name = ? COLLATE NOCASE`
    )
    .get(identifier);
  return row?.table_name ?? null;
}

/**
 * Resolve the CRS a layer's geometries are stored in
 */
function readCoordinateReference(db: Database.Database, srsId: number): CoordinateReference {
  // -1 and 0 are the GeoPackage "undefined cartesian/geographic" systems
  if (srsId === -1 || srsId === 0) {
    return { kind: 'undefined', reason: `srs_id ${srsId}` };
  }

  const row = db
    .prepare<[number], SpatialRefRow>(
      `SELECT organization, organization_coordsys_id, definition
       FROM gpkg_spatial_ref_sys WHERE srs_id = ?`
    )
    .get(srsId);

  if (!row) {
    return { kind: 'undefined', reason: `srs_id ${srsId} missing from gpkg_spatial_ref_sys` };
  }

  const definition = row.definition.trim();
  const usableDefinition = definition !== '' && definition.toLowerCase() !== 'undefined';

  if (row.organization.toUpperCase() === 'EPSG') {
    return {
      kind: 'epsg',
      code: Number(row.organization_coordsys_id),
      ...(usableDefinition ? { definition } : {}),
    };
  }

  return usableDefinition
    ? { kind: 'definition', definition }
    : { kind: 'undefined', reason: `srs_id ${srsId} has no definition` };
}

// ============================================================================
// Cursor
// ============================================================================

class GeoPackageCursor implements FeatureCursor {
  readonly fields: readonly string[];
  private consumed = false;
  private closed = false;
  private rows: IterableIterator<unknown[]> | null = null;

  constructor(
    private readonly db: Database.Database,
    readonly layer: string,
    private readonly columns: readonly ColumnSpec[],
    private readonly geometryColumn: string,
    private readonly transform: LazyTransform
  ) {
    this.fields = columns.map((column) => column.name);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<RawRecord> {
    if (this.consumed) {
      throw new SourceReadError(`Cursor over '${this.layer}' has already been read`);
    }
    if (this.closed) {
      throw new SourceReadError(`Cursor over '${this.layer}' is closed`);
    }
    this.consumed = true;

    const selected = [...this.columns.map((c) => c.name), this.geometryColumn]
      .map(quoteIdentifier)
      .join(', ');
    const statement = this.db
      .prepare<[], unknown[]>(`SELECT ${selected} FROM ${quoteIdentifier(this.layer)}`)
      .raw(true)
      .safeIntegers(true);

    this.rows = statement.iterate();
    try {
      for (const row of this.rows) {
        yield this.toRecord(row);
      }
    } finally {
      this.rows.return?.();
      this.rows = null;
    }
  }

  private toRecord(row: unknown[]): RawRecord {
    const fields: RawField[] = this.columns.map((column, index) => ({
      name: column.name,
      value: toFieldValue(row[index], column.hint),
    }));

    const blob = row[this.columns.length];
    if (blob === null || blob === undefined) {
      return { fields, geometry: null };
    }
    if (!(blob instanceof Uint8Array)) {
      throw new SourceReadError(
        `Geometry column '${this.geometryColumn}' of '${this.layer}' holds a non-binary value`
      );
    }

    const { geometry } = decodeGeoPackageGeometry(blob);
    return {
      fields,
      geometry: geometry ? new SourceGeometry(geometry, this.transform) : null,
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.rows?.return?.();
    this.rows = null;
    this.db.close();
    log.debug('Closed GeoPackage', { layer: this.layer });
  }
}

// ============================================================================
// Driver
// ============================================================================

export class GeoPackageSource implements FeatureSource {
  readonly driver = 'geopackage';

  private openDatabase(location: string): Database.Database {
    return new Database(location, { readonly: true, fileMustExist: true });
  }

  async exists(location: string, identifier: string): Promise<boolean> {
    if (!existsSync(location)) return false;
    const db = this.openDatabase(location);
    try {
      return findLayer(db, identifier) !== null;
    } finally {
      db.close();
    }
  }

  async listLayers(location: string): Promise<string[]> {
    const db = this.openDatabase(location);
    try {
      return db
        .prepare<[], ContentsRow>(
          `SELECT table_name FROM gpkg_contents
           WHERE data_type = 'features' ORDER BY table_name`
        )
        .all()
        .map((row) => row.table_name);
    } finally {
      db.close();
    }
  }

  async open(location: string, identifier: string): Promise<FeatureCursor> {
    if (!existsSync(location)) {
      throw new SourceNotFoundError(location, identifier);
    }

    const db = this.openDatabase(location);
    try {
      const layer = findLayer(db, identifier);
      if (layer === null) {
        throw new SourceNotFoundError(location, identifier);
      }

      const geometryRow = db
        .prepare<[string], GeometryColumnRow>(
          `SELECT column_name, srs_id FROM gpkg_geometry_columns
           WHERE table_name = ? COLLATE NOCASE`
        )
        .get(layer);
      if (!geometryRow) {
        throw new SourceReadError(`Layer '${layer}' has no entry in gpkg_geometry_columns`);
      }

      const geometryColumn = geometryRow.column_name;
      const columns: ColumnSpec[] = db
        .prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdentifier(layer)})`)
        .all()
        .filter((column) => column.name.toLowerCase() !== geometryColumn.toLowerCase())
        .map((column) => ({ name: column.name, hint: hintFromDeclaredType(column.type) }));

      if (columns.some((column) => column.name === GEOMETRY_KEY)) {
        throw new SourceReadError(
          `Layer '${layer}' has an attribute named '${GEOMETRY_KEY}', which collides with the exported geometry`
        );
      }

      const crs = readCoordinateReference(db, Number(geometryRow.srs_id));
      log.info('Opened GeoPackage layer', {
        location,
        layer,
        fields: columns.length,
        geometryColumn,
        crs: crs.kind === 'epsg' ? `EPSG:${crs.code}` : crs.kind,
      });

      return new GeoPackageCursor(db, layer, columns, geometryColumn, new LazyTransform(crs));
    } catch (error) {
      db.close();
      throw error;
    }
  }
}
