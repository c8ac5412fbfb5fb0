/**
 * Test fixtures: GeoPackage files built on the fly with better-sqlite3
 */

import Database from 'better-sqlite3';
import type { Geometry } from 'geojson';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { encodeGeoPackageGeometry } from '../../sources/geopackage-binary.js';

export const WGS84_WKT =
  'GEOGCS["WGS 84",DATUM["WGS_1984",SPHEROID["WGS 84",6378137,298.257223563]],' +
  'PRIMEM["Greenwich",0],UNIT["degree",0.0174532925199433]]';

export interface FixtureColumn {
  readonly name: string;
  readonly type: string;
}

export interface FixtureRow {
  /** One value per column, bindable by better-sqlite3 */
  readonly values: ReadonlyArray<string | number | bigint | Buffer | null>;
  readonly geometry: Geometry | null;
}

export interface FixtureLayer {
  readonly name: string;
  readonly columns: readonly FixtureColumn[];
  readonly rows: readonly FixtureRow[];
  readonly srsId?: number;
  readonly geometryColumn?: string;
}

export interface FixtureSrs {
  readonly srsId: number;
  readonly organization: string;
  readonly code: number;
  readonly definition: string;
}

const DEFAULT_SRS: readonly FixtureSrs[] = [
  { srsId: -1, organization: 'NONE', code: -1, definition: 'undefined' },
  { srsId: 0, organization: 'NONE', code: 0, definition: 'undefined' },
  { srsId: 4326, organization: 'EPSG', code: 4326, definition: WGS84_WKT },
  { srsId: 3857, organization: 'EPSG', code: 3857, definition: 'undefined' },
];

function quote(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Write a GeoPackage holding the given feature layers
 */
export function createGeoPackage(
  path: string,
  layers: readonly FixtureLayer[],
  extraSrs: readonly FixtureSrs[] = []
): void {
  const db = new Database(path);
  try {
    db.exec(`
      CREATE TABLE gpkg_spatial_ref_sys (
        srs_name TEXT NOT NULL,
        srs_id INTEGER NOT NULL PRIMARY KEY,
        organization TEXT NOT NULL,
        organization_coordsys_id INTEGER NOT NULL,
        definition TEXT NOT NULL,
        description TEXT
      );
      CREATE TABLE gpkg_contents (
        table_name TEXT NOT NULL PRIMARY KEY,
        data_type TEXT NOT NULL,
        identifier TEXT UNIQUE,
        description TEXT DEFAULT '',
        last_change DATETIME NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
        srs_id INTEGER
      );
      CREATE TABLE gpkg_geometry_columns (
        table_name TEXT NOT NULL,
        column_name TEXT NOT NULL,
        geometry_type_name TEXT NOT NULL,
        srs_id INTEGER NOT NULL,
        z TINYINT NOT NULL,
        m TINYINT NOT NULL,
        CONSTRAINT pk_geom_cols PRIMARY KEY (table_name, column_name)
      );
    `);

    const insertSrs = db.prepare(
      `INSERT INTO gpkg_spatial_ref_sys
       (srs_name, srs_id, organization, organization_coordsys_id, definition)
       VALUES (?, ?, ?, ?, ?)`
    );
    for (const srs of [...DEFAULT_SRS, ...extraSrs]) {
      insertSrs.run(`srs ${srs.srsId}`, srs.srsId, srs.organization, srs.code, srs.definition);
    }

    for (const layer of layers) {
      const srsId = layer.srsId ?? 4326;
      const geometryColumn = layer.geometryColumn ?? 'geom';
      const columnSql = [
        ...layer.columns.map((column) => `${quote(column.name)} ${column.type}`),
        `${quote(geometryColumn)} GEOMETRY`,
      ].join(', ');

      db.exec(`CREATE TABLE ${quote(layer.name)} (${columnSql})`);
      db.prepare(
        `INSERT INTO gpkg_contents (table_name, data_type, identifier, srs_id)
         VALUES (?, 'features', ?, ?)`
      ).run(layer.name, layer.name, srsId);
      db.prepare(
        `INSERT INTO gpkg_geometry_columns
         (table_name, column_name, geometry_type_name, srs_id, z, m)
         VALUES (?, ?, 'GEOMETRY', ?, 0, 0)`
      ).run(layer.name, geometryColumn, srsId);

      const placeholders = [...layer.columns, null].map(() => '?').join(', ');
      const insertRow = db.prepare(`INSERT INTO ${quote(layer.name)} VALUES (${placeholders})`);
      for (const row of layer.rows) {
        const blob = row.geometry ? encodeGeoPackageGeometry(row.geometry, srsId) : null;
        insertRow.run(...row.values, blob);
      }
    }
  } finally {
    db.close();
  }
}

/**
 * Temporary directory removed by the returned cleanup function
 */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'layer-export-test-'));
  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * The single-record layer used by the end-to-end scenarios
 */
export const LANDMARK_LAYER: FixtureLayer = {
  name: 'TOPO.Landmark',
  columns: [
    { name: 'id', type: 'INTEGER PRIMARY KEY' },
    { name: 'name', type: 'TEXT' },
    { name: 'created', type: 'DATETIME' },
  ],
  rows: [
    {
      values: [1, 'Alpha', '2024-01-01T00:00:00'],
      geometry: { type: 'Point', coordinates: [51.5, 25.3] },
    },
  ],
};
