/**
 * Shapefile Source Driver Tests over real files
 *
 * The .shp, .dbf, .cpg and .prj parts are written byte by byte and read
 * back through the shapefile package, unmocked.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ShapefileSourceDriver } from '../../../sources/shapefile-source.js';
import { LayerExporter } from '../../../services/layer-exporter.js';
import { normalizeGeometry } from '../../../transformation/reproject.js';
import {
  WGS84_WKT,
  collect,
  createTempDir,
  dbfBytes,
  pointShpBytes,
  type DbfField,
  type PointShape,
} from '../../utils/index.js';

const FIELDS: DbfField[] = [
  { name: 'NAME', type: 'C', length: 20 },
  { name: '2020', type: 'N', length: 6 },
  { name: 'OPENED', type: 'D', length: 8 },
  { name: 'OPEN', type: 'L', length: 1 },
];

const ROWS = [
  ['Zürich', '11', '20200517', 'T'],
  ['Doha', '', '19710903', 'F'],
  ['Al Wakrah', '7', '20231231', '?'],
];

const SHAPES: PointShape[] = [[8.54, 47.37], null, [51.6, 25.17]];

function midnight(year: number, month: number, day: number) {
  return { year, month, day, hour: 0, minute: 0, second: 0 };
}

describe('ShapefileSourceDriver on disk', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  const driver = new ShapefileSourceDriver();

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
    await writeFile(join(dir, 'villages.shp'), pointShpBytes(SHAPES));
    await writeFile(join(dir, 'villages.dbf'), dbfBytes(FIELDS, ROWS));
    await writeFile(join(dir, 'villages.cpg'), 'UTF-8\n');
    await writeFile(join(dir, 'villages.prj'), WGS84_WKT);
  });

  afterEach(async () => {
    await cleanup();
  });

  it('keeps the .dbf column order, numeric names included', async () => {
    const cursor = await driver.open(dir, 'villages');
    expect(cursor.fields).toEqual(['NAME', '2020', 'OPENED', 'OPEN']);
    await cursor.close();
  });

  it('reads every record with typed values', async () => {
    const cursor = await driver.open(dir, 'villages');
    const records = await collect(cursor);
    await cursor.close();

    expect(records.map((record) => record.fields)).toEqual([
      [
        { name: 'NAME', value: { kind: 'string', value: 'Zürich' } },
        { name: '2020', value: { kind: 'number', value: 11 } },
        { name: 'OPENED', value: { kind: 'timestamp', value: midnight(2020, 5, 17) } },
        { name: 'OPEN', value: { kind: 'boolean', value: true } },
      ],
      [
        { name: 'NAME', value: { kind: 'string', value: 'Doha' } },
        { name: '2020', value: { kind: 'null' } },
        { name: 'OPENED', value: { kind: 'timestamp', value: midnight(1971, 9, 3) } },
        { name: 'OPEN', value: { kind: 'boolean', value: false } },
      ],
      [
        { name: 'NAME', value: { kind: 'string', value: 'Al Wakrah' } },
        { name: '2020', value: { kind: 'number', value: 7 } },
        { name: 'OPENED', value: { kind: 'timestamp', value: midnight(2023, 12, 31) } },
        { name: 'OPEN', value: { kind: 'null' } },
      ],
    ]);
  });

  it('yields null shapes as records without geometry', async () => {
    const cursor = await driver.open(dir, 'villages');
    const records = await collect(cursor);
    await cursor.close();

    expect(records[1]?.geometry).toBeNull();
    const point = normalizeGeometry(records[2]?.geometry ?? null);
    expect(point?.type).toBe('Point');
    if (point?.type !== 'Point') return;
    expect(point.coordinates[0]).toBeCloseTo(51.6, 9);
    expect(point.coordinates[1]).toBeCloseTo(25.17, 9);
  });

  it('decodes text as windows-1252 without a .cpg file', async () => {
    await rm(join(dir, 'villages.cpg'));
    const cursor = await driver.open(dir, 'villages');
    const [first] = await collect(cursor);
    await cursor.close();

    expect(first?.fields[0]).toEqual({ name: 'NAME', value: { kind: 'string', value: 'ZÃ¼rich' } });
  });

  it('exports the layer as CSV in column order', async () => {
    const exporter = new LayerExporter();
    const result = await exporter.export({
      sourceLocation: dir,
      sourceIdentifier: 'villages',
      outputDirectory: join(dir, 'out'),
      format: 'csv',
      outputName: 'villages',
    });

    expect(result.status === 'succeeded' && result.recordCount).toBe(3);
    const text = (await readFile(join(dir, 'out', 'villages.csv'))).subarray(3).toString('utf-8');
    const lines = text.split('\r\n');
    expect(lines[0]).toBe('NAME,2020,OPENED,OPEN,geometry');
    expect(lines[2]).toBe('Doha,,1971-09-03T00:00:00,false,');
  });
});
