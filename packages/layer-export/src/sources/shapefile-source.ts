/**
 * Shapefile Source Driver
 *
 * Treats a directory as the connection location and each `<name>.shp`
 * (with its .dbf, .prj and optional .cpg siblings) as a layer. Column order
 * comes from the .dbf field descriptors, not from the keys of the feature
 * properties the reader builds.
 */

import * as shapefile from 'shapefile';
import type { Feature } from 'geojson';
import { existsSync } from 'node:fs';
import { open as openFile, readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { GEOMETRY_KEY } from '../core/constants.js';
import { SourceNotFoundError, SourceReadError, errorMessage } from '../core/errors.js';
import { isGeometry } from '../core/type-guards.js';
import type { RawRecord } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { LazyTransform, type CoordinateReference } from '../transformation/crs.js';
import { SourceGeometry } from '../transformation/reproject.js';
import { toFieldValue } from './field-values.js';
import type { FeatureCursor, FeatureSource } from './types.js';

const log = createLogger({ module: 'shapefile' });

type ShapefileSource = Awaited<ReturnType<typeof shapefile.open>>;

interface LayerFiles {
  readonly layer: string;
  readonly shp: string;
  readonly dbf: string;
  readonly prj: string;
  readonly cpg: string;
}

function layerFiles(location: string, identifier: string): LayerFiles {
  const layer = identifier.replace(/\.shp$/i, '');
  const base = join(location, layer);
  return {
    layer,
    shp: `${base}.shp`,
    dbf: `${base}.dbf`,
    prj: `${base}.prj`,
    cpg: `${base}.cpg`,
  };
}

async function readOptionalText(path: string): Promise<string | null> {
  if (!existsSync(path)) return null;
  const text = (await readFile(path, 'utf-8')).trim();
  return text === '' ? null : text;
}

const DBF_HEADER_SIZE = 32;
const DBF_DESCRIPTOR_SIZE = 32;
const DBF_NAME_SIZE = 11;
const DBF_HEADER_END = 0x0d;

/**
 * Field names in table order, decoded the way the reader decodes them
 */
async function readDbfFieldNames(path: string, encoding: string | null): Promise<string[]> {
  const handle = await openFile(path, 'r');
  try {
    const head = Buffer.alloc(DBF_HEADER_SIZE);
    const { bytesRead } = await handle.read(head, 0, DBF_HEADER_SIZE, 0);
    if (bytesRead < DBF_HEADER_SIZE) {
      throw new SourceReadError(`Truncated .dbf header in ${path}`);
    }

    const descriptors = Buffer.alloc(Math.max(head.readUInt16LE(8) - DBF_HEADER_SIZE, 0));
    await handle.read(descriptors, 0, descriptors.length, DBF_HEADER_SIZE);

    const decoder = new TextDecoder(encoding ?? 'windows-1252');
    const names: string[] = [];
    for (
      let offset = 0;
      offset + DBF_DESCRIPTOR_SIZE <= descriptors.length &&
      descriptors[offset] !== DBF_HEADER_END;
      offset += DBF_DESCRIPTOR_SIZE
    ) {
      const raw = descriptors.subarray(offset, offset + DBF_NAME_SIZE);
      const end = raw.indexOf(0);
      names.push(decoder.decode(end === -1 ? raw : raw.subarray(0, end)));
    }
    return names;
  } finally {
    await handle.close();
  }
}

async function readCoordinateReference(files: LayerFiles): Promise<CoordinateReference> {
  const wkt = await readOptionalText(files.prj);
  return wkt === null
    ? { kind: 'undefined', reason: `no projection file for '${files.layer}'` }
    : { kind: 'definition', definition: wkt };
}

async function readFeature(source: ShapefileSource): Promise<Feature | null> {
  const result = await source.read();
  return result.done ? null : result.value;
}

// ============================================================================
// Cursor
// ============================================================================

class ShapefileCursor implements FeatureCursor {
  private consumed = false;
  private closed = false;

  constructor(
    private readonly source: ShapefileSource,
    readonly layer: string,
    readonly fields: readonly string[],
    private readonly first: Feature | null,
    private readonly transform: LazyTransform
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<RawRecord> {
    if (this.consumed) {
      throw new SourceReadError(`Cursor over '${this.layer}' has already been read`);
    }
    if (this.closed) {
      throw new SourceReadError(`Cursor over '${this.layer}' is closed`);
    }
    this.consumed = true;

    let feature = this.first;
    while (feature !== null) {
      yield this.toRecord(feature);
      feature = await readFeature(this.source);
    }
  }

  private toRecord(feature: Feature): RawRecord {
    const properties = feature.properties ?? {};
    const fields = this.fields.map((name) => ({
      name,
      value: toFieldValue(properties[name]),
    }));

    const geometry: unknown = feature.geometry;
    if (geometry === null || geometry === undefined) {
      return { fields, geometry: null };
    }
    if (!isGeometry(geometry)) {
      throw new SourceReadError(`Shape in '${this.layer}' is not a supported geometry`);
    }
    return { fields, geometry: new SourceGeometry(geometry, this.transform) };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.source.cancel();
    log.debug('Closed shapefile', { layer: this.layer });
  }
}

// ============================================================================
// Driver
// ============================================================================

export class ShapefileSourceDriver implements FeatureSource {
  readonly driver = 'shapefile';

  async exists(location: string, identifier: string): Promise<boolean> {
    return existsSync(layerFiles(location, identifier).shp);
  }

  async listLayers(location: string): Promise<string[]> {
    const entries = await readdir(location);
    return entries
      .filter((name) => name.toLowerCase().endsWith('.shp'))
      .map((name) => name.slice(0, -'.shp'.length))
      .sort();
  }

  async open(location: string, identifier: string): Promise<FeatureCursor> {
    const files = layerFiles(location, identifier);
    if (!existsSync(files.shp)) {
      throw new SourceNotFoundError(location, identifier);
    }

    const encoding = await readOptionalText(files.cpg);
    const hasDbf = existsSync(files.dbf);
    let source: ShapefileSource;
    try {
      source = await shapefile.open(
        files.shp,
        hasDbf ? files.dbf : undefined,
        encoding ? { encoding } : {}
      );
    } catch (error) {
      throw new SourceReadError(`Failed to open shapefile '${files.layer}': ${errorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      const fields = hasDbf ? await readDbfFieldNames(files.dbf, encoding) : [];
      const first = await readFeature(source);
      const crs = await readCoordinateReference(files);
      const cursor = new ShapefileCursor(
        source,
        files.layer,
        fields,
        first,
        new LazyTransform(crs)
      );

      if (cursor.fields.includes(GEOMETRY_KEY)) {
        throw new SourceReadError(
          `Layer '${files.layer}' has an attribute named '${GEOMETRY_KEY}', which collides with the exported geometry`
        );
      }

      log.info('Opened shapefile layer', {
        location,
        layer: files.layer,
        fields: cursor.fields.length,
        crs: crs.kind,
      });
      return cursor;
    } catch (error) {
      await source.cancel();
      throw error;
    }
  }
}
