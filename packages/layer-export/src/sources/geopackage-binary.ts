/**
 * GeoPackage geometry blob decoding
 *
 * A GeoPackage geometry is a small binary header followed by standard WKB:
 *
 *   magic 'GP' | version | flags | srs_id (int32) | envelope | WKB
 *
 * Flags: bit 0 byte order of srs_id/envelope (1 = little endian),
 * bits 1-3 envelope layout, bit 4 empty geometry.
 */

import wkx from 'wkx';
import type { Geometry } from 'geojson';
import { SourceReadError, errorMessage } from '../core/errors.js';
import { isGeometry } from '../core/type-guards.js';

/** Envelope byte length per envelope indicator */
const ENVELOPE_BYTES: Readonly<Record<number, number>> = {
  0: 0,
  1: 32,
  2: 48,
  3: 48,
  4: 64,
};

const HEADER_BYTES = 8;

export interface GeoPackageGeometry {
  readonly srsId: number;
  /** Null when the blob carries the empty-geometry flag */
  readonly geometry: Geometry | null;
}

/**
 * Decode a GeoPackage geometry blob into GeoJSON (in the layer's own CRS)
 *
 * @throws SourceReadError for malformed blobs
 */
export function decodeGeoPackageGeometry(blob: Uint8Array): GeoPackageGeometry {
  const buffer = Buffer.from(blob.buffer, blob.byteOffset, blob.byteLength);

  if (buffer.length < HEADER_BYTES || buffer[0] !== 0x47 || buffer[1] !== 0x50) {
    throw new SourceReadError('Geometry blob is not in GeoPackage binary format');
  }

  const flags = buffer.readUInt8(3);
  const littleEndian = (flags & 0b1) === 1;
  const envelopeIndicator = (flags >> 1) & 0b111;
  const empty = ((flags >> 4) & 0b1) === 1;

  const envelopeBytes = ENVELOPE_BYTES[envelopeIndicator];
  if (envelopeBytes === undefined) {
    throw new SourceReadError(`Invalid GeoPackage envelope indicator: ${envelopeIndicator}`);
  }

  const srsId = littleEndian ? buffer.readInt32LE(4) : buffer.readInt32BE(4);

  if (empty) {
    return { srsId, geometry: null };
  }

  let decoded: unknown;
  try {
    decoded = wkx.Geometry.parse(buffer.subarray(HEADER_BYTES + envelopeBytes)).toGeoJSON();
  } catch (error) {
    throw new SourceReadError(`Cannot decode WKB geometry: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!isGeometry(decoded)) {
    throw new SourceReadError('Decoded WKB is not a supported GeoJSON geometry');
  }

  return { srsId, geometry: decoded };
}

/**
 * Encode a GeoJSON geometry as a GeoPackage blob (little endian, no envelope)
 */
export function encodeGeoPackageGeometry(geometry: Geometry, srsId: number): Buffer {
  const header = Buffer.alloc(HEADER_BYTES);
  header.write('GP', 0, 'ascii');
  header.writeUInt8(0, 2);
  header.writeUInt8(0b1, 3);
  header.writeInt32LE(srsId, 4);
  return Buffer.concat([header, wkx.Geometry.parseGeoJSON(geometry).toWkb()]);
}
