/**
 * GeoJSON Encoder
 *
 * RFC 7946 FeatureCollection. Every record becomes one Feature, in input
 * order, with its attributes as `properties`.
 */

import { JSON_INDENT } from '../core/constants.js';
import { EmptyInputError } from '../core/errors.js';
import type { NormalizedRecord } from '../core/types.js';
import { OrderedObject, writeJson } from './json-text.js';
import type { FormatEncoder } from './types.js';

/**
 * Wrap a normalized record as a Feature. Member order is `type`,
 * `geometry`, `properties`; properties keep the record's column order.
 */
export function toFeature(record: NormalizedRecord): OrderedObject {
  return new OrderedObject([
    ['type', 'Feature'],
    ['geometry', record.geometry],
    ['properties', new OrderedObject(record.properties)],
  ]);
}

export const geojsonEncoder: FormatEncoder = {
  format: 'geojson',
  extension: 'geojson',

  encode(records: readonly NormalizedRecord[]): Buffer {
    if (records.length === 0) {
      throw new EmptyInputError('geojson');
    }
    const collection = new OrderedObject([
      ['type', 'FeatureCollection'],
      ['features', records.map(toFeature)],
    ]);
    return Buffer.from(writeJson(collection, JSON_INDENT), 'utf-8');
  },
};
