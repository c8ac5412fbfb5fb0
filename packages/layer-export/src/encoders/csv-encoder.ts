/**
 * CSV Encoder
 *
 * UTF-8 with a byte-order mark so spreadsheet tools detect the encoding.
 * Header comes from the first record; the geometry column holds the
 * geometry's inline JSON text.
 */

import type { Geometry } from 'geojson';
import { UTF8_BOM } from '../core/constants.js';
import { EmptyInputError } from '../core/errors.js';
import type { JsonPrimitive, NormalizedRecord } from '../core/types.js';
import { recordKeys } from '../transformation/record-normalizer.js';
import { writeJson } from './json-text.js';
import type { FormatEncoder } from './types.js';

const LINE_END = '\r\n';

/**
 * Compact single-line JSON with `", "` and `": "` separators, e.g.
 * `{"type": "Point", "coordinates": [51.5, 25.3]}`
 */
export function inlineJson(value: unknown): string {
  return writeJson(value, 'inline');
}

/**
 * Escape CSV field
 */
export function csvEscape(value: string): string {
  // Quote when the field holds a delimiter, a quote or a line break
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function cellText(value: JsonPrimitive): string {
  if (value === null) return '';
  return String(value);
}

function geometryText(geometry: Geometry | null): string {
  return geometry === null ? '' : inlineJson(geometry);
}

export const csvEncoder: FormatEncoder = {
  format: 'csv',
  extension: 'csv',

  encode(records: readonly NormalizedRecord[]): Buffer {
    const first = records[0];
    if (!first) {
      throw new EmptyInputError('csv');
    }

    const header = recordKeys(first).map(csvEscape).join(',');
    const rows = records.map((record) =>
      [
        ...record.properties.map(([, value]) => csvEscape(cellText(value))),
        csvEscape(geometryText(record.geometry)),
      ].join(',')
    );

    const text = [header, ...rows].join(LINE_END) + LINE_END;
    return Buffer.concat([UTF8_BOM, Buffer.from(text, 'utf-8')]);
  },
};
