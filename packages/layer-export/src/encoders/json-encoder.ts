/**
 * JSON Encoder
 *
 * Top-level array of records, 4-space indentation, non-ASCII kept literal.
 */

import { JSON_INDENT } from '../core/constants.js';
import { EmptyInputError } from '../core/errors.js';
import type { NormalizedRecord } from '../core/types.js';
import { recordEntries } from '../transformation/record-normalizer.js';
import { OrderedObject, writeJson } from './json-text.js';
import type { FormatEncoder } from './types.js';

export const jsonEncoder: FormatEncoder = {
  format: 'json',
  extension: 'json',

  encode(records: readonly NormalizedRecord[]): Buffer {
    if (records.length === 0) {
      throw new EmptyInputError('json');
    }
    const rows = records.map((record) => new OrderedObject(recordEntries(record)));
    return Buffer.from(writeJson(rows, JSON_INDENT), 'utf-8');
  },
};
