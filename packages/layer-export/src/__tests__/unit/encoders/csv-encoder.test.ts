/**
 * CSV Encoder Tests
 */

import { describe, it, expect } from 'vitest';
import { csvEncoder, csvEscape, inlineJson } from '../../../encoders/csv-encoder.js';
import { EmptyInputError } from '../../../core/errors.js';
import type { NormalizedRecord } from '../../../core/types.js';

const BOM = [0xef, 0xbb, 0xbf];

function textOf(bytes: Buffer): string {
  return bytes.subarray(3).toString('utf-8');
}

describe('csvEncoder', () => {
  const records: NormalizedRecord[] = [
    {
      properties: [['id', 1], ['name', 'Alpha'], ['created', '2024-01-01T00:00:00']],
      geometry: { type: 'Point', coordinates: [51.5, 25.3] },
    },
    {
      properties: [['id', 2], ['name', 'Beta, "the second"'], ['created', null]],
      geometry: null,
    },
  ];

  it('starts with a UTF-8 byte-order mark', () => {
    const bytes = csvEncoder.encode(records);
    expect([...bytes.subarray(0, 3)]).toEqual(BOM);
  });

  it('writes the header from the first record with geometry last', () => {
    const lines = textOf(csvEncoder.encode(records)).split('\r\n');
    expect(lines[0]).toBe('id,name,created,geometry');
  });

  it('writes geometry as quoted inline JSON', () => {
    const lines = textOf(csvEncoder.encode(records)).split('\r\n');
    expect(lines[1]).toBe(
      '1,Alpha,2024-01-01T00:00:00,"{""type"": ""Point"", ""coordinates"": [51.5, 25.3]}"'
    );
  });

  it('quotes embedded delimiters and leaves null cells empty', () => {
    const lines = textOf(csvEncoder.encode(records)).split('\r\n');
    expect(lines[2]).toBe('2,"Beta, ""the second""",,');
  });

  it('writes one row per record and a trailing line break', () => {
    const text = textOf(csvEncoder.encode(records));
    expect(text.endsWith('\r\n')).toBe(true);
    expect(text.split('\r\n')).toHaveLength(4);
  });

  it('stringifies booleans and numbers', () => {
    const lines = textOf(
      csvEncoder.encode([{ properties: [['active', true], ['area', 12.75]], geometry: null }])
    ).split('\r\n');
    expect(lines[1]).toBe('true,12.75,');
  });

  it('refuses an empty sequence', () => {
    expect(() => csvEncoder.encode([])).toThrow(EmptyInputError);
  });
});

describe('csvEscape', () => {
  it('leaves plain values alone', () => {
    expect(csvEscape('Doha')).toBe('Doha');
  });

  it('quotes line breaks', () => {
    expect(csvEscape('line one\nline two')).toBe('"line one\nline two"');
  });
});

describe('inlineJson', () => {
  it('uses spaced separators for nested structures', () => {
    expect(
      inlineJson({ type: 'LineString', coordinates: [[0, 1], [2.5, -3]] })
    ).toBe('{"type": "LineString", "coordinates": [[0, 1], [2.5, -3]]}');
  });

  it('escapes strings like JSON', () => {
    expect(inlineJson({ label: 'say "hi"' })).toBe('{"label": "say \\"hi\\""}');
  });
});
