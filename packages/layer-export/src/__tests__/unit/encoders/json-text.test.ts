/**
 * JSON Text Writer Tests
 */

import { describe, it, expect } from 'vitest';
import { OrderedObject, writeJson } from '../../../encoders/json-text.js';

describe('writeJson', () => {
  it('lays out plain values like JSON.stringify at the same indent', () => {
    const value = {
      type: 'Polygon',
      coordinates: [[[0, 0], [1.5, 0], [1.5, -2], [0, 0]]],
      bbox: [],
      meta: {},
      label: 'tab\there',
    };
    expect(writeJson(value, 4)).toBe(JSON.stringify(value, null, 4));
  });

  it('writes ordered entries in the given order', () => {
    const value = new OrderedObject([
      ['b', 1],
      ['10', 2],
      ['__proto__', 'x'],
      ['1', null],
    ]);
    expect(writeJson(value, 'inline')).toBe('{"b": 1, "10": 2, "__proto__": "x", "1": null}');
  });

  it('nests ordered objects inside arrays with the indent of each level', () => {
    const value = [new OrderedObject([['k', [1, 2]]])];
    expect(writeJson(value, 2)).toBe('[\n  {\n    "k": [\n      1,\n      2\n    ]\n  }\n]');
  });

  it('writes empty containers without line breaks', () => {
    expect(writeJson({ a: [], b: new OrderedObject([]) }, 4)).toBe(
      '{\n    "a": [],\n    "b": {}\n}'
    );
  });

  it('writes non-finite numbers as null and skips undefined members', () => {
    expect(writeJson({ x: Number.NaN, y: undefined, z: Infinity }, 'inline')).toBe(
      '{"x": null, "z": null}'
    );
  });
});
