/**
 * Encoder dispatch over the closed set of export formats
 */

import type { ExportFormat } from '../core/types.js';
import { csvEncoder } from './csv-encoder.js';
import { geojsonEncoder } from './geojson-encoder.js';
import { jsonEncoder } from './json-encoder.js';
import type { FormatEncoder } from './types.js';

const ENCODERS: Readonly<Record<ExportFormat, FormatEncoder>> = {
  csv: csvEncoder,
  json: jsonEncoder,
  geojson: geojsonEncoder,
};

export function getEncoder(format: ExportFormat): FormatEncoder {
  return ENCODERS[format];
}

export { csvEncoder, csvEscape, inlineJson } from './csv-encoder.js';
export { jsonEncoder } from './json-encoder.js';
export { geojsonEncoder, toFeature } from './geojson-encoder.js';
export { OrderedObject, writeJson } from './json-text.js';
export type { JsonLayout } from './json-text.js';
export type { FormatEncoder } from './types.js';
