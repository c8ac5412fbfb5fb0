/**
 * Layer Export
 *
 * Exports GeoPackage tables and shapefile layers to CSV, JSON or GeoJSON,
 * with geometry reprojected to EPSG:4326.
 *
 * @example
 * ```typescript
 * import { LayerExporter, describeResult } from 'layer-export';
 *
 * const exporter = new LayerExporter();
 * const result = await exporter.export({
 *   sourceLocation: './city.gpkg',
 *   sourceIdentifier: 'parcels',
 *   outputDirectory: './exports',
 *   format: 'geojson',
 * });
 * console.log(describeResult(result));
 * ```
 */

// Core
export type {
  ExportErrorKind,
  ExportFormat,
  ExportPhase,
  ExportRequest,
  ExportResult,
  FieldValue,
  JsonPrimitive,
  LocalDateTime,
  NormalizedRecord,
  RawField,
  RawRecord,
  Reprojectable,
} from './core/types.js';
export {
  EXPORT_FORMATS,
  EXPORT_STATUS,
  GEOMETRY_KEY,
  TARGET_CRS,
} from './core/constants.js';
export type { ExportStatus } from './core/constants.js';
export {
  EmptyInputError,
  ExportError,
  MissingInputError,
  ReprojectionError,
  SourceNotFoundError,
  SourceReadError,
  WriteError,
  classifyError,
} from './core/errors.js';
export { isExportFormat, isGeometry } from './core/type-guards.js';
export { logger, createLogger } from './core/utils/logger.js';
export type { Logger, LogLevel, LogMetadata } from './core/utils/logger.js';

// Pipeline
export * from './sources/index.js';
export * from './transformation/index.js';
export * from './encoders/index.js';
export { validateExportRequest, ExportRequestSchema } from './validation/export-request.js';
export { LayerExporter, describeResult } from './services/layer-exporter.js';
export type { LayerExporterOptions } from './services/layer-exporter.js';
export {
  OutputNameAllocator,
  buildOutputPath,
  deriveOutputName,
  formatFileTimestamp,
} from './services/output-path.js';
