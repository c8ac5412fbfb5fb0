/**
 * Layer Export Constants
 */

import type { ExportFormat } from './types.js';

/** Every export is reprojected into WGS84 longitude/latitude */
export const TARGET_CRS = 'EPSG:4326';

export const TARGET_EPSG_CODE = 4326;

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'json', 'geojson'];

/** Key the normalized geometry is stored under, always after the attributes */
export const GEOMETRY_KEY = 'geometry';

/** UTF-8 byte-order mark written at the start of CSV files */
export const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

/** Indentation used by the JSON and GeoJSON encoders */
export const JSON_INDENT = 4;

/**
 * Status lines reported to the presentation layer
 */
export const EXPORT_STATUS = {
  READY: 'Ready',
  IN_PROGRESS: 'Export in Progress',
  NO_DATA: 'No data to export',
} as const;

export type ExportStatus = (typeof EXPORT_STATUS)[keyof typeof EXPORT_STATUS];
