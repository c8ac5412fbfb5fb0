export { normalizeRecord, normalizeValue, recordEntries, recordKeys } from './record-normalizer.js';
export { normalizeGeometry, reprojectGeometry, SourceGeometry } from './reproject.js';
export { createTransform, describeCrs, LazyTransform } from './crs.js';
export type { CoordinateReference, PositionTransform } from './crs.js';
export { formatTimestamp, parseTimestampText, fromDate } from './timestamp.js';
