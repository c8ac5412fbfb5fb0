/**
 * Format Encoder contract
 */

import type { ExportFormat, NormalizedRecord } from '../core/types.js';

/**
 * Turns the full record sequence of one export into file bytes.
 *
 * Implementations throw `EmptyInputError` for an empty sequence instead of
 * producing a degenerate file.
 */
export interface FormatEncoder {
  readonly format: ExportFormat;
  /** File extension, without the dot */
  readonly extension: string;
  encode(records: readonly NormalizedRecord[]): Buffer;
}
