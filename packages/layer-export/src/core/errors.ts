/**
 * Layer Export Error Types
 *
 * Custom error classes for export failures. Each class carries the
 * classification the orchestrator reports back in its result, so callers
 * never need to parse messages.
 */

import type { ExportErrorKind, ExportPhase } from './types.js';

/**
 * Base class for every classified export failure
 */
export class ExportError extends Error {
  constructor(
    message: string,
    public readonly kind: ExportErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExportError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A required request field was blank or invalid. Raised before any I/O.
 */
export class MissingInputError extends ExportError {
  constructor(
    message: string,
    public readonly fields: readonly string[] = []
  ) {
    super(message, 'MissingInput');
    this.name = 'MissingInputError';
  }
}

/**
 * The source identifier does not resolve inside the source location
 */
export class SourceNotFoundError extends ExportError {
  constructor(
    public readonly sourceLocation: string,
    public readonly sourceIdentifier: string
  ) {
    super(
      `Layer '${sourceIdentifier}' does not exist in ${sourceLocation}`,
      'NotFound'
    );
    this.name = 'SourceNotFoundError';
  }
}

/**
 * The cursor or the schema read failed mid-export
 */
export class SourceReadError extends ExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SourceReadFault', options);
    this.name = 'SourceReadError';
  }
}

/**
 * A geometry could not be brought into EPSG:4326.
 *
 * RECOVERY:
 * - Check that the layer declares a coordinate reference system
 *   (GeoPackage srs_id other than -1/0, or a .prj beside the .shp)
 * - Check that proj4 understands the stored definition
 */
export class ReprojectionError extends SourceReadError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReprojectionError';
  }
}

/**
 * Creating the output directory or writing the file failed
 */
export class WriteError extends ExportError {
  constructor(
    message: string,
    public readonly outputPath: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'WriteFault', options);
    this.name = 'WriteError';
  }
}

/**
 * An encoder was handed an empty record sequence. Encoders refuse rather
 * than writing a degenerate file; the orchestrator reports this as the
 * "no data" outcome, not as a failure.
 */
export class EmptyInputError extends Error {
  constructor(public readonly format: string) {
    super(`Nothing to encode as ${format}: record sequence is empty`);
    this.name = 'EmptyInputError';
  }
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a thrown value to the kind reported in the export result.
 *
 * Classified errors keep their kind. Anything else is attributed to the
 * phase it escaped from: filesystem faults while writing, source faults
 * everywhere else.
 */
export function classifyError(error: unknown, phase: ExportPhase): ExportErrorKind {
  if (error instanceof ExportError) {
    return error.kind;
  }

  switch (phase) {
    case 'idle':
    case 'validating':
      return 'MissingInput';
    case 'writing':
      return 'WriteFault';
    default:
      return 'SourceReadFault';
  }
}
