/**
 * Export Orchestrator
 *
 * Drives one export end to end:
 *
 *   idle → validating → reading → normalizing → encoding → writing
 *        → succeeded | failed
 *
 * Every fault is caught here and returned as an `ExportResult`; nothing is
 * thrown to the caller and nothing is retried. Exports submitted to one
 * exporter run one after another.
 *
 * INVARIANTS:
 * - The source cursor is closed on every exit path
 * - No output file or directory is created unless at least one record was
 *   read and encoded
 * - The output file is replaced atomically (temp file + rename)
 */

import { EXPORT_STATUS, type ExportStatus } from '../core/constants.js';
import {
  EmptyInputError,
  WriteError,
  classifyError,
  errorMessage,
} from '../core/errors.js';
import type {
  ExportPhase,
  ExportRequest,
  ExportResult,
  NormalizedRecord,
} from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { getEncoder } from '../encoders/index.js';
import { resolveSource } from '../sources/index.js';
import type { FeatureCursor, FeatureSource } from '../sources/types.js';
import { normalizeRecord } from '../transformation/record-normalizer.js';
import { normalizeGeometry } from '../transformation/reproject.js';
import { validateExportRequest } from '../validation/export-request.js';
import { OutputNameAllocator, buildOutputPath, deriveOutputName } from './output-path.js';

export interface LayerExporterOptions {
  /** Driver lookup; defaults to picking by location (GeoPackage or shapefile) */
  readonly resolveSource?: (location: string) => FeatureSource;
  /** Clock used for derived file names */
  readonly now?: () => Date;
  readonly logger?: Logger;
}

/**
 * Status line for a finished export
 */
export function describeResult(result: ExportResult): string {
  switch (result.status) {
    case 'succeeded':
      return `Export successful: ${result.outputPath}`;
    case 'empty':
      return EXPORT_STATUS.NO_DATA;
    case 'failed':
      return `Error: ${result.error.message}`;
  }
}

export class LayerExporter {
  private readonly resolveSource: (location: string) => FeatureSource;
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly names = new OutputNameAllocator();
  private queue: Promise<unknown> = Promise.resolve();
  private pending = 0;
  private currentPhase: ExportPhase = 'idle';

  constructor(options: LayerExporterOptions = {}) {
    this.resolveSource = options.resolveSource ?? resolveSource;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger({ module: 'exporter' });
  }

  /** Phase of the export currently running, or of the last one */
  get phase(): ExportPhase {
    return this.currentPhase;
  }

  get status(): ExportStatus {
    return this.pending > 0 ? EXPORT_STATUS.IN_PROGRESS : EXPORT_STATUS.READY;
  }

  /**
   * Run one export. Resolves with the outcome; never rejects.
   */
  export(request: unknown): Promise<ExportResult> {
    this.pending++;
    const run = this.queue.then(() => this.run(request));
    this.queue = run;
    return run.finally(() => {
      this.pending--;
    });
  }

  private enter(phase: ExportPhase, log: Logger = this.log): void {
    this.currentPhase = phase;
    log.debug('Export phase', { phase });
  }

  private async run(input: unknown): Promise<ExportResult> {
    const startTime = Date.now();
    let cursor: FeatureCursor | null = null;
    let log = this.log;

    try {
      this.enter('validating');
      const request = validateExportRequest(input);
      log = this.log.child({ layer: request.sourceIdentifier, format: request.format });

      log.info('Starting export', { source: request.sourceLocation });

      this.enter('reading', log);
      const source = this.resolveSource(request.sourceLocation);
      cursor = await source.open(request.sourceLocation, request.sourceIdentifier);

      this.enter('normalizing', log);
      const records: NormalizedRecord[] = [];
      for await (const raw of cursor) {
        records.push(normalizeRecord(raw.fields, normalizeGeometry(raw.geometry)));
      }
      await cursor.close();
      cursor = null;

      if (records.length === 0) {
        return this.empty(request, log);
      }

      this.enter('encoding', log);
      const encoder = getEncoder(request.format);
      let bytes: Buffer;
      try {
        bytes = encoder.encode(records);
      } catch (error) {
        if (error instanceof EmptyInputError) {
          return this.empty(request, log);
        }
        throw error;
      }

      this.enter('writing', log);
      const name =
        request.outputName ??
        this.names.allocate(deriveOutputName(request.sourceIdentifier, this.now()));
      const outputPath = buildOutputPath(request.outputDirectory, name, encoder.extension);

      try {
        await atomicWriteFile(outputPath, bytes);
      } catch (error) {
        throw new WriteError(errorMessage(error), outputPath, { cause: error });
      }

      this.enter('succeeded', log);
      log.info('Export complete', {
        outputPath,
        records: records.length,
        bytes: bytes.length,
        duration_ms: Date.now() - startTime,
      });
      return {
        status: 'succeeded',
        outputPath,
        format: request.format,
        recordCount: records.length,
      };
    } catch (error) {
      const kind = classifyError(error, this.currentPhase);
      const message = errorMessage(error);
      log.error('Export failed', {
        kind,
        phase: this.currentPhase,
        error: message,
        duration_ms: Date.now() - startTime,
      });
      this.enter('failed', log);
      return { status: 'failed', error: { kind, message } };
    } finally {
      if (cursor) {
        await this.release(cursor, log);
      }
    }
  }

  private empty(request: ExportRequest, log: Logger): ExportResult {
    this.enter('succeeded', log);
    log.info('Layer has no data to export');
    return { status: 'empty', sourceIdentifier: request.sourceIdentifier };
  }

  /**
   * Close a cursor left open by a failed export. The export has already
   * failed, so a close fault is logged rather than replacing that outcome.
   */
  private async release(cursor: FeatureCursor, log: Logger): Promise<void> {
    try {
      await cursor.close();
    } catch (error) {
      log.error('Failed to close source cursor', { error: errorMessage(error) });
    }
  }
}
