/**
 * Output file naming
 *
 * `{outputDirectory}/{name}.{extension}` where an absent name is derived as
 * `{identifier with dots and path separators → underscores}_{YYYYMMDD_HHMMSS}`.
 */

import { join, resolve } from 'node:path';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp in `YYYYMMDD_HHMMSS` form
 */
export function formatFileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Default file name for a layer exported at `now`. Never contains a path
 * separator, so the file lands directly in the output directory.
 */
export function deriveOutputName(sourceIdentifier: string, now: Date): string {
  return `${sourceIdentifier.replace(/[./\\]/g, '_')}_${formatFileTimestamp(now)}`;
}

/**
 * Absolute output path
 */
export function buildOutputPath(outputDirectory: string, name: string, extension: string): string {
  return resolve(join(outputDirectory, `${name}.${extension}`));
}

/**
 * Hands out derived names that are unique for the lifetime of the
 * allocator. A name seen before gets `_2`, `_3`, ... appended, so two
 * default-named exports within the same second do not overwrite each other.
 */
export class OutputNameAllocator {
  private readonly issued = new Map<string, number>();

  allocate(baseName: string): string {
    const seen = this.issued.get(baseName) ?? 0;
    this.issued.set(baseName, seen + 1);
    return seen === 0 ? baseName : `${baseName}_${seen + 1}`;
  }
}
