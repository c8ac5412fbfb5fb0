/**
 * Atomic Write Utilities
 *
 * Export files are written to a temporary sibling and renamed into place,
 * so the target path holds either the previous file or the complete new
 * one, never a partial write.
 *
 * Pattern:
 * 1. Create the parent directory
 * 2. Write to a temporary file (PID + timestamp in the name)
 * 3. Rename onto the target path
 * 4. Remove the temporary file if anything failed
 */

import { writeFile, rename, unlink, mkdir } from 'fs/promises';
import { dirname } from 'path';

/**
 * Atomically write bytes to a file
 *
 * @param filePath - Target file path
 * @param data - File contents
 * @throws Error if directory creation, write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/exports/parcels.geojson', Buffer.from(json, 'utf-8'));
 * ```
 */
export async function atomicWriteFile(filePath: string, data: Buffer): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: NodeJS.ErrnoException) => {
      if (cleanupError.code !== 'ENOENT') {
        throw new AggregateError(
          [error, cleanupError],
          `Write failed and temp file ${tempPath} could not be removed`
        );
      }
    });
    throw error;
  }
}
