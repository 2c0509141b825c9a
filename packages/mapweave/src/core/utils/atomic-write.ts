/**
 * Atomic Write Utilities
 *
 * Map documents are written to a temporary sibling and renamed into place, so
 * a reader sees either the previous document or the new one, never a partial
 * file. The parent directory is created on demand.
 */

import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import { dirname } from 'path';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Atomically write string data to file
 *
 * @throws the write/rename error; an AggregateError if the temp file also
 *   could not be removed
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent writers apart
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    try {
      await unlink(tempPath);
    } catch (cleanupError) {
      if (!isMissingFile(cleanupError)) {
        throw new AggregateError([error, cleanupError], `Failed to write ${filePath}`);
      }
    }
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 *
 * @example
 * ```typescript
 * await atomicWriteJSON('outputs/point_map.json', document);
 * ```
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, space), 'utf-8');
}
