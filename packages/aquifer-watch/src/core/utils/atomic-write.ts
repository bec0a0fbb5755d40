/**
 * Atomic artifact writes
 *
 * Charts and the run manifest are written to a temporary sibling file and
 * renamed over the target, so a re-run either leaves the previous artifact or
 * the complete new one in place, never a truncated file.
 */

import { writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from './logger.js';

const log = createLogger({ module: 'atomic-write' });

/**
 * Atomically write string data to file
 *
 * @example
 * ```typescript
 * await atomicWriteFile('outputs/Z1_head_absoluto.svg', svg);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent runs from sharing a temp file
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      log.debug('Temp file cleanup failed', {
        tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  const json = JSON.stringify(data, null, space);
  await atomicWriteFile(filePath, `${json}\n`, 'utf-8');
}
