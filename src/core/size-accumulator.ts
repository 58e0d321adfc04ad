/**
 * Size Accumulator
 *
 * Disk usage of cache directories. Only regular files count; symbolic
 * links (the hub store links snapshots to blobs) and other special entries
 * contribute nothing and are never followed.
 *
 * @module core/size-accumulator
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { hasErrorCode } from '../api/errors.js';

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'] as const;

/**
 * Sum the size of every regular file under `directory`
 *
 * @returns 0 when the directory does not exist
 */
export async function totalBytes(directory: string): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      return 0;
    }
    throw error;
  }

  let total = 0;
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);

    if (entry.isFile()) {
      const stats = await fs.lstat(fullPath);
      total += stats.size;
    } else if (entry.isDirectory()) {
      total += await totalBytes(fullPath);
    }
  }

  return total;
}

/**
 * Format a byte count with 1024-based units, one decimal
 *
 * @example
 * ```typescript
 * humanize(1536); // "1.5 KB"
 * ```
 */
export function humanize(bytes: number): string {
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < UNITS.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${toOneDecimal(size)} ${UNITS[unitIndex]}`;
}

/**
 * One decimal, exact ties to the even digit
 *
 * Values here are byte counts over powers of 1024, so the only exact ties
 * are x.25 and x.75; `toFixed` rounds x.25 up, the even digit is below.
 */
function toOneDecimal(value: number): string {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 4 === 1) {
    return (Math.floor(value * 10) / 10).toFixed(1);
  }
  return value.toFixed(1);
}
