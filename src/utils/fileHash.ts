/**
 * Whole-file CRC-32
 *
 * Streams the entire file through CRC-32 (IEEE polynomial). This is the
 * checksum embedded in tagged filenames, so unlike a partial fingerprint it
 * must cover every byte.
 */

import fs from 'fs';
import { buf as crc32Buf } from 'crc-32';

export interface HashProgress {
  bytesRead: number;
  totalBytes: number;
}

export interface Crc32Options {
  /** Called after every chunk with the running byte count */
  onProgress?: (progress: HashProgress) => void;
  /** Known file size; stat'ed when omitted */
  totalBytes?: number;
}

/**
 * Format a CRC-32 value the way it appears in filenames: 8 upper-case hex digits
 */
export function formatCrc32(value: number): string {
  return (value >>> 0).toString(16).toUpperCase().padStart(8, '0');
}

/**
 * Calculate the CRC-32 of a file
 *
 * @returns 8 upper-case hex digits
 *
 * @example
 * ```typescript
 * const hash = await calculateCrc32('/videos/clip.mkv');
 * // hash: "996A868B"
 * ```
 */
export async function calculateCrc32(filePath: string, options: Crc32Options = {}): Promise<string> {
  const totalBytes = options.totalBytes ?? (await fs.promises.stat(filePath)).size;
  const stream = fs.createReadStream(filePath);

  let crc = 0;
  let bytesRead = 0;

  for await (const chunk of stream) {
    if (!(chunk instanceof Buffer)) {
      continue;
    }
    crc = crc32Buf(chunk, crc);
    bytesRead += chunk.length;
    options.onProgress?.({ bytesRead, totalBytes });
  }

  return formatCrc32(crc);
}
