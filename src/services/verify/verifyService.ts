import pMap from 'p-map';
import { logger } from '../../middleware/logging.js';
import { calculateCrc32 } from '../../utils/fileHash.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { extractHash, hashesEqual, isVideoFile } from '../media/filenameCodec.js';

/**
 * Hash Verification
 *
 * Recomputes the CRC-32 of tagged files and compares it with the hash in
 * their names. Read-only: nothing is renamed or deleted.
 */

export type VerifySkipReason = 'not-a-video-file' | 'no-embedded-hash';

export type VerifyResult =
  | { status: 'verified'; path: string; hash: string }
  | { status: 'mismatch'; path: string; expected: string; actual: string }
  | { status: 'skipped'; path: string; reason: VerifySkipReason }
  | { status: 'failed'; path: string; error: string };

export interface VerifySummary {
  verified: number;
  mismatch: number;
  skipped: number;
  failed: number;
}

export interface VerifyOptions {
  concurrency?: number;
  /** Replaceable for tests; defaults to a full CRC-32 of the file */
  computeHash?: (filePath: string) => Promise<string>;
}

/**
 * Verify one file against its embedded hash
 */
export async function verifyFile(
  filePath: string,
  computeHash: (filePath: string) => Promise<string> = p => calculateCrc32(p)
): Promise<VerifyResult> {
  if (!isVideoFile(filePath)) {
    return { status: 'skipped', path: filePath, reason: 'not-a-video-file' };
  }

  const expected = extractHash(filePath);
  if (expected === undefined) {
    return { status: 'skipped', path: filePath, reason: 'no-embedded-hash' };
  }

  let actual: string;
  try {
    actual = await computeHash(filePath);
  } catch (error) {
    logger.warn(`Failed to hash ${filePath}`, { service: 'verify', error: getErrorMessage(error) });
    return { status: 'failed', path: filePath, error: getErrorMessage(error) };
  }

  if (!hashesEqual(expected, actual)) {
    logger.warn(`Hash mismatch for ${filePath}`, { service: 'verify', expected, actual });
    return { status: 'mismatch', path: filePath, expected: expected.toUpperCase(), actual };
  }

  return { status: 'verified', path: filePath, hash: actual };
}

/**
 * Verify many files with bounded parallelism; results keep input order
 */
export async function verifyFiles(filePaths: readonly string[], options: VerifyOptions = {}): Promise<VerifyResult[]> {
  const concurrency = Math.max(1, options.concurrency ?? 4);
  logger.info(`Verifying ${filePaths.length} files`, { service: 'verify', concurrency });

  return pMap(filePaths, filePath => verifyFile(filePath, options.computeHash), { concurrency });
}

export function summarizeVerification(results: readonly VerifyResult[]): VerifySummary {
  const summary: VerifySummary = { verified: 0, mismatch: 0, skipped: 0, failed: 0 };
  for (const result of results) {
    summary[result.status]++;
  }
  return summary;
}
