/**
 * Network Drive Detection
 *
 * Heuristic only: no statfs call, just mount prefixes and filesystem-type
 * fragments in the resolved path. False positives cost parallelism, never
 * correctness.
 */

import os from 'os';
import path from 'path';
import { NETWORK_DRIVE } from '../config/constants.js';

/**
 * Detect whether a path lives on a network-mounted drive
 */
export function isNetworkDrive(filePath: string): boolean {
  // UNC paths first, path.resolve would turn them into local-looking paths
  if (NETWORK_DRIVE.UNC_PREFIXES.some(prefix => filePath.startsWith(prefix))) {
    return true;
  }

  const absPath = path.resolve(filePath);

  if (NETWORK_DRIVE.MOUNT_PREFIXES.some(prefix => absPath.startsWith(prefix))) {
    return true;
  }

  const lowerPath = absPath.toLowerCase();
  return NETWORK_DRIVE.INDICATORS.some(indicator => lowerPath.includes(indicator));
}

/**
 * Pick the tagging worker count.
 *
 * An explicit override (> 0) always wins. Otherwise any input on a network
 * drive forces a single worker, and local inputs get one worker per logical core.
 */
export function resolveWorkerCount(
  filePaths: readonly string[],
  override?: number,
  cpuCount: number = os.cpus().length
): number {
  if (override !== undefined && override > 0) {
    return override;
  }

  if (filePaths.some(isNetworkDrive)) {
    return 1;
  }

  return Math.max(1, cpuCount);
}
