/**
 * Binary Availability Checker
 *
 * Verifies that the external tools reeltag shells out to are installed.
 * Missing tools are reported, never thrown; the caller decides whether
 * that ends the command.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../middleware/logging.js';
import { getErrorMessage } from './errorHandling.js';
import { TIMEOUTS } from '../config/constants.js';
import { ToolsConfig } from '../config/types.js';

const execFilePromise = promisify(execFile);

export interface BinaryCheckResult {
  binary: string;
  available: boolean;
  required: boolean;
  purpose: string;
  version?: string;
  error?: string;
}

interface BinarySpec {
  name: string;
  required: boolean;
  purpose: string;
  versionArgs: string[];
}

/**
 * Check if a binary is available and get its version
 */
export async function checkBinary(
  binaryName: string,
  versionArgs: string[] = ['--version']
): Promise<{ available: boolean; version?: string; error?: string }> {
  try {
    const { stdout, stderr } = await execFilePromise(binaryName, versionArgs, {
      timeout: TIMEOUTS.VERSION_CHECK,
    });

    const output = stdout || stderr;
    const versionMatch = output.match(/version\s+([\d.]+)|v([\d.]+)|([\d.]+)/i);
    const version = versionMatch ? (versionMatch[1] || versionMatch[2] || versionMatch[3]) : 'unknown';

    return { available: true, version };
  } catch (error) {
    return { available: false, error: getErrorMessage(error) };
  }
}

/**
 * Check every tool reeltag uses: ffprobe is required for tagging, fd only speeds up discovery
 */
export async function checkRequiredBinaries(tools: ToolsConfig): Promise<BinaryCheckResult[]> {
  logger.debug('Checking binary dependencies...');

  const binaries: BinarySpec[] = [
    { name: tools.ffprobePath, required: true, purpose: 'Video resolution and duration probing', versionArgs: ['-version'] },
    { name: tools.fdPath, required: false, purpose: 'Fast directory enumeration (optional)', versionArgs: ['--version'] },
  ];

  const results: BinaryCheckResult[] = [];

  for (const binary of binaries) {
    const check = await checkBinary(binary.name, binary.versionArgs);
    results.push({
      binary: binary.name,
      required: binary.required,
      purpose: binary.purpose,
      ...check,
    });

    if (check.available) {
      logger.debug(`${binary.name} found`, {
        service: 'binaryCheck',
        binary: binary.name,
        version: check.version,
      });
    } else {
      const logLevel = binary.required ? 'error' : 'warn';
      logger[logLevel](`${binary.name} not found - ${binary.purpose}`, {
        service: 'binaryCheck',
        binary: binary.name,
        required: binary.required,
        error: check.error,
      });
    }
  }

  return results;
}

/**
 * Names of required tools that are missing from a check run
 */
export function missingRequired(results: readonly BinaryCheckResult[]): string[] {
  return results.filter(r => r.required && !r.available).map(r => r.binary);
}
