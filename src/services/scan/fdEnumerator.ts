import { execFile } from 'child_process';
import path from 'path';
import { promisify } from 'util';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { DiscoveryUnavailableError } from '../../errors/index.js';
import { MAX_TOOL_OUTPUT_BYTES, TIMEOUTS } from '../../config/constants.js';
import type { CommandRunner } from '../media/ffprobeService.js';

const execFilePromise = promisify(execFile);

/**
 * External directory enumerator. Output is raw: callers re-filter every path
 * with the same predicates the portable walk uses.
 */
export interface AcceleratedEnumerator {
  readonly name: string;
  /**
   * Regular files under root whose name matches pattern, as absolute paths.
   * Rejects with DiscoveryUnavailableError when the tool is missing or fails.
   */
  list(root: string, pattern: string): Promise<string[]>;
}

const defaultRunner: CommandRunner = (file, args, options) =>
  execFilePromise(file, args, { timeout: options.timeout, maxBuffer: MAX_TOOL_OUTPUT_BYTES });

/**
 * `fd` wrapper
 *
 * Hidden files and ignore files are included so the listing matches what the
 * portable walk sees.
 */
export class FdEnumerator implements AcceleratedEnumerator {
  readonly name: string;
  private available: boolean | undefined;

  constructor(binary = 'fd', private readonly run: CommandRunner = defaultRunner) {
    this.name = binary;
  }

  async isAvailable(): Promise<boolean> {
    if (this.available === undefined) {
      try {
        await this.run(this.name, ['--version'], { timeout: TIMEOUTS.VERSION_CHECK });
        this.available = true;
      } catch (error) {
        logger.debug(`${this.name} not available`, {
          service: 'discovery',
          error: getErrorMessage(error),
        });
        this.available = false;
      }
    }
    return this.available;
  }

  async list(root: string, pattern: string): Promise<string[]> {
    if (!(await this.isAvailable())) {
      throw new DiscoveryUnavailableError(this.name);
    }

    let stdout: string;
    try {
      ({ stdout } = await this.run(
        this.name,
        [
          '--type', 'f',
          '--hidden',
          '--no-ignore',
          '--absolute-path',
          '--ignore-case',
          '--color', 'never',
          '--', pattern, root,
        ],
        { timeout: TIMEOUTS.ENUMERATION }
      ));
    } catch (error) {
      throw new DiscoveryUnavailableError(
        this.name,
        `${this.name} failed: ${getErrorMessage(error)}`,
        toError(error)
      );
    }

    return stdout
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0)
      .map(line => path.resolve(line));
  }
}
