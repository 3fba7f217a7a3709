import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../../middleware/logging.js';
import {
  getErrorMessage,
  getExitCode,
  toError,
} from '../../utils/errorHandling.js';
import { ProcessError } from '../../errors/index.js';
import { FILENAME_TAG, MAX_TOOL_OUTPUT_BYTES } from '../../config/constants.js';

const execFilePromise = promisify(execFile);

/**
 * FFprobe Service
 *
 * Reads the two facts a tagged filename needs: the first video stream's
 * dimensions and the container duration. Errors are wrapped, not parsed.
 */

/**
 * Metadata probing collaborator
 */
export interface MetadataProber {
  /** "WxH" of the first video stream */
  getResolution(filePath: string): Promise<string>;
  /** Container duration in seconds */
  getDurationSeconds(filePath: string): Promise<number>;
}

export interface FfprobeOptions {
  binary?: string;
  timeoutMs?: number;
}

/**
 * Runs a process and resolves with its stdout; injectable for tests
 */
export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeout: number }
) => Promise<{ stdout: string; stderr: string }>;

const defaultRunner: CommandRunner = (file, args, options) =>
  execFilePromise(file, args, { timeout: options.timeout, maxBuffer: MAX_TOOL_OUTPUT_BYTES });

export class FfprobeService implements MetadataProber {
  private readonly binary: string;
  private readonly timeoutMs: number;

  constructor(options: FfprobeOptions = {}, private readonly run: CommandRunner = defaultRunner) {
    this.binary = options.binary ?? 'ffprobe';
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async getResolution(filePath: string): Promise<string> {
    const stdout = await this.probe(filePath, [
      '-v', 'error',
      '-select_streams', 'v:0',
      '-show_entries', 'stream=width,height',
      '-of', 'csv=s=x:p=0',
      '--', filePath,
    ]);

    // Some containers print one line per stream, or a trailing separator
    const firstLine = stdout.split('\n', 1)[0] ?? '';
    const resolution = firstLine.trim().replace(/x$/, '');

    if (!FILENAME_TAG.RESOLUTION.test(resolution)) {
      throw new ProcessError(this.binary, 0, `invalid resolution format: ${resolution}`, {
        service: 'ffprobe',
        operation: 'getResolution',
        metadata: { filePath },
      });
    }

    return resolution;
  }

  async getDurationSeconds(filePath: string): Promise<number> {
    const stdout = await this.probe(filePath, [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      '--', filePath,
    ]);

    const seconds = parseFloat(stdout.trim());
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new ProcessError(this.binary, 0, `failed to parse duration: ${stdout.trim()}`, {
        service: 'ffprobe',
        operation: 'getDurationSeconds',
        metadata: { filePath },
      });
    }

    return seconds;
  }

  private async probe(filePath: string, args: string[]): Promise<string> {
    const startTime = Date.now();
    try {
      const { stdout } = await this.run(this.binary, args, { timeout: this.timeoutMs });

      logger.debug('FFprobe call completed', {
        service: 'ffprobe',
        filePath,
        timeMs: Date.now() - startTime,
      });

      return stdout;
    } catch (error) {
      logger.debug('FFprobe call failed', {
        service: 'ffprobe',
        filePath,
        error: getErrorMessage(error),
      });

      throw new ProcessError(
        this.binary,
        getExitCode(error) ?? -1,
        getErrorMessage(error),
        { service: 'ffprobe', durationMs: Date.now() - startTime, metadata: { filePath } },
        toError(error)
      );
    }
  }
}
