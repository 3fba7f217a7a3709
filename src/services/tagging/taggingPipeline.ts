import { EventEmitter } from 'events';
import fs from 'fs/promises';
import { logger } from '../../middleware/logging.js';
import { createErrorLogContext, getErrorCode, toError } from '../../utils/errorHandling.js';
import {
  ApplicationError,
  ErrorCode,
  FileNotFoundError,
  FileSystemError,
  RenameFailedError,
} from '../../errors/index.js';
import { TaggingEvent } from '../../types/events.js';
import { ExtractedMetadata, SkipReason } from '../../types/video.js';
import { encodeFilename, isTagged, isVideoFile } from '../media/filenameCodec.js';
import { MetadataProber } from '../media/ffprobeService.js';
import { extractVideoMetadata } from '../media/metadataExtractor.js';
import { DiscoveryService } from '../scan/discoveryService.js';

/**
 * Tagging Pipeline
 *
 * Hashes and probes untagged videos and renames each one to carry its
 * metadata. A fixed pool of workers drains a queue that is filled once up
 * front; each worker takes one file end to end before pulling the next.
 * Per-file failures land in the result list and never stop the batch.
 */

export type TagResult =
  | { status: 'tagged'; path: string; newPath: string }
  | { status: 'skipped'; path: string; reason: SkipReason }
  | { status: 'failed'; path: string; error: ApplicationError };

export interface TagSummary {
  tagged: number;
  skipped: number;
  failed: number;
}

export interface TaggingPipelineOptions {
  prober: MetadataProber;
  /** Minimum spacing of worker-progress events per file */
  progressIntervalMs?: number;
  /** Replaceable for tests; defaults to fs.rename */
  renameFile?: (from: string, to: string) => Promise<void>;
}

export class TaggingPipeline extends EventEmitter {
  private readonly prober: MetadataProber;
  private readonly progressIntervalMs: number;
  private readonly renameFile: (from: string, to: string) => Promise<void>;

  constructor(options: TaggingPipelineOptions) {
    super();
    this.prober = options.prober;
    this.progressIntervalMs = options.progressIntervalMs ?? 50;
    this.renameFile = options.renameFile ?? ((from, to) => fs.rename(from, to));
  }

  onEvent(listener: (event: TaggingEvent) => void): this {
    return this.on('event', listener);
  }

  onResult(listener: (result: TagResult) => void): this {
    return this.on('result', listener);
  }

  /**
   * Tag every path with up to workerCount files in flight.
   * Resolves once all workers have exited; result order follows completion, not input.
   */
  async processBatch(filePaths: readonly string[], workerCount: number): Promise<TagResult[]> {
    const total = filePaths.length;
    const results: TagResult[] = [];
    let completed = 0;

    const record = (result: TagResult): void => {
      results.push(result);
      completed++;
      this.emit('result', result);
      this.publish({ type: 'overall-progress', completed, total });
    };

    logger.info(`Tagging ${total} files with ${Math.min(workerCount, total)} workers`, {
      service: 'tagging',
    });

    // Single file or single worker: same per-file logic, no pool
    if (total <= 1 || workerCount <= 1) {
      for (const filePath of filePaths) {
        record(await this.processFile(filePath, 1));
      }
      return results;
    }

    const queue = [...filePaths];
    const workers = Array.from({ length: Math.min(workerCount, total) }, async (_, index) => {
      const workerId = index + 1;
      let filePath = queue.shift();
      while (filePath !== undefined) {
        record(await this.processFile(filePath, workerId));
        filePath = queue.shift();
      }
    });

    await Promise.all(workers);
    return results;
  }

  /**
   * Tag one file. Never rejects: every outcome is a TagResult.
   */
  async processFile(filePath: string, workerId = 1): Promise<TagResult> {
    let size: number;
    try {
      const stats = await fs.stat(filePath);
      if (stats.isDirectory()) {
        return { status: 'skipped', path: filePath, reason: 'directory' };
      }
      size = stats.size;
    } catch (error) {
      const cause = toError(error);
      const failure = getErrorCode(error) === 'ENOENT'
        ? new FileNotFoundError(filePath, undefined, { service: 'tagging' }, cause)
        : new FileSystemError(cause.message, ErrorCode.FS_READ_FAILED, filePath, false, { service: 'tagging' }, cause);
      return this.fail(filePath, workerId, failure, false);
    }

    if (!isVideoFile(filePath)) {
      return { status: 'skipped', path: filePath, reason: 'not-a-video-file' };
    }

    if (isTagged(filePath)) {
      return { status: 'skipped', path: filePath, reason: 'already-tagged' };
    }

    this.publish({ type: 'worker-started', workerId, path: filePath });

    let lastProgressAt = 0;
    let metadata: ExtractedMetadata;
    try {
      metadata = await extractVideoMetadata(filePath, this.prober, {
        size,
        onHashProgress: ({ bytesRead, totalBytes }) => {
          const now = Date.now();
          const finished = bytesRead >= totalBytes;
          if (!finished && now - lastProgressAt < this.progressIntervalMs) {
            return;
          }
          lastProgressAt = now;
          this.publish({
            type: 'worker-progress',
            workerId,
            path: filePath,
            progress: totalBytes > 0 ? Math.min(1, bytesRead / totalBytes) : 1,
            bytesRead,
            totalBytes,
          });
        },
      });
    } catch (error) {
      const failure = error instanceof ApplicationError
        ? error
        : new FileSystemError(toError(error).message, ErrorCode.FS_READ_FAILED, filePath, false, { service: 'tagging' }, toError(error));
      return this.fail(filePath, workerId, failure, true);
    }

    let newPath: string;
    try {
      newPath = encodeFilename(filePath, metadata);
    } catch (error) {
      const failure = error instanceof ApplicationError
        ? error
        : new FileSystemError(toError(error).message, ErrorCode.FS_RENAME_FAILED, filePath, false, { service: 'tagging' }, toError(error));
      return this.fail(filePath, workerId, failure, true);
    }

    try {
      await assertTargetFree(newPath);
      await this.renameFile(filePath, newPath);
    } catch (error) {
      return this.fail(filePath, workerId, new RenameFailedError(filePath, newPath, toError(error), { service: 'tagging' }), true);
    }

    logger.debug('Tagged file', { service: 'tagging', filePath, newPath, workerId });
    this.publish({ type: 'worker-completed', workerId, path: filePath, success: true, newPath });
    return { status: 'tagged', path: filePath, newPath };
  }

  private fail(filePath: string, workerId: number, error: ApplicationError, started: boolean): TagResult {
    logger.warn(`Failed to tag ${filePath}`, createErrorLogContext(error, { service: 'tagging', workerId }));
    if (started) {
      this.publish({ type: 'worker-completed', workerId, path: filePath, success: false, error: error.message });
    }
    return { status: 'failed', path: filePath, error };
  }

  private publish(event: TaggingEvent): void {
    this.emit('event', event);
  }
}

/**
 * Rename would silently replace an existing file, such as an earlier copy
 * already tagged with the same content.
 */
async function assertTargetFree(target: string): Promise<void> {
  try {
    await fs.lstat(target);
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return;
    }
    throw error;
  }
  throw new Error(`target already exists: ${target}`);
}

/**
 * Turn command-line arguments into a work list: directories expand to their
 * untagged videos, files pass through as given. A path that cannot be
 * stat'ed fails the whole expansion before any file is touched.
 */
export async function expandInputs(inputs: readonly string[], discovery: DiscoveryService): Promise<string[]> {
  const expanded: string[] = [];

  for (const input of inputs) {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(input)).isDirectory();
    } catch (error) {
      throw new FileNotFoundError(
        input,
        `cannot access ${input}: ${toError(error).message}`,
        { service: 'tagging', operation: 'expandInputs' },
        toError(error)
      );
    }

    if (isDirectory) {
      expanded.push(...(await discovery.findUntagged(input)));
    } else {
      expanded.push(input);
    }
  }

  return expanded;
}

/**
 * Aggregate counts for a finished batch
 */
export function summarizeResults(results: readonly TagResult[]): TagSummary {
  const summary: TagSummary = { tagged: 0, skipped: 0, failed: 0 };
  for (const result of results) {
    summary[result.status]++;
  }
  return summary;
}
