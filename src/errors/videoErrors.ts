/**
 * Video Processing Error Classes
 *
 * Per-file failures raised while tagging, verifying or deleting videos.
 * None of them abort a tagging batch; the pipeline records them next to the
 * successes and moves on.
 */

import {
  ErrorCode,
  ErrorContext,
  FileSystemError,
  OperationalError,
} from './ApplicationError.js';

/**
 * Step of metadata extraction that failed
 */
export type ExtractionStage = 'resolution' | 'duration' | 'hash';

/**
 * Prober or hashing failure for one file. The collaborator's message is kept verbatim.
 */
export class MetadataExtractionError extends OperationalError {
  constructor(
    public readonly stage: ExtractionStage,
    public readonly filePath: string,
    cause?: Error,
    context?: ErrorContext,
    code: ErrorCode = ErrorCode.TAG_METADATA_EXTRACTION_FAILED
  ) {
    super(
      `failed to get ${stage}: ${cause?.message ?? 'unknown error'}`,
      code,
      true, // Retried on the next run, never within one
      { ...context, operation: stage, metadata: { ...context?.metadata, filePath, stage } },
      cause
    );
  }
}

export class HashComputationError extends MetadataExtractionError {
  constructor(filePath: string, cause?: Error, context?: ErrorContext) {
    super('hash', filePath, cause, context, ErrorCode.TAG_HASH_COMPUTATION_FAILED);
  }
}

/**
 * The tagged name could not be applied; the file stays untagged.
 */
export class RenameFailedError extends FileSystemError {
  constructor(
    path: string,
    public readonly targetPath: string,
    cause?: Error,
    context?: ErrorContext
  ) {
    super(
      `failed to rename file: ${cause?.message ?? 'unknown error'}`,
      ErrorCode.FS_RENAME_FAILED,
      path,
      true,
      { ...context, operation: 'rename', metadata: { ...context?.metadata, targetPath } },
      cause
    );
  }
}

/**
 * A delete inside a pending deletion batch failed; the rest of the batch was not attempted.
 */
export class FileDeleteError extends FileSystemError {
  constructor(path: string, cause?: Error, context?: ErrorContext) {
    super(
      `failed to delete ${path}: ${cause?.message ?? 'unknown error'}`,
      ErrorCode.FS_DELETE_FAILED,
      path,
      false,
      { ...context, operation: 'delete' },
      cause
    );
  }
}

/**
 * The accelerated enumerator is missing or exited non-zero. Callers fall back to the walk.
 */
export class DiscoveryUnavailableError extends OperationalError {
  constructor(
    public readonly enumerator: string,
    message?: string,
    cause?: Error
  ) {
    super(
      message || `${enumerator} is unavailable`,
      ErrorCode.DISCOVERY_UNAVAILABLE,
      false,
      { service: 'discovery', metadata: { enumerator } },
      cause
    );
  }
}
