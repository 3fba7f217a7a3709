/**
 * Error hierarchy
 *
 * Three branches: usage errors (bad arguments), operational errors (one
 * file or one run failed) and permanent errors (broken configuration or
 * tooling). Each carries a code, an exit status and log context.
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // File System Errors
  FS_FILE_NOT_FOUND = 'FS_FILE_NOT_FOUND',
  FS_READ_FAILED = 'FS_READ_FAILED',
  FS_RENAME_FAILED = 'FS_RENAME_FAILED',
  FS_DELETE_FAILED = 'FS_DELETE_FAILED',

  // Tagging Errors
  TAG_METADATA_EXTRACTION_FAILED = 'TAG_METADATA_EXTRACTION_FAILED',
  TAG_HASH_COMPUTATION_FAILED = 'TAG_HASH_COMPUTATION_FAILED',

  // Discovery Errors
  DISCOVERY_UNAVAILABLE = 'DISCOVERY_UNAVAILABLE',

  // Configuration Errors
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System Errors
  SYSTEM_PROCESS_FAILED = 'SYSTEM_PROCESS_FAILED',
  SYSTEM_DEPENDENCY_MISSING = 'SYSTEM_DEPENDENCY_MISSING',
}

/**
 * Structured metadata attached to every error and copied into log lines
 */
export interface ErrorContext {
  service?: string;
  /** e.g. 'getResolution', 'rename' */
  operation?: string;
  durationMs?: number;
  metadata?: Record<string, unknown>;
}

interface ErrorOptions {
  /** false marks a bug rather than an expected failure */
  isOperational?: boolean;
  /** true when the next run may succeed where this one failed */
  retryable?: boolean;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Root of every error reeltag throws on purpose.
 *
 * `exitStatus` is what the CLI exits with when the error ends a command:
 * 1 for per-run failures, 2 for bad usage, 70 for broken tools, 78 for bad
 * configuration.
 */
export abstract class ApplicationError extends Error {
  readonly code: ErrorCode;
  readonly exitStatus: number;
  readonly isOperational: boolean;
  readonly retryable: boolean;
  readonly context: ErrorContext;
  readonly timestamp = new Date();

  constructor(message: string, code: ErrorCode, exitStatus: number, options: ErrorOptions = {}) {
    super(message, options.cause ? { cause: options.cause } : undefined);

    this.name = new.target.name;
    this.code = code;
    this.exitStatus = exitStatus;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  toJSON(): Record<string, unknown> {
    const { cause } = this;
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitStatus: this.exitStatus,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      ...(cause instanceof Error && { cause: { name: cause.name, message: cause.message } }),
    };
  }
}

// ============================================
// USAGE ERRORS (exit 2)
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, 2, { context, cause });
  }
}

/**
 * A single bad value, named by field
 */
export class InputValidationError extends ValidationError {
  constructor(readonly field: string, message: string, context?: ErrorContext) {
    super(message, { ...context, metadata: { ...context?.metadata, field } });
  }
}

// ============================================
// PER-RUN FAILURES (exit 1)
// ============================================

export class OperationalError extends ApplicationError {
  constructor(message: string, code: ErrorCode, retryable: boolean, context?: ErrorContext, cause?: Error) {
    super(message, code, 1, { retryable, context, cause });
  }
}

export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    readonly path: string,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, retryable, { ...context, metadata: { ...context?.metadata, path } }, cause);
  }
}

export class FileNotFoundError extends FileSystemError {
  constructor(path: string, message?: string, context?: ErrorContext, cause?: Error) {
    super(message ?? `File not found: ${path}`, ErrorCode.FS_FILE_NOT_FOUND, path, false, context, cause);
  }
}

// ============================================
// PERMANENT ERRORS (exit 70 / 78)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(message: string, code: ErrorCode, exitStatus: number, context?: ErrorContext, cause?: Error) {
    super(message, code, exitStatus, { isOperational: false, context, cause });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(readonly configKey: string, message?: string, context?: ErrorContext) {
    super(message ?? `Invalid configuration value: ${configKey}`, ErrorCode.CONFIG_INVALID, 78, {
      ...context,
      metadata: { ...context?.metadata, configKey },
    });
  }
}

/**
 * An external tool is missing or misbehaved
 */
export class SystemError extends PermanentError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, cause?: Error) {
    super(message, code, 70, context, cause);
  }
}

export class ProcessError extends SystemError {
  constructor(
    readonly processName: string,
    readonly exitCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message ?? `${processName} exited with code ${exitCode}`,
      ErrorCode.SYSTEM_PROCESS_FAILED,
      { ...context, metadata: { ...context?.metadata, processName, exitCode } },
      cause
    );
  }
}

export class DependencyError extends SystemError {
  constructor(readonly dependency: string, message?: string, context?: ErrorContext) {
    super(message ?? `${dependency} is not installed`, ErrorCode.SYSTEM_DEPENDENCY_MISSING, {
      ...context,
      metadata: { ...context?.metadata, dependency },
    });
  }
}
