/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors
export {
  ValidationError,
  InputValidationError,
} from './ApplicationError.js';

// Operational errors
export {
  OperationalError,
  FileSystemError,
  FileNotFoundError,
} from './ApplicationError.js';

// Permanent errors
export {
  PermanentError,
  ConfigurationError,
  SystemError,
  ProcessError,
  DependencyError,
} from './ApplicationError.js';

// Per-file video errors
export {
  MetadataExtractionError,
  HashComputationError,
  RenameFailedError,
  FileDeleteError,
  DiscoveryUnavailableError,
  type ExtractionStage,
} from './videoErrors.js';
