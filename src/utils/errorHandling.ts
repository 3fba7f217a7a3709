/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (error)` blocks. Thrown values reach us from
 * child processes, fs calls and stream errors, so nothing is assumed about
 * their shape.
 */

import { ApplicationError } from '../errors/ApplicationError.js';

const UNKNOWN_ERROR = 'An unknown error occurred';

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Message of any thrown value: Error, `{ message }`, or a bare string
 */
export function getErrorMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return UNKNOWN_ERROR;
}

/**
 * String `code` of a Node system error (ENOENT, EACCES, ...)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Numeric exit code of a failed child process
 */
export function getExitCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

/**
 * Log metadata for a caught value, merged with caller context.
 * ApplicationErrors log their full structured form, context included.
 */
export function createErrorLogContext(
  error: unknown,
  additionalContext: Record<string, unknown> = {}
): Record<string, unknown> {
  if (error instanceof ApplicationError) {
    return { ...error.toJSON(), ...additionalContext };
  }

  const stack = isError(error) ? error.stack : undefined;
  const code = getErrorCode(error);

  return {
    message: getErrorMessage(error),
    ...(stack && { stack }),
    ...(code && { code }),
    ...additionalContext,
  };
}

/**
 * Normalise a caught value so it can be passed on as a `cause`
 */
export function toError(error: unknown): Error {
  return isError(error) ? error : new Error(getErrorMessage(error));
}
