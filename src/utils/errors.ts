import { types } from 'util';

/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (isError(error)) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return isError(error) ? error : new Error(String(error));
}

/**
 * Errors raised inside Node (fs, zlib, child_process) belong to another realm
 * under some runners, so `instanceof Error` is not enough.
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error || types.isNativeError(error);
}

/**
 * Node system error code (ENOENT, EACCES, ...) if the error carries one
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
