/**
 * Type-safe error inspection for dish-dev
 */

/**
 * Error raised by the OS when a child process cannot be spawned
 */
export interface SpawnError extends Error {
  code: 'ENOENT' | 'EACCES' | string;
  errno?: number;
  syscall?: string;
  path?: string;
}

/**
 * Type guard to check if error carries a system error code
 */
export function isSpawnError(error: unknown): error is SpawnError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Type guard to check if error is standard Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Safe error message extraction with fallback
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'Unknown error occurred';
}
