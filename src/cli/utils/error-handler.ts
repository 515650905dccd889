// CLI error handling utilities

import {
  RewindError,
  ValidationError,
  StorageError,
  StorageCorruptError,
  LockError
} from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof StorageCorruptError) {
    return `Corrupt Timeline: ${error.message}`;
  }

  if (error instanceof LockError) {
    return `Locked: ${error.message}`;
  }

  if (error instanceof StorageError) {
    const cause = typeof error.context?.cause === 'string' ? ` (${error.context.cause})` : '';
    return `Storage Error: ${error.message}${cause}`;
  }

  if (error instanceof RewindError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error: the error's own for rewind errors, else 1
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof RewindError ? error.exitCode : 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async CLI action with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`✓ ${message}`);
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.log(`ℹ ${message}`);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.warn(`⚠ ${message}`);
}

/**
 * Print a failure for an operation that returned false, and mark the exit code
 */
export function fail(message: string): void {
  console.error(`✗ ${message}`);
  process.exitCode = 1;
}
