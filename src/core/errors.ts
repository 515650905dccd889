// Domain-specific error types for rewind

/**
 * Base error class for all rewind errors
 */
export abstract class RewindError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for invalid input
 */
export class ValidationError extends RewindError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * The backing store could not be read or written for OS reasons
 */
export class StorageError extends RewindError {
  readonly code = 'STORAGE_ERROR';
  readonly exitCode = 3;

  constructor(message: string, public readonly path: string, public readonly cause?: unknown) {
    super(message, { path, cause: cause instanceof Error ? cause.message : cause });
  }
}

/**
 * Another writer holds the timeline lock
 */
export class LockError extends RewindError {
  readonly code = 'LOCK_ERROR';
  readonly exitCode = 3;

  constructor(public readonly path: string, cause?: unknown) {
    super(`Timeline is locked by another process: ${path}`, {
      path,
      cause: cause instanceof Error ? cause.message : cause
    });
  }
}

/**
 * The timeline document exists but cannot be parsed
 */
export class StorageCorruptError extends RewindError {
  readonly code = 'STORAGE_CORRUPT';
  readonly exitCode = 4;

  constructor(public readonly path: string, reason: string) {
    super(
      `Timeline document is corrupt: ${path} (${reason}). ` +
      `Restore it from a backup or move it aside to start a fresh timeline.`,
      { path, reason }
    );
  }
}
