// Tests for CLI error formatting

import { describe, it, expect } from 'vitest';
import { formatError, exitCodeFor } from './error-handler.js';
import { LockError, StorageCorruptError, StorageError, ValidationError } from '../../core/errors.js';

describe('formatError', () => {
  it('should name the field of a validation error', () => {
    expect(formatError(new ValidationError('Invalid branch name', 'name'))).toBe(
      'Validation Error (field: name): Invalid branch name'
    );
  });

  it('should include the cause of a storage error', () => {
    const error = new StorageError('Cannot read timeline document: /x/timeline.json', '/x/timeline.json', new Error('EACCES'));
    expect(formatError(error)).toBe('Storage Error: Cannot read timeline document: /x/timeline.json (EACCES)');
  });

  it('should distinguish lock errors', () => {
    expect(formatError(new LockError('/x/timeline.json'))).toBe(
      'Locked: Timeline is locked by another process: /x/timeline.json'
    );
  });

  it('should fall back for plain values', () => {
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError('boom')).toBe('Unknown error: boom');
  });
});

describe('exitCodeFor', () => {
  it('should map error kinds to exit codes', () => {
    expect(exitCodeFor(new ValidationError('bad'))).toBe(2);
    expect(exitCodeFor(new StorageError('io', '/x'))).toBe(3);
    expect(exitCodeFor(new LockError('/x'))).toBe(3);
    expect(exitCodeFor(new StorageCorruptError('/x', 'syntax'))).toBe(4);
    expect(exitCodeFor(new Error('other'))).toBe(1);
  });
});
