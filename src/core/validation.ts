// Input validation for names typed at the command line

import { ValidationError } from './errors.js';
import { BranchNameSchema } from './schemas.js';

/**
 * Validates a branch name and returns it trimmed
 */
export function validateBranchName(name: string): string {
  const trimmed = name.trim();
  const result = BranchNameSchema.safeParse(trimmed);

  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid branch name', 'name', { value: name });
  }

  if (trimmed.includes('..') || trimmed.endsWith('/')) {
    throw new ValidationError('Invalid branch name', 'name', { value: name });
  }

  return trimmed;
}
