// Zod schemas for the persisted timeline document

import { z } from 'zod';
import { DEFAULT_BRANCH } from '../models/types.js';

/**
 * Branch name: starts with a letter or digit, then letters, digits, . _ / -
 */
export const BranchNameSchema = z
  .string()
  .min(1, 'Branch name is required')
  .max(100, 'Branch name too long')
  .regex(/^[A-Za-z0-9][A-Za-z0-9._/-]*$/, 'Invalid branch name');

/**
 * Snapshot record as stored on disk.
 *
 * Kind is not stored; it is inferred from which of the record-specific
 * keys are present. Older documents wrote `pre_restore_snapshot: null`
 * for unsafe restores and ids such as `restore_<ts>`.
 */
export const SnapshotRecordSchema = z.object({
  id: z.string().min(1),
  message: z.string(),
  timestamp: z.string(),
  auto: z.boolean().default(false),
  branch: z.string().optional(),
  restored_from: z.string().optional(),
  source_branch: z.string().optional(),
  pre_restore_snapshot: z.string().nullable().optional(),
  stash_applied: z.string().optional(),
  type: z.string().optional()
});

/**
 * Stash record as stored on disk
 */
export const StashRecordSchema = z.object({
  id: z.string().min(1),
  message: z.string(),
  timestamp: z.string(),
  branch: z.string(),
  type: z.literal('stash').optional()
});

/**
 * Branch record as stored on disk (the name is the map key)
 */
export const BranchRecordSchema = z.object({
  created: z.string().default('Unknown'),
  description: z.string().default(''),
  parent: z.string().nullable().optional(),
  snapshots: z.array(SnapshotRecordSchema).default([])
});

/**
 * The whole timeline.json document
 */
export const TimelineDocumentSchema = z.object({
  branches: z.record(BranchRecordSchema),
  current_branch: z.string().min(1).default(DEFAULT_BRANCH),
  stashes: z.array(StashRecordSchema).default([])
});

/**
 * Type exports
 */
export type SnapshotRecord = z.infer<typeof SnapshotRecordSchema>;
export type StashRecord = z.infer<typeof StashRecordSchema>;
export type BranchRecord = z.infer<typeof BranchRecordSchema>;
export type TimelineDocument = z.infer<typeof TimelineDocumentSchema>;

/**
 * Safe validation (returns result instead of throwing)
 */
export function safeValidateDocument(data: unknown) {
  return TimelineDocumentSchema.safeParse(data);
}

/**
 * One-line description of the first few issues of a failed parse
 */
export function describeIssues(error: z.ZodError, limit: number = 3): string {
  return error.issues
    .slice(0, limit)
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
