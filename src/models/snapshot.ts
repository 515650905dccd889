// Snapshot models

import { SnapshotKind } from './types.js';

/**
 * Fields shared by every snapshot kind
 */
interface SnapshotBase {
  /** Unique identifier across the whole store (e.g., snap_1700000000) */
  id: string;
  kind: SnapshotKind;
  message: string;
  /** ISO-8601 creation time */
  timestamp: string;
  /** True when created by the tool rather than on explicit request */
  auto: boolean;
  /** Branch the snapshot was appended to */
  branch: string;
}

/**
 * An ordinary checkpoint
 */
export interface PlainSnapshot extends SnapshotBase {
  kind: 'plain';
}

/**
 * Records that the state was rolled back to an earlier snapshot
 */
export interface RestoreRecord extends SnapshotBase {
  kind: 'restore';
  /** Id of the snapshot restored to */
  restoredFrom: string;
  /** Branch that owned the restored snapshot */
  sourceBranch: string;
  /** Safety snapshot taken just before the restore, absent when skipped */
  preRestoreSnapshot?: string;
}

/**
 * Records that a stash was applied onto the branch
 */
export interface StashApplyRecord extends SnapshotBase {
  kind: 'stash-apply';
  stashApplied: string;
}

export type Snapshot = PlainSnapshot | RestoreRecord | StashApplyRecord;

export function isRestoreRecord(snapshot: Snapshot): snapshot is RestoreRecord {
  return snapshot.kind === 'restore';
}

export function isStashApplyRecord(snapshot: Snapshot): snapshot is StashApplyRecord {
  return snapshot.kind === 'stash-apply';
}
