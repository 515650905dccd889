// Timeline document serializer

import { Snapshot } from '../../models/snapshot.js';
import { Stash } from '../../models/stash.js';
import { TimelineState } from '../../models/timeline.js';
import { BranchRecord, SnapshotRecord, StashRecord, TimelineDocument } from '../../core/schemas.js';

/**
 * Serializes a timeline state to the text of timeline.json
 */
export function serialize(state: TimelineState): string {
  return `${JSON.stringify(toDocument(state), null, 2)}\n`;
}

/**
 * Converts the in-memory model into the on-disk document shape
 */
export function toDocument(state: TimelineState): TimelineDocument {
  const branches: Record<string, BranchRecord> = {};

  for (const branch of state.branches.values()) {
    const record: BranchRecord = {
      created: branch.created,
      description: branch.description,
      snapshots: branch.snapshots.map(toSnapshotRecord)
    };
    if (branch.parent) {
      record.parent = branch.parent;
    }
    branches[branch.name] = record;
  }

  return {
    branches,
    current_branch: state.currentBranch,
    stashes: state.stashes.map(toStashRecord)
  };
}

function toSnapshotRecord(snapshot: Snapshot): SnapshotRecord {
  const record: SnapshotRecord = {
    id: snapshot.id,
    message: snapshot.message,
    timestamp: snapshot.timestamp,
    auto: snapshot.auto,
    branch: snapshot.branch
  };

  switch (snapshot.kind) {
    case 'plain':
      break;
    case 'restore':
      record.restored_from = snapshot.restoredFrom;
      record.source_branch = snapshot.sourceBranch;
      if (snapshot.preRestoreSnapshot) {
        record.pre_restore_snapshot = snapshot.preRestoreSnapshot;
      }
      break;
    case 'stash-apply':
      record.stash_applied = snapshot.stashApplied;
      record.type = 'stash_apply';
      break;
  }

  return record;
}

function toStashRecord(stash: Stash): StashRecord {
  return {
    id: stash.id,
    message: stash.message,
    timestamp: stash.timestamp,
    branch: stash.branch,
    type: 'stash'
  };
}
