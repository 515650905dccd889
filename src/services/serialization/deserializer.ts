// Timeline document deserializer

import { Branch } from '../../models/branch.js';
import { RestoreRecord, Snapshot } from '../../models/snapshot.js';
import { Stash } from '../../models/stash.js';
import { TimelineState } from '../../models/timeline.js';
import { SnapshotRecord, StashRecord, TimelineDocument } from '../../core/schemas.js';
import { parseDocument } from './parser.js';

/**
 * Deserializes the text of timeline.json into a timeline state
 *
 * @throws ParseError if the input is malformed
 */
export function deserialize(input: string): TimelineState {
  return fromDocument(parseDocument(input));
}

/**
 * Converts a validated on-disk document into the in-memory model.
 * A current branch that has no entry gets an empty one.
 */
export function fromDocument(document: TimelineDocument): TimelineState {
  const branches = new Map<string, Branch>();

  for (const [name, record] of Object.entries(document.branches)) {
    const branch: Branch = {
      name,
      created: record.created,
      description: record.description,
      snapshots: record.snapshots.map(snapshot => toSnapshot(snapshot, name))
    };
    if (record.parent) {
      branch.parent = record.parent;
    }
    branches.set(name, branch);
  }

  const currentBranch = document.current_branch;
  if (!branches.has(currentBranch)) {
    branches.set(currentBranch, {
      name: currentBranch,
      created: 'Unknown',
      description: `Branch ${currentBranch}`,
      snapshots: []
    });
  }

  return {
    branches,
    currentBranch,
    stashes: document.stashes.map(toStash)
  };
}

/**
 * Infers the snapshot kind from the keys present on the record
 */
function toSnapshot(record: SnapshotRecord, owner: string): Snapshot {
  const base = {
    id: record.id,
    message: record.message,
    timestamp: record.timestamp,
    auto: record.auto,
    branch: record.branch ?? owner
  };

  if (record.restored_from !== undefined) {
    const snapshot: RestoreRecord = {
      ...base,
      kind: 'restore',
      restoredFrom: record.restored_from,
      sourceBranch: record.source_branch ?? owner
    };
    if (record.pre_restore_snapshot) {
      snapshot.preRestoreSnapshot = record.pre_restore_snapshot;
    }
    return snapshot;
  }

  if (record.stash_applied !== undefined) {
    return { ...base, kind: 'stash-apply', stashApplied: record.stash_applied };
  }

  return { ...base, kind: 'plain' };
}

function toStash(record: StashRecord): Stash {
  return {
    id: record.id,
    message: record.message,
    timestamp: record.timestamp,
    branch: record.branch
  };
}
