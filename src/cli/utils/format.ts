// Human-readable output for timeline listings

import { BranchSummary } from '../../models/branch.js';
import { Snapshot } from '../../models/snapshot.js';
import { Stash } from '../../models/stash.js';
import { TimelineStatus } from '../../models/timeline.js';

const RULE = '='.repeat(60);

function markers(snapshot: Snapshot): string {
  const auto = snapshot.auto ? ' (auto)' : '';
  switch (snapshot.kind) {
    case 'restore':
      return `${auto} [RESTORE]`;
    case 'stash-apply':
      return `${auto} [STASH]`;
    case 'plain':
      return auto;
  }
}

export function formatBranches(branches: BranchSummary[]): string {
  if (branches.length === 0) {
    return 'No branches found.';
  }

  const lines = ['Branches:', RULE];
  for (const branch of branches) {
    lines.push(`${branch.isCurrent ? ' * ' : '   '}${branch.name}`);
    lines.push(`     Created: ${branch.created}`);
    lines.push(`     Snapshots: ${branch.snapshotCount}`);
    if (branch.description) {
      lines.push(`     Description: ${branch.description}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

export function formatSnapshots(snapshots: Snapshot[], branch: string): string {
  if (snapshots.length === 0) {
    return `No snapshots found in branch '${branch}'.`;
  }

  const lines = [`Snapshots in branch '${branch}':`, RULE];
  for (const snapshot of snapshots) {
    lines.push(`  ${snapshot.id}${markers(snapshot)}`);
    lines.push(`    Message: ${snapshot.message}`);
    lines.push(`    Time: ${snapshot.timestamp}`);
    if (snapshot.kind === 'restore') {
      lines.push(`    Restored from: ${snapshot.restoredFrom}`);
    } else if (snapshot.kind === 'stash-apply') {
      lines.push(`    Stash: ${snapshot.stashApplied}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

export function formatStashes(stashes: Stash[]): string {
  if (stashes.length === 0) {
    return 'No stashes found.';
  }

  const lines = ['Stashes:', RULE];
  for (const stash of stashes) {
    lines.push(`  ${stash.id}`);
    lines.push(`    Message: ${stash.message}`);
    lines.push(`    Branch: ${stash.branch}`);
    lines.push(`    Time: ${stash.timestamp}`);
    lines.push('');
  }
  return lines.join('\n');
}

/**
 * Detailed view of one snapshot, as returned by getSnapshotInfo
 */
export function formatSnapshotInfo(snapshot: Snapshot): string {
  const lines = [
    `Snapshot ${snapshot.id}${markers(snapshot)}`,
    `  Branch: ${snapshot.branch}`,
    `  Message: ${snapshot.message}`,
    `  Time: ${snapshot.timestamp}`,
    `  Automatic: ${snapshot.auto ? 'yes' : 'no'}`
  ];

  if (snapshot.kind === 'restore') {
    lines.push(`  Restored from: ${snapshot.restoredFrom} (branch ${snapshot.sourceBranch})`);
    lines.push(`  Safety snapshot: ${snapshot.preRestoreSnapshot ?? 'none'}`);
  } else if (snapshot.kind === 'stash-apply') {
    lines.push(`  Stash applied: ${snapshot.stashApplied}`);
  }

  return lines.join('\n');
}

export function formatStatus(status: TimelineStatus): string {
  const lines = [
    `Current branch: ${status.currentBranch}`,
    `Branches: ${status.branchCount}`,
    `Snapshots on current branch: ${status.snapshotCount}`,
    `Stashes: ${status.stashCount}`
  ];
  if (status.latestSnapshot) {
    lines.push(`Latest snapshot: ${status.latestSnapshot.id} - ${status.latestSnapshot.message}`);
  }
  return lines.join('\n');
}
