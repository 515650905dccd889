// Timeline document model

import { Branch } from './branch.js';
import { Snapshot } from './snapshot.js';
import { Stash } from './stash.js';

/**
 * The whole persisted document
 */
export interface TimelineState {
  /** Keyed by branch name; insertion order is the listing order */
  branches: Map<string, Branch>;
  currentBranch: string;
  /** Stack of stashes, oldest first */
  stashes: Stash[];
}

/**
 * Summary of the store used by `rewind info` without an id
 */
export interface TimelineStatus {
  currentBranch: string;
  branchCount: number;
  /** Snapshots on the current branch */
  snapshotCount: number;
  stashCount: number;
  latestSnapshot?: Snapshot;
}
