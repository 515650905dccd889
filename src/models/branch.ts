// Branch models

import { Snapshot } from './snapshot.js';

/**
 * A named, independent line of snapshot history
 */
export interface Branch {
  name: string;
  /** ISO-8601 creation time, or "Unknown" for records that never had one */
  created: string;
  description: string;
  /** Branch this one was forked from; absent for the root branch */
  parent?: string;
  /** Append-only, oldest first */
  snapshots: Snapshot[];
}

/**
 * Row returned by listBranches
 */
export interface BranchSummary {
  name: string;
  isCurrent: boolean;
  created: string;
  description: string;
  snapshotCount: number;
}
