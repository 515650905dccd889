/**
 * Timeline Service
 *
 * Owns the branch/snapshot/stash timeline. Every operation is one
 * read-modify-write cycle against the file store; "not found" and
 * "already exists" outcomes are reported as false/null, never thrown.
 * Restores and stash applications are only recorded here; acting on
 * them is left to whoever consumes the log.
 */

import { Branch, BranchSummary } from '../../models/branch.js';
import { Snapshot } from '../../models/snapshot.js';
import { Stash } from '../../models/stash.js';
import { TimelineState, TimelineStatus } from '../../models/timeline.js';
import { logger } from '../../core/logger.js';
import { Clock, IdGenerator, systemClock } from '../id-generator.js';
import { CorruptionPolicy, TimelineFileStore } from '../storage/file-store.js';

/**
 * Options for creating a timeline service
 */
export interface TimelineServiceOptions {
  /** Root directory of the timeline */
  baseDir: string;
  onCorrupt?: CorruptionPolicy;
  lockRetries?: number;
  clock?: Clock;
}

export const DEFAULT_STASH_MESSAGE = 'Stashed changes';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * Snapshot fields supplied by the caller; id, timestamp and branch are filled in
 */
type SnapshotFields = DistributiveOmit<Snapshot, 'id' | 'timestamp' | 'branch'>;

/**
 * Timeline store operations
 */
export interface ITimelineService {
  initialize(): Promise<boolean>;
  currentBranch(): Promise<string>;
  listBranches(): Promise<BranchSummary[]>;
  listSnapshots(branch?: string): Promise<Snapshot[]>;
  createBranch(name: string, description?: string, fromBranch?: string): Promise<boolean>;
  switchBranch(name: string): Promise<boolean>;
  createSnapshot(message: string, auto?: boolean): Promise<string>;
  restoreSnapshot(id: string, safe?: boolean): Promise<boolean>;
  createStash(message?: string): Promise<string>;
  listStashes(): Promise<Stash[]>;
  applyStash(id?: string, pop?: boolean): Promise<boolean>;
  dropStash(id?: string): Promise<boolean>;
  getSnapshotInfo(id: string): Promise<Snapshot | null>;
  getStatus(): Promise<TimelineStatus>;
}

export type TimelineStore = ITimelineService;

function* snapshotIds(state: TimelineState): Generator<string> {
  for (const branch of state.branches.values()) {
    for (const snapshot of branch.snapshots) {
      yield snapshot.id;
    }
  }
}

/**
 * Stash ids still on the stack plus those referenced by apply records,
 * so a popped or dropped stash id is never handed out again
 */
function* stashIds(state: TimelineState): Generator<string> {
  for (const stash of state.stashes) {
    yield stash.id;
  }
  for (const branch of state.branches.values()) {
    for (const snapshot of branch.snapshots) {
      if (snapshot.kind === 'stash-apply') {
        yield snapshot.stashApplied;
      }
    }
  }
}

/**
 * First snapshot with the given id, in branch order
 */
function findSnapshot(state: TimelineState, id: string): { snapshot: Snapshot; owner: string } | null {
  for (const branch of state.branches.values()) {
    const snapshot = branch.snapshots.find(s => s.id === id);
    if (snapshot) {
      return { snapshot, owner: branch.name };
    }
  }
  return null;
}

/**
 * Index of the targeted stash: the one with `id`, or the most recent
 */
function findStashIndex(stashes: Stash[], id?: string): number {
  if (!id) {
    return stashes.length - 1;
  }
  return stashes.findIndex(s => s.id === id);
}

/**
 * Timeline Service Implementation
 */
export class TimelineService implements ITimelineService {
  private readonly store: TimelineFileStore;
  private readonly ids: IdGenerator;
  private readonly clock: Clock;

  constructor(options: TimelineServiceOptions) {
    this.clock = options.clock ?? systemClock;
    this.ids = new IdGenerator(this.clock);
    this.store = new TimelineFileStore(
      {
        baseDir: options.baseDir,
        ...(options.onCorrupt !== undefined && { onCorrupt: options.onCorrupt }),
        ...(options.lockRetries !== undefined && { lockRetries: options.lockRetries })
      },
      this.clock
    );
  }

  /**
   * Creates the root directory and default document if absent
   */
  async initialize(): Promise<boolean> {
    return this.store.initialize();
  }

  async currentBranch(): Promise<string> {
    const state = await this.store.load();
    return state.currentBranch;
  }

  /**
   * Lists branches in stored order
   */
  async listBranches(): Promise<BranchSummary[]> {
    const state = await this.store.load();
    return [...state.branches.values()].map(branch => ({
      name: branch.name,
      isCurrent: branch.name === state.currentBranch,
      created: branch.created,
      description: branch.description,
      snapshotCount: branch.snapshots.length
    }));
  }

  /**
   * Snapshots of a branch (default: current), oldest first; empty for unknown branches
   */
  async listSnapshots(branch?: string): Promise<Snapshot[]> {
    const state = await this.store.load();
    return state.branches.get(branch || state.currentBranch)?.snapshots ?? [];
  }

  /**
   * Forks a new branch from `fromBranch` (default: current) without switching to it.
   * The new branch starts with a copy of the source history, or with an empty
   * history when the source branch does not exist.
   *
   * @returns false if the name is taken
   */
  async createBranch(name: string, description: string = '', fromBranch?: string): Promise<boolean> {
    return this.store.transaction(state => {
      if (state.branches.has(name)) {
        return { result: false, changed: false };
      }

      const sourceName = fromBranch || state.currentBranch;
      const source = state.branches.get(sourceName);

      state.branches.set(name, {
        name,
        created: this.clock().toISOString(),
        description,
        parent: sourceName,
        snapshots: structuredClone(source?.snapshots ?? [])
      });
      logger.debug('Created branch', { name, from: sourceName, copied: source !== undefined });
      return { result: true, changed: true };
    });
  }

  async switchBranch(name: string): Promise<boolean> {
    return this.store.transaction(state => {
      if (!state.branches.has(name)) {
        return { result: false, changed: false };
      }
      state.currentBranch = name;
      logger.debug('Switched branch', { name });
      return { result: true, changed: true };
    });
  }

  /**
   * Appends a plain snapshot to the current branch
   *
   * @returns The new snapshot id
   */
  async createSnapshot(message: string, auto: boolean = false): Promise<string> {
    return this.store.transaction(state => {
      const snapshot = this.appendSnapshot(state, { kind: 'plain', message, auto });
      return { result: snapshot.id, changed: true };
    });
  }

  /**
   * Records a restore to `id` on the current branch, preceded by an
   * automatic safety snapshot unless `safe` is false. Both records are
   * written in the same transaction.
   *
   * @returns false if no branch holds a snapshot with that id
   */
  async restoreSnapshot(id: string, safe: boolean = true): Promise<boolean> {
    return this.store.transaction(state => {
      const found = findSnapshot(state, id);
      if (!found) {
        return { result: false, changed: false };
      }

      let preRestoreSnapshot: string | undefined;
      if (safe) {
        preRestoreSnapshot = this.appendSnapshot(state, {
          kind: 'plain',
          message: `Auto-snapshot before restore to ${id}`,
          auto: true
        }).id;
      }

      this.appendSnapshot(state, {
        kind: 'restore',
        message: `Restored to snapshot ${id}: ${found.snapshot.message}`,
        auto: false,
        restoredFrom: id,
        sourceBranch: found.owner,
        ...(preRestoreSnapshot !== undefined && { preRestoreSnapshot })
      });
      logger.debug('Recorded restore', { id, sourceBranch: found.owner, safe });
      return { result: true, changed: true };
    });
  }

  /**
   * Pushes a stash tagged with the current branch
   *
   * @returns The new stash id
   */
  async createStash(message: string = DEFAULT_STASH_MESSAGE): Promise<string> {
    return this.store.transaction(state => {
      const stash: Stash = {
        id: this.ids.generateId('stash', stashIds(state)),
        message,
        timestamp: this.clock().toISOString(),
        branch: state.currentBranch
      };
      state.stashes.push(stash);
      logger.debug('Created stash', { id: stash.id, branch: stash.branch });
      return { result: stash.id, changed: true };
    });
  }

  /**
   * All stashes, oldest first
   */
  async listStashes(): Promise<Stash[]> {
    const state = await this.store.load();
    return state.stashes;
  }

  /**
   * Records the application of a stash (default: most recent) on the
   * current branch, removing it from the stack when `pop` is set
   *
   * @returns false if the stack is empty or `id` is unknown
   */
  async applyStash(id?: string, pop: boolean = false): Promise<boolean> {
    return this.store.transaction(state => {
      const index = findStashIndex(state.stashes, id);
      const stash = state.stashes[index];
      if (index < 0 || !stash) {
        return { result: false, changed: false };
      }

      this.appendSnapshot(state, {
        kind: 'stash-apply',
        message: `Applied stash ${stash.id}: ${stash.message}`,
        auto: false,
        stashApplied: stash.id
      });
      if (pop) {
        state.stashes.splice(index, 1);
      }
      logger.debug('Applied stash', { id: stash.id, pop });
      return { result: true, changed: true };
    });
  }

  /**
   * Removes a stash (default: most recent) without recording anything
   *
   * @returns false if the stack is empty or `id` is unknown
   */
  async dropStash(id?: string): Promise<boolean> {
    return this.store.transaction(state => {
      const index = findStashIndex(state.stashes, id);
      if (index < 0) {
        return { result: false, changed: false };
      }
      const [dropped] = state.stashes.splice(index, 1);
      logger.debug('Dropped stash', { id: dropped?.id });
      return { result: true, changed: true };
    });
  }

  /**
   * Looks a snapshot up across all branches
   *
   * @returns A copy annotated with the owning branch, or null
   */
  async getSnapshotInfo(id: string): Promise<Snapshot | null> {
    const state = await this.store.load();
    const found = findSnapshot(state, id);
    if (!found) {
      return null;
    }
    return { ...found.snapshot, branch: found.owner };
  }

  async getStatus(): Promise<TimelineStatus> {
    const state = await this.store.load();
    const snapshots = state.branches.get(state.currentBranch)?.snapshots ?? [];
    const status: TimelineStatus = {
      currentBranch: state.currentBranch,
      branchCount: state.branches.size,
      snapshotCount: snapshots.length,
      stashCount: state.stashes.length
    };
    const latest = snapshots[snapshots.length - 1];
    if (latest) {
      status.latestSnapshot = latest;
    }
    return status;
  }

  /**
   * Appends a snapshot to the current branch, creating the branch entry if missing
   */
  private appendSnapshot(state: TimelineState, fields: SnapshotFields): Snapshot {
    const branch = this.ensureCurrentBranch(state);
    const snapshot: Snapshot = {
      ...fields,
      id: this.ids.generateId('snap', snapshotIds(state)),
      timestamp: this.clock().toISOString(),
      branch: branch.name
    };
    branch.snapshots.push(snapshot);
    return snapshot;
  }

  private ensureCurrentBranch(state: TimelineState): Branch {
    const existing = state.branches.get(state.currentBranch);
    if (existing) {
      return existing;
    }
    const branch: Branch = {
      name: state.currentBranch,
      created: this.clock().toISOString(),
      description: `Branch ${state.currentBranch}`,
      snapshots: []
    };
    state.branches.set(branch.name, branch);
    return branch;
  }
}
