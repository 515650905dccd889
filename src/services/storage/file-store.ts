// File store for timeline persistence

import * as fs from 'fs/promises';
import * as path from 'path';
import lockfile from 'proper-lockfile';
import { TimelineState } from '../../models/timeline.js';
import { DEFAULT_BRANCH } from '../../models/types.js';
import { LockError, StorageCorruptError, StorageError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { serialize } from '../serialization/serializer.js';
import { deserialize } from '../serialization/deserializer.js';
import { ParseError } from '../serialization/parser.js';
import { Clock, systemClock } from '../id-generator.js';

/**
 * What to do when timeline.json exists but cannot be parsed
 */
export type CorruptionPolicy = 'reset' | 'fail';

/**
 * Configuration for the file store
 */
export interface FileStoreConfig {
  /** Root directory holding timeline.json and current_branch */
  baseDir: string;
  onCorrupt: CorruptionPolicy;
  /** Attempts to take the lock before giving up */
  lockRetries: number;
  /** Age in milliseconds after which an abandoned lock is taken over */
  lockStaleMs: number;
}

/**
 * Outcome of a transaction callback
 */
export interface Mutation<T> {
  result: T;
  /** Whether the state was modified and must be written back */
  changed: boolean;
}

export const DOCUMENT_FILE = 'timeline.json';
export const POINTER_FILE = 'current_branch';

const DEFAULT_CONFIG: Omit<FileStoreConfig, 'baseDir'> = {
  onCorrupt: 'reset',
  lockRetries: 10,
  lockStaleMs: 10_000
};

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Builds the state of a store that has never been written
 */
export function createDefaultState(clock: Clock = systemClock): TimelineState {
  return {
    branches: new Map([
      [
        DEFAULT_BRANCH,
        {
          name: DEFAULT_BRANCH,
          created: clock().toISOString(),
          description: 'Main timeline branch',
          snapshots: []
        }
      ]
    ]),
    currentBranch: DEFAULT_BRANCH,
    stashes: []
  };
}

/**
 * Persists the whole timeline document.
 *
 * Mutations run one at a time: within the process through a promise
 * chain, across processes through a lock on timeline.json. Every write
 * goes to a temp file that is renamed over the target.
 */
export class TimelineFileStore {
  private config: FileStoreConfig;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    config: Partial<FileStoreConfig> & Pick<FileStoreConfig, 'baseDir'>,
    private readonly clock: Clock = systemClock
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get documentPath(): string {
    return path.join(this.config.baseDir, DOCUMENT_FILE);
  }

  get pointerPath(): string {
    return path.join(this.config.baseDir, POINTER_FILE);
  }

  /**
   * Writes the default document if none exists yet
   *
   * @returns true if a new document was created
   */
  async initialize(): Promise<boolean> {
    return this.transaction(async () => {
      const exists = await this.documentExists();
      if (exists) {
        return { result: false, changed: false };
      }
      await this.write(createDefaultState(this.clock));
      logger.debug('Initialized timeline', { baseDir: this.config.baseDir });
      return { result: true, changed: false };
    });
  }

  /**
   * Reads the current state under the lock
   */
  async load(): Promise<TimelineState> {
    return this.transaction(state => ({ result: state, changed: false }));
  }

  /**
   * Runs a read-modify-write cycle with exclusive access to the document
   */
  async transaction<T>(fn: (state: TimelineState) => Mutation<T> | Promise<Mutation<T>>): Promise<T> {
    const run = async (): Promise<T> => {
      await this.ensureBaseDir();
      const release = await this.acquireLock();
      try {
        const { state, recovered } = await this.read();
        const { result, changed } = await fn(state);
        if (changed || recovered) {
          await this.write(state);
        }
        return result;
      } finally {
        await this.releaseLock(release);
      }
    };

    const next = this.queue.then(run, run);
    this.queue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  /**
   * Reads and parses the document. An absent document yields the default state.
   */
  private async read(): Promise<{ state: TimelineState; recovered: boolean }> {
    let content: string;
    try {
      content = await fs.readFile(this.documentPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { state: createDefaultState(this.clock), recovered: false };
      }
      throw new StorageError(`Cannot read timeline document: ${this.documentPath}`, this.documentPath, error);
    }

    try {
      return { state: deserialize(content), recovered: false };
    } catch (error) {
      if (error instanceof ParseError) {
        return { state: await this.recoverCorrupt(content, error), recovered: true };
      }
      throw error;
    }
  }

  private async recoverCorrupt(content: string, error: ParseError): Promise<TimelineState> {
    if (this.config.onCorrupt === 'fail') {
      throw new StorageCorruptError(this.documentPath, error.message);
    }

    const backupPath = `${this.documentPath}.corrupt-${this.clock().getTime()}`;
    await this.atomicWrite(backupPath, content);
    logger.warn('Timeline document was unreadable and has been reset', {
      reason: error.message,
      backup: backupPath
    });
    return createDefaultState(this.clock);
  }

  /**
   * Writes the document, then the current-branch pointer
   */
  private async write(state: TimelineState): Promise<void> {
    await this.atomicWrite(this.documentPath, serialize(state));
    await this.atomicWrite(this.pointerPath, state.currentBranch);
    logger.debug('Saved timeline', {
      branches: state.branches.size,
      stashes: state.stashes.length,
      currentBranch: state.currentBranch
    });
  }

  private async atomicWrite(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      try {
        await fs.unlink(tempPath);
      } catch {
        // Temp file was never created
      }
      throw new StorageError(`Cannot write ${filePath}`, filePath, error);
    }
  }

  private async documentExists(): Promise<boolean> {
    try {
      await fs.access(this.documentPath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw new StorageError(`Cannot access timeline document: ${this.documentPath}`, this.documentPath, error);
    }
  }

  private async ensureBaseDir(): Promise<void> {
    try {
      await fs.mkdir(this.config.baseDir, { recursive: true });
    } catch (error) {
      throw new StorageError(`Cannot create timeline directory: ${this.config.baseDir}`, this.config.baseDir, error);
    }
  }

  private async acquireLock(): Promise<() => Promise<void>> {
    try {
      return await lockfile.lock(this.documentPath, {
        realpath: false,
        stale: this.config.lockStaleMs,
        retries: {
          retries: this.config.lockRetries,
          factor: 2,
          minTimeout: 20,
          maxTimeout: 1_000,
          randomize: true
        }
      });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ELOCKED') {
        throw new LockError(this.documentPath, error);
      }
      throw new StorageError(`Cannot lock timeline document: ${this.documentPath}`, this.documentPath, error);
    }
  }

  private async releaseLock(release: () => Promise<void>): Promise<void> {
    try {
      await release();
    } catch (error) {
      logger.warn('Failed to release timeline lock', {
        path: this.documentPath,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
