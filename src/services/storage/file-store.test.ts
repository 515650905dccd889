// Tests for TimelineFileStore

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { TimelineFileStore, createDefaultState, DOCUMENT_FILE, POINTER_FILE } from './file-store.js';
import { StorageCorruptError, StorageError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';

describe('TimelineFileStore', () => {
  const clock = () => new Date('2024-05-01T12:00:00.000Z');
  let testDir: string;
  let store: TimelineFileStore;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rewind-file-store-'));
    store = new TimelineFileStore({ baseDir: testDir }, clock);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('createDefaultState', () => {
    it('should contain only the main branch', () => {
      const state = createDefaultState(clock);

      expect([...state.branches.keys()]).toEqual(['main']);
      expect(state.currentBranch).toBe('main');
      expect(state.stashes).toEqual([]);
      expect(state.branches.get('main')).toEqual({
        name: 'main',
        created: '2024-05-01T12:00:00.000Z',
        description: 'Main timeline branch',
        snapshots: []
      });
    });
  });

  describe('initialize', () => {
    it('should write the document and pointer on first use', async () => {
      const created = await store.initialize();
      expect(created).toBe(true);

      const document = JSON.parse(await fs.readFile(path.join(testDir, DOCUMENT_FILE), 'utf-8'));
      expect(document).toEqual({
        branches: {
          main: {
            created: '2024-05-01T12:00:00.000Z',
            description: 'Main timeline branch',
            snapshots: []
          }
        },
        current_branch: 'main',
        stashes: []
      });
      expect(await fs.readFile(path.join(testDir, POINTER_FILE), 'utf-8')).toBe('main');
    });

    it('should leave an existing document alone', async () => {
      await store.initialize();
      await store.transaction(state => {
        state.currentBranch = 'main';
        state.stashes.push({ id: 'stash_1', message: 'kept', timestamp: 't', branch: 'main' });
        return { result: undefined, changed: true };
      });

      const created = await store.initialize();
      expect(created).toBe(false);

      const state = await store.load();
      expect(state.stashes.map(s => s.message)).toEqual(['kept']);
    });

    it('should create a missing root directory', async () => {
      const nested = new TimelineFileStore({ baseDir: path.join(testDir, 'a', 'b') }, clock);
      await nested.initialize();

      const stat = await fs.stat(path.join(testDir, 'a', 'b', DOCUMENT_FILE));
      expect(stat.isFile()).toBe(true);
    });
  });

  describe('load', () => {
    it('should return the default state without writing when nothing is stored', async () => {
      const state = await store.load();

      expect(state.currentBranch).toBe('main');
      await expect(fs.access(path.join(testDir, DOCUMENT_FILE))).rejects.toThrow();
    });

    it('should read documents written by earlier releases', async () => {
      await fs.writeFile(path.join(testDir, DOCUMENT_FILE), JSON.stringify({
        branches: {
          main: {
            created: '2024-01-01T10:00:00',
            snapshots: [
              { id: 'snap_100', message: 'first', timestamp: '2024-01-01T10:00:00', auto: false, branch: 'main' },
              {
                id: 'restore_200',
                message: 'Restored to snapshot snap_100: first',
                timestamp: '2024-01-01T10:05:00',
                auto: false,
                branch: 'main',
                restored_from: 'snap_100',
                source_branch: 'main',
                pre_restore_snapshot: null
              }
            ],
            description: 'Main timeline branch'
          }
        },
        current_branch: 'main'
      }));

      const state = await store.load();
      const snapshots = state.branches.get('main')?.snapshots ?? [];

      expect(snapshots.map(s => s.kind)).toEqual(['plain', 'restore']);
      expect(snapshots[1]).toEqual({
        id: 'restore_200',
        kind: 'restore',
        message: 'Restored to snapshot snap_100: first',
        timestamp: '2024-01-01T10:05:00',
        auto: false,
        branch: 'main',
        restoredFrom: 'snap_100',
        sourceBranch: 'main'
      });
      expect(state.stashes).toEqual([]);
    });
  });

  describe('corruption', () => {
    it('should back up unreadable bytes and reset by default', async () => {
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      await fs.writeFile(path.join(testDir, DOCUMENT_FILE), '{ not json');

      const state = await store.load();

      expect([...state.branches.keys()]).toEqual(['main']);
      const backupName = `${DOCUMENT_FILE}.corrupt-${clock().getTime()}`;
      expect(await fs.readFile(path.join(testDir, backupName), 'utf-8')).toBe('{ not json');
      expect(warn).toHaveBeenCalledTimes(1);

      const rewritten = JSON.parse(await fs.readFile(path.join(testDir, DOCUMENT_FILE), 'utf-8'));
      expect(rewritten.current_branch).toBe('main');
    });

    it('should treat a schema mismatch as corruption', async () => {
      vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      await fs.writeFile(path.join(testDir, DOCUMENT_FILE), JSON.stringify({ branches: [] }));

      const state = await store.load();
      expect([...state.branches.keys()]).toEqual(['main']);
    });

    it('should raise StorageCorruptError under the fail policy', async () => {
      const strict = new TimelineFileStore({ baseDir: testDir, onCorrupt: 'fail' }, clock);
      await fs.writeFile(path.join(testDir, DOCUMENT_FILE), 'garbage');

      await expect(strict.load()).rejects.toBeInstanceOf(StorageCorruptError);
      expect(await fs.readFile(path.join(testDir, DOCUMENT_FILE), 'utf-8')).toBe('garbage');
    });
  });

  describe('storage errors', () => {
    it('should raise StorageError when the document cannot be read', async () => {
      await fs.mkdir(path.join(testDir, DOCUMENT_FILE));

      await expect(store.load()).rejects.toBeInstanceOf(StorageError);
    });

    it('should raise StorageError when the root is not a directory', async () => {
      const filePath = path.join(testDir, 'plain-file');
      await fs.writeFile(filePath, 'x');
      const broken = new TimelineFileStore({ baseDir: filePath }, clock);

      await expect(broken.load()).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('transaction', () => {
    it('should not write when the callback reports no change', async () => {
      await store.transaction(state => {
        state.stashes.push({ id: 'stash_1', message: 'dropped', timestamp: 't', branch: 'main' });
        return { result: undefined, changed: false };
      });

      await expect(fs.access(path.join(testDir, DOCUMENT_FILE))).rejects.toThrow();
    });

    it('should serialize concurrent mutations', async () => {
      await store.initialize();

      await Promise.all(
        Array.from({ length: 10 }, (_, i) =>
          store.transaction(state => {
            state.stashes.push({ id: `stash_${i}`, message: `m${i}`, timestamp: 't', branch: 'main' });
            return { result: undefined, changed: true };
          })
        )
      );

      const state = await store.load();
      expect(state.stashes).toHaveLength(10);
    });

    it('should keep working after a failed callback', async () => {
      await expect(
        store.transaction(() => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      const state = await store.load();
      expect(state.currentBranch).toBe('main');
    });

    it('should mirror the current branch into the pointer file', async () => {
      await store.transaction(state => {
        state.branches.set('feature', { name: 'feature', created: 't', description: '', snapshots: [] });
        state.currentBranch = 'feature';
        return { result: undefined, changed: true };
      });

      expect(await fs.readFile(path.join(testDir, POINTER_FILE), 'utf-8')).toBe('feature');
      const files = await fs.readdir(testDir);
      expect(files.filter(f => f.endsWith('.tmp'))).toEqual([]);
    });
  });
});
