// Tests for ID Generator service

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { IdGenerator } from './id-generator.js';

describe('IdGenerator', () => {
  const fixedClock = () => new Date('2024-05-01T12:00:00.750Z');
  const now = 1714564800;

  describe('generateId', () => {
    it('should use whole unix seconds from the clock', () => {
      const generator = new IdGenerator(fixedClock);
      expect(generator.generateId('snap', [])).toBe(`snap_${now}`);
      expect(generator.generateId('stash', [])).toBe(`stash_${now}`);
    });

    it('should move past an id taken in the same second', () => {
      const generator = new IdGenerator(fixedClock);
      const first = generator.generateId('snap', []);
      const second = generator.generateId('snap', [first]);
      const third = generator.generateId('snap', [first, second]);

      expect(first).toBe(`snap_${now}`);
      expect(second).toBe(`snap_${now + 1}`);
      expect(third).toBe(`snap_${now + 2}`);
    });

    it('should keep counters separate per prefix', () => {
      const generator = new IdGenerator(fixedClock);
      expect(generator.generateId('stash', [`snap_${now}`, `snap_${now + 5}`])).toBe(`stash_${now}`);
    });

    it('should ignore ids from older formats', () => {
      const generator = new IdGenerator(fixedClock);
      expect(generator.generateId('stash', [`stash_apply_${now + 10}`, `restore_${now + 3}`])).toBe(`stash_${now}`);
    });

    it('should never return an id that is already in use', () => {
      fc.assert(
        fc.property(
          fc.array(fc.integer({ min: now - 50, max: now + 50 }), { maxLength: 30 }),
          (numbers) => {
            const existing = numbers.map(n => `snap_${n}`);
            const id = new IdGenerator(fixedClock).generateId('snap', existing);
            expect(existing).not.toContain(id);
            expect(id).toMatch(/^snap_\d+$/);
          }
        )
      );
    });
  });

  describe('parseId', () => {
    it('should parse snapshot ids', () => {
      expect(IdGenerator.parseId('snap_42')).toEqual({ prefix: 'snap', number: 42 });
    });

    it('should parse stash ids', () => {
      expect(IdGenerator.parseId('stash_7')).toEqual({ prefix: 'stash', number: 7 });
    });

    it('should return null for invalid ids', () => {
      expect(IdGenerator.parseId('restore_42')).toBeNull();
      expect(IdGenerator.parseId('snap-42')).toBeNull();
    });
  });
});
