// ID Generator Service for rewind

import { IdPrefix } from '../models/types.js';

/**
 * Source of the current time
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Generates `<prefix>_<unix-seconds>` ids.
 *
 * The numeric part never repeats within a store: when the current second
 * is already taken (or an earlier id sits ahead of the clock) the next free
 * number above the highest existing one is used instead.
 */
export class IdGenerator {
  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Generates the next unique ID for the given prefix
   * @param existingIds - ids already in use under any prefix
   */
  generateId(prefix: IdPrefix, existingIds: Iterable<string>): string {
    const now = Math.floor(this.clock().getTime() / 1000);
    const highest = IdGenerator.highestNumber(prefix, existingIds);
    const value = highest === null ? now : Math.max(now, highest + 1);
    return `${prefix}_${value}`;
  }

  /**
   * Parses an ID to extract its prefix and number
   * @returns The parsed prefix and number, or null if invalid
   */
  static parseId(id: string): { prefix: IdPrefix; number: number } | null {
    const match = id.match(/^(snap|stash)_(\d+)$/);
    if (!match) {
      return null;
    }

    const prefix: IdPrefix = match[1] === 'snap' ? 'snap' : 'stash';
    return {
      prefix,
      number: parseInt(match[2], 10)
    };
  }

  private static highestNumber(prefix: IdPrefix, ids: Iterable<string>): number | null {
    let highest: number | null = null;
    for (const id of ids) {
      const parsed = IdGenerator.parseId(id);
      if (parsed && parsed.prefix === prefix && (highest === null || parsed.number > highest)) {
        highest = parsed.number;
      }
    }
    return highest;
  }
}
