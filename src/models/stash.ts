// Stash model

/**
 * An ephemeral save-point kept outside branch history
 */
export interface Stash {
  /** Unique identifier (e.g., stash_1700000000) */
  id: string;
  message: string;
  /** ISO-8601 creation time */
  timestamp: string;
  /** Branch that was current when the stash was created */
  branch: string;
}
