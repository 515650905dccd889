// Core type definitions for rewind

// Snapshot kinds
export type SnapshotKind = 'plain' | 'restore' | 'stash-apply';

// Id prefixes for generated records
export type IdPrefix = 'snap' | 'stash';

// Name of the branch every new timeline starts on
export const DEFAULT_BRANCH = 'main';
