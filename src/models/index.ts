// Export all domain models

export * from './types.js';
export * from './snapshot.js';
export * from './branch.js';
export * from './stash.js';
export * from './timeline.js';
