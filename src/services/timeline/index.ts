/**
 * Timeline Service Module
 *
 * Branches, snapshots and stashes over a persisted timeline document.
 *
 * @module services/timeline
 */

export * from './timeline-service.js';
