/**
 * Storage Module
 *
 * Locked, atomic persistence of the timeline document.
 *
 * @module services/storage
 */

export * from './file-store.js';
