/**
 * Prompt Service Module
 *
 * @module services/prompt
 */

export * from './prompt-service.js';
