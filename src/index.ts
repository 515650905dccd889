// Public API of the rewind timeline store

export * from './models/index.js';
export * from './core/errors.js';
export { LogLevel, Logger, logger } from './core/logger.js';
export * from './services/index.js';
