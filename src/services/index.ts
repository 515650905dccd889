// Export all services

export * from './id-generator.js';
export * from './serialization/index.js';
export * from './storage/index.js';
export * from './config/index.js';
export * from './prompt/index.js';
export * from './timeline/index.js';
