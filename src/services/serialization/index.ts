// Timeline document serialization

export * from './parser.js';
export * from './serializer.js';
export * from './deserializer.js';
