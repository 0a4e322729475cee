export * from './types.js';
export * from './tokens.js';
export * from './similarity.js';
export * from './dedup.js';
export * from './allocate.js';
export * from './formatting.js';
export * from './assembler.js';
