export * from './types.js';
export * from './hdbscan.js';
export * from './weights.js';
export * from './clusterer.js';
export * from './extractor.js';
export * from './scheduler.js';
export * from './pool.js';
export * from './worker-protocol.js';
