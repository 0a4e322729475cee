export * from './collections.js';
export * from './results.js';
export * from './searcher.js';
