export * from './embeddings.js';
export * from './registry.js';
