import * as path from 'path';
import type { StorageConfig } from '../config/index.js';
import type { Logger } from '../telemetry/logger.js';
import { InMemoryVectorStore } from './memory.js';
import { QdrantVectorStore, createQdrantTransport } from './qdrant.js';
import { SqliteVectorStore } from './sqlite.js';
import type { VectorStore } from './types.js';

export * from './types.js';
export { parseFilters, matchesFilters } from './filters.js';
export type { ParsedCondition } from './filters.js';
export { RWLock } from './rwlock.js';
export { InMemoryVectorStore } from './memory.js';
export type { InMemoryStoreOptions } from './memory.js';
export { SqliteVectorStore } from './sqlite.js';
export { QdrantVectorStore, createQdrantTransport, toPointId, toQdrantFilter } from './qdrant.js';
export type { QdrantTransport, QdrantFilter, QdrantPoint, QdrantStoreOptions } from './qdrant.js';
export { ManagedVectorStore } from './managed.js';
export type { StandardCollection, ManagedStoreOptions } from './managed.js';
export { l2Normalize, cosineSimilarity, euclideanDistance } from './vector.js';

export interface CreateStoreOptions {
  logger?: Logger;
  // Relative sqlite paths resolve against this directory
  baseDir?: string;
}

export function createVectorStore(config: StorageConfig, options: CreateStoreOptions = {}): VectorStore {
  const storeOptions = {
    scrollCeiling: config.scrollLimit,
    ...(options.logger ? { logger: options.logger } : {}),
  };

  switch (config.backend) {
    case 'memory':
      return new InMemoryVectorStore(storeOptions);
    case 'sqlite': {
      const dbPath = config.sqlitePath === ':memory:' || !options.baseDir
        ? config.sqlitePath
        : path.resolve(options.baseDir, config.sqlitePath);
      return new SqliteVectorStore(dbPath, storeOptions);
    }
    case 'qdrant':
      return new QdrantVectorStore(createQdrantTransport(config.qdrantUrl, config.qdrantApiKey), storeOptions);
  }
}
