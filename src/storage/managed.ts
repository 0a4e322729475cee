import { AlreadyExistsError, NotFoundError } from '../errors.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';
import type {
  CollectionInfo,
  Distance,
  Filters,
  GetOptions,
  Payload,
  ScrollOptions,
  SearchOptions,
  SearchResult,
  VectorRecord,
  VectorStore,
} from './types.js';

export interface StandardCollection {
  name: string;
  dimension: number;
  distance: Distance;
}

export interface ManagedStoreOptions {
  // Create a missing standard collection on first upsert
  autoCreate?: boolean;
  logger?: Logger;
}

/**
 * Cold-start wrapper around any VectorStore.
 *
 * The system's standard collections are materialized lazily, so a fresh
 * install has none of them. Reads against a standard collection that does not
 * exist yet come back empty instead of raising NotFoundError. Collections
 * outside the registry behave exactly like the wrapped store.
 */
export class ManagedVectorStore implements VectorStore {
  private standards: Map<string, StandardCollection>;
  private autoCreate: boolean;
  private logger: Logger;

  constructor(private inner: VectorStore, standards: StandardCollection[], options: ManagedStoreOptions = {}) {
    this.standards = new Map(standards.map((s) => [s.name, s]));
    this.autoCreate = options.autoCreate ?? false;
    this.logger = (options.logger ?? silentLogger).child({ component: 'managed_store' });
  }

  get backend(): string {
    return this.inner.backend;
  }

  isStandard(name: string): boolean {
    return this.standards.has(name);
  }

  standardCollections(): StandardCollection[] {
    return Array.from(this.standards.values());
  }

  /** Create a standard collection unless it already exists. Safe to race. */
  async ensureCollection(name: string): Promise<void> {
    const standard = this.standards.get(name);
    if (!standard) {
      throw new NotFoundError(`${name} is not a standard collection`);
    }
    if (await this.inner.getCollectionInfo(name)) return;

    try {
      await this.inner.createCollection(standard.name, standard.dimension, standard.distance);
      this.logger.info('collection.materialized', { collection: name, dimension: standard.dimension });
    } catch (error) {
      if (!(error instanceof AlreadyExistsError)) throw error;
    }
  }

  async ensureAll(): Promise<void> {
    for (const name of this.standards.keys()) {
      await this.ensureCollection(name);
    }
  }

  createCollection(name: string, dimension: number, distance?: Distance): Promise<void> {
    return this.inner.createCollection(name, dimension, distance);
  }

  deleteCollection(name: string): Promise<void> {
    return this.inner.deleteCollection(name);
  }

  getCollectionInfo(name: string): Promise<CollectionInfo | null> {
    return this.inner.getCollectionInfo(name);
  }

  async upsert(collection: string, id: string, vector: Float32Array, payload: Payload): Promise<void> {
    if (this.autoCreate && this.isStandard(collection)) {
      await this.ensureCollection(collection);
    }
    await this.inner.upsert(collection, id, vector, payload);
  }

  get(collection: string, id: string, options?: GetOptions): Promise<VectorRecord | null> {
    return this.coldRead(collection, null, () => this.inner.get(collection, id, options));
  }

  delete(collection: string, id: string): Promise<void> {
    return this.coldRead(collection, undefined, () => this.inner.delete(collection, id));
  }

  search(collection: string, query: Float32Array, options?: SearchOptions): Promise<SearchResult[]> {
    return this.coldRead(collection, [], () => this.inner.search(collection, query, options));
  }

  scroll(collection: string, options?: ScrollOptions): Promise<SearchResult[]> {
    return this.coldRead(collection, [], () => this.inner.scroll(collection, options));
  }

  count(collection: string, filters?: Filters | null): Promise<number> {
    return this.coldRead(collection, 0, () => this.inner.count(collection, filters));
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  private async coldRead<T>(collection: string, empty: T, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      if (error instanceof NotFoundError && this.isStandard(collection)) {
        this.logger.debug('collection.cold_read', { collection });
        return empty;
      }
      throw error;
    }
  }
}
