import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { AlreadyExistsError, NotFoundError } from '../errors.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';
import {
  assertDistance,
  assertPayload,
  checkScrollCeiling,
  clonePayload,
  rankResults,
  resolveScrollLimit,
  resolveSearchLimit,
} from './common.js';
import type { StoreOptions } from './common.js';
import { matchesFilters, parseFilters } from './filters.js';
import { RWLock } from './rwlock.js';
import { DEFAULT_SCROLL_CEILING } from './types.js';
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
import { assertDimension, assertValidDimension, similarity } from './vector.js';

interface StoredRecord {
  id: string;
  vector: Float32Array;
  payload: Payload;
}

interface CollectionState {
  name: string;
  dimension: number;
  distance: Distance;
  // Map iteration order is insertion order; re-setting a key keeps its slot
  records: Map<string, StoredRecord>;
  lock: RWLock;
}

export interface InMemoryStoreOptions extends StoreOptions {
  // Scoring loops yield to the event loop after this many records
  yieldEvery?: number;
}

/**
 * In-process reference backend with brute-force scoring.
 *
 * Every collection carries its own readers-writer lock, so operations on
 * different collections never wait on each other. Within a collection,
 * searches, scrolls, counts and gets share the lock while upserts and
 * deletes take it exclusively; a long scroll feeding clustering therefore
 * runs alongside searches but never observes a half-applied write.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly backend = 'memory';

  private collections = new Map<string, CollectionState>();
  private logger: Logger;
  private scrollCeiling: number;
  private yieldEvery: number;

  constructor(options: InMemoryStoreOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'vector_store', backend: this.backend });
    this.scrollCeiling = options.scrollCeiling ?? DEFAULT_SCROLL_CEILING;
    this.yieldEvery = options.yieldEvery ?? 2048;
  }

  async createCollection(name: string, dimension: number, distance: Distance = 'cosine'): Promise<void> {
    assertValidDimension(dimension);
    assertDistance(distance);

    if (this.collections.has(name)) {
      throw new AlreadyExistsError(`Collection ${name} already exists`);
    }

    this.collections.set(name, {
      name,
      dimension,
      distance,
      records: new Map(),
      lock: new RWLock(),
    });
    this.logger.debug('collection.created', { collection: name, dimension, distance });
  }

  async deleteCollection(name: string): Promise<void> {
    const state = this.require(name);
    await state.lock.withWrite(() => {
      this.collections.delete(name);
    });
  }

  async getCollectionInfo(name: string): Promise<CollectionInfo | null> {
    const state = this.collections.get(name);
    if (!state) return null;

    return {
      name,
      dimension: state.dimension,
      distance: state.distance,
      vectorCount: state.records.size,
    };
  }

  async upsert(collection: string, id: string, vector: Float32Array, payload: Payload): Promise<void> {
    const state = this.require(collection);
    assertDimension(vector, state.dimension, `upsert ${collection}/${id}`);
    assertPayload(payload);

    const record: StoredRecord = {
      id,
      vector: Float32Array.from(vector),
      payload: clonePayload(payload),
    };

    await state.lock.withWrite(() => {
      state.records.set(id, record);
    });
  }

  async get(collection: string, id: string, options: GetOptions = {}): Promise<VectorRecord | null> {
    const state = this.require(collection);

    return state.lock.withRead(() => {
      const record = state.records.get(id);
      if (!record) return null;
      return this.toRecord(record, options.withVector ?? false);
    });
  }

  async delete(collection: string, id: string): Promise<void> {
    const state = this.require(collection);
    await state.lock.withWrite(() => {
      state.records.delete(id);
    });
  }

  async search(collection: string, query: Float32Array, options: SearchOptions = {}): Promise<SearchResult[]> {
    const state = this.require(collection);
    assertDimension(query, state.dimension, `search ${collection}`);
    const limit = resolveSearchLimit(options.limit);
    const conditions = parseFilters(options.filters);
    const withVectors = options.withVectors ?? false;

    return state.lock.withRead(async () => {
      const results: SearchResult[] = [];
      let scanned = 0;

      for (const record of Array.from(state.records.values())) {
        if (++scanned % this.yieldEvery === 0) {
          await yieldToEventLoop();
        }
        if (!matchesFilters(record.payload, conditions)) continue;

        results.push({
          id: record.id,
          score: similarity(state.distance, query, record.vector),
          payload: clonePayload(record.payload),
          ...(withVectors ? { vector: Float32Array.from(record.vector) } : {}),
        });
      }

      return rankResults(results, limit);
    });
  }

  async scroll(collection: string, options: ScrollOptions = {}): Promise<SearchResult[]> {
    const state = this.require(collection);
    const limit = resolveScrollLimit(options.limit, this.scrollCeiling);
    const conditions = parseFilters(options.filters);
    const withVectors = options.withVectors ?? false;

    const results = await state.lock.withRead(async () => {
      const page: SearchResult[] = [];
      let scanned = 0;

      for (const record of Array.from(state.records.values())) {
        if (page.length >= limit) break;
        if (++scanned % this.yieldEvery === 0) {
          await yieldToEventLoop();
        }
        if (!matchesFilters(record.payload, conditions)) continue;

        page.push({
          id: record.id,
          score: 0,
          payload: clonePayload(record.payload),
          ...(withVectors ? { vector: Float32Array.from(record.vector) } : {}),
        });
      }

      return page;
    });

    checkScrollCeiling(this.logger, collection, results.length, this.scrollCeiling);
    return results;
  }

  async count(collection: string, filters?: Filters | null): Promise<number> {
    const state = this.require(collection);
    const conditions = parseFilters(filters);

    return state.lock.withRead(() => {
      if (conditions.length === 0) return state.records.size;
      let total = 0;
      for (const record of state.records.values()) {
        if (matchesFilters(record.payload, conditions)) total++;
      }
      return total;
    });
  }

  async close(): Promise<void> {
    this.collections.clear();
  }

  private require(name: string): CollectionState {
    const state = this.collections.get(name);
    if (!state) {
      throw new NotFoundError(`Collection ${name} not found`);
    }
    return state;
  }

  private toRecord(record: StoredRecord, withVector: boolean): VectorRecord {
    return {
      id: record.id,
      payload: clonePayload(record.payload),
      ...(withVector ? { vector: Float32Array.from(record.vector) } : {}),
    };
  }
}
