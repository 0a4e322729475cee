import * as fs from 'fs';
import Database from 'better-sqlite3';
import { AlreadyExistsError, NotFoundError, ValidationError, errorMessage } from '../errors.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';
import {
  assertDistance,
  assertPayload,
  checkScrollCeiling,
  rankResults,
  resolveScrollLimit,
  resolveSearchLimit,
  toPayload,
} from './common.js';
import type { StoreOptions } from './common.js';
import { matchesFilters, parseFilters } from './filters.js';
import { DEFAULT_SCROLL_CEILING, DISTANCES } from './types.js';
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
import { assertDimension, assertValidDimension, fromBuffer, similarity, toBuffer } from './vector.js';

interface CollectionRow {
  name: string;
  dimension: number;
  distance: string;
}

interface RecordRow {
  id: string;
  vector: Buffer;
  payload: string;
}

interface Collection {
  name: string;
  dimension: number;
  distance: Distance;
}

/**
 * Persistent local backend on better-sqlite3.
 *
 * Vectors are stored as little-endian Float32 blobs and scored in JS, the
 * same brute-force approach as the in-memory store. Every statement runs
 * synchronously, so a single call is atomic with respect to the event loop
 * and no extra locking is needed.
 */
export class SqliteVectorStore implements VectorStore {
  readonly backend = 'sqlite';

  private db: Database.Database;
  private logger: Logger;
  private scrollCeiling: number;

  constructor(dbPath: string, options: StoreOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'vector_store', backend: this.backend });
    this.scrollCeiling = options.scrollCeiling ?? DEFAULT_SCROLL_CEILING;

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.runMigrations();

    if (dbPath !== ':memory:') {
      // Owner read/write only
      try {
        fs.chmodSync(dbPath, 0o600);
      } catch (error) {
        this.logger.debug('sqlite.chmod_failed', { path: dbPath, error: errorMessage(error) });
      }
    }
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT DEFAULT (datetime('now'))
      );
    `);

    const appliedMigrations = new Set(
      this.db.prepare<[], { name: string }>('SELECT name FROM migrations').all()
        .map((row) => row.name)
    );

    // Migration 001: collections and records
    if (!appliedMigrations.has('001_initial')) {
      this.db.exec(`
        CREATE TABLE collections (
          name TEXT PRIMARY KEY,
          dimension INTEGER NOT NULL CHECK (dimension > 0),
          distance TEXT NOT NULL CHECK (distance IN ('cosine', 'euclidean', 'dot')),
          created_at TEXT DEFAULT (datetime('now'))
        );

        -- rowid carries insertion order; ON CONFLICT updates keep it
        CREATE TABLE records (
          collection TEXT NOT NULL REFERENCES collections(name) ON DELETE CASCADE,
          id TEXT NOT NULL,
          vector BLOB NOT NULL,
          payload TEXT NOT NULL DEFAULT '{}',
          updated_at TEXT DEFAULT (datetime('now')),
          PRIMARY KEY (collection, id)
        );

        CREATE INDEX idx_records_collection ON records(collection);
      `);

      this.db.prepare('INSERT INTO migrations (name) VALUES (?)').run('001_initial');
    }
  }

  async createCollection(name: string, dimension: number, distance: Distance = 'cosine'): Promise<void> {
    assertValidDimension(dimension);
    assertDistance(distance);

    if (this.findCollection(name)) {
      throw new AlreadyExistsError(`Collection ${name} already exists`);
    }

    this.db.prepare(`
      INSERT INTO collections (name, dimension, distance) VALUES (?, ?, ?)
    `).run(name, dimension, distance);
    this.logger.debug('collection.created', { collection: name, dimension, distance });
  }

  async deleteCollection(name: string): Promise<void> {
    this.require(name);
    this.db.transaction(() => {
      this.db.prepare('DELETE FROM records WHERE collection = ?').run(name);
      this.db.prepare('DELETE FROM collections WHERE name = ?').run(name);
    })();
  }

  async getCollectionInfo(name: string): Promise<CollectionInfo | null> {
    const collection = this.findCollection(name);
    if (!collection) return null;

    const row = this.db.prepare<[string], { count: number }>(`
      SELECT COUNT(*) as count FROM records WHERE collection = ?
    `).get(name);

    return {
      name,
      dimension: collection.dimension,
      distance: collection.distance,
      vectorCount: row?.count ?? 0,
    };
  }

  async upsert(collection: string, id: string, vector: Float32Array, payload: Payload): Promise<void> {
    const info = this.require(collection);
    assertDimension(vector, info.dimension, `upsert ${collection}/${id}`);
    assertPayload(payload);

    this.db.prepare(`
      INSERT INTO records (collection, id, vector, payload)
      VALUES (?, ?, ?, ?)
      ON CONFLICT (collection, id) DO UPDATE SET
        vector = excluded.vector,
        payload = excluded.payload,
        updated_at = datetime('now')
    `).run(collection, id, toBuffer(Float32Array.from(vector)), JSON.stringify(payload));
  }

  async get(collection: string, id: string, options: GetOptions = {}): Promise<VectorRecord | null> {
    const info = this.require(collection);

    const row = this.db.prepare<[string, string], RecordRow>(`
      SELECT id, vector, payload FROM records WHERE collection = ? AND id = ?
    `).get(collection, id);

    if (!row) return null;

    return {
      id: row.id,
      payload: this.decodePayload(collection, row),
      ...(options.withVector ? { vector: fromBuffer(row.vector, info.dimension) } : {}),
    };
  }

  async delete(collection: string, id: string): Promise<void> {
    this.require(collection);
    this.db.prepare('DELETE FROM records WHERE collection = ? AND id = ?').run(collection, id);
  }

  async search(collection: string, query: Float32Array, options: SearchOptions = {}): Promise<SearchResult[]> {
    const info = this.require(collection);
    assertDimension(query, info.dimension, `search ${collection}`);
    const limit = resolveSearchLimit(options.limit);
    const conditions = parseFilters(options.filters);
    const withVectors = options.withVectors ?? false;

    const results: SearchResult[] = [];
    for (const row of this.iterateRecords(collection)) {
      const payload = this.decodePayload(collection, row);
      if (!matchesFilters(payload, conditions)) continue;

      const vector = fromBuffer(row.vector, info.dimension);
      results.push({
        id: row.id,
        score: similarity(info.distance, query, vector),
        payload,
        ...(withVectors ? { vector } : {}),
      });
    }

    return rankResults(results, limit);
  }

  async scroll(collection: string, options: ScrollOptions = {}): Promise<SearchResult[]> {
    const info = this.require(collection);
    const limit = resolveScrollLimit(options.limit, this.scrollCeiling);
    const conditions = parseFilters(options.filters);
    const withVectors = options.withVectors ?? false;

    const results: SearchResult[] = [];
    if (limit > 0) {
      for (const row of this.iterateRecords(collection)) {
        const payload = this.decodePayload(collection, row);
        if (!matchesFilters(payload, conditions)) continue;

        results.push({
          id: row.id,
          score: 0,
          payload,
          ...(withVectors ? { vector: fromBuffer(row.vector, info.dimension) } : {}),
        });
        // Leaving the loop early finalizes the iterator and frees the statement
        if (results.length >= limit) break;
      }
    }

    checkScrollCeiling(this.logger, collection, results.length, this.scrollCeiling);
    return results;
  }

  async count(collection: string, filters?: Filters | null): Promise<number> {
    this.require(collection);
    const conditions = parseFilters(filters);

    if (conditions.length === 0) {
      const row = this.db.prepare<[string], { count: number }>(`
        SELECT COUNT(*) as count FROM records WHERE collection = ?
      `).get(collection);
      return row?.count ?? 0;
    }

    let total = 0;
    for (const row of this.iterateRecords(collection)) {
      if (matchesFilters(this.decodePayload(collection, row), conditions)) total++;
    }
    return total;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private iterateRecords(collection: string): IterableIterator<RecordRow> {
    return this.db.prepare<[string], RecordRow>(`
      SELECT id, vector, payload FROM records WHERE collection = ? ORDER BY rowid
    `).iterate(collection);
  }

  private findCollection(name: string): Collection | null {
    const row = this.db.prepare<[string], CollectionRow>(`
      SELECT name, dimension, distance FROM collections WHERE name = ?
    `).get(name);

    if (!row) return null;

    const distance = DISTANCES.find((d) => d === row.distance);
    if (!distance) {
      throw new ValidationError(`Collection ${name} has unknown distance '${row.distance}'`);
    }
    return { name: row.name, dimension: row.dimension, distance };
  }

  private require(name: string): Collection {
    const collection = this.findCollection(name);
    if (!collection) {
      throw new NotFoundError(`Collection ${name} not found`);
    }
    return collection;
  }

  private decodePayload(collection: string, row: RecordRow): Payload {
    let decoded: unknown;
    try {
      decoded = JSON.parse(row.payload);
    } catch (error) {
      throw new ValidationError(`Stored payload for ${collection}/${row.id} is not valid JSON`, { cause: error });
    }
    return toPayload(decoded, `${collection}/${row.id}`);
  }
}
