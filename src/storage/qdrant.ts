import { createHash } from 'crypto';
import { QdrantClient } from '@qdrant/js-client-rest';
import { AlreadyExistsError, NotFoundError, ValidationError } from '../errors.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';
import {
  assertDistance,
  assertPayload,
  checkScrollCeiling,
  resolveScrollLimit,
  resolveSearchLimit,
  toPayload,
} from './common.js';
import type { StoreOptions } from './common.js';
import { parseFilters } from './filters.js';
import type { ParsedCondition } from './filters.js';
import { DEFAULT_SCROLL_CEILING } from './types.js';
import type {
  CollectionInfo,
  Distance,
  Filters,
  GetOptions,
  Payload,
  PayloadPrimitive,
  ScrollOptions,
  SearchOptions,
  SearchResult,
  VectorRecord,
  VectorStore,
} from './types.js';
import { assertDimension, assertValidDimension } from './vector.js';

export type QdrantDistance = 'Cosine' | 'Euclid' | 'Dot';

export type QdrantCondition =
  | { key: string; match: { value: string | number | boolean } }
  | { key: string; match: { any: string[] | number[] } }
  | { key: string; range: { gte?: number; lte?: number; gt?: number; lt?: number } }
  | { is_null: { key: string } }
  | { is_empty: { key: string } }
  | QdrantFilter;

export interface QdrantFilter {
  must?: QdrantCondition[];
  should?: QdrantCondition[];
  must_not?: QdrantCondition[];
}

export interface QdrantPoint {
  id: string;
  payload: Record<string, unknown>;
  vector?: number[];
  score?: number;
}

export interface QdrantCollectionDescription {
  size: number;
  distance: string;
  pointsCount: number;
}

export interface QdrantQuery {
  limit: number;
  filter?: QdrantFilter;
  withVector: boolean;
}

export interface QdrantSearchQuery extends QdrantQuery {
  // Only points scoring at least this well (for Euclid: this close or closer)
  scoreThreshold?: number;
}

export interface QdrantScrollQuery extends QdrantQuery {
  // Smallest insertion sequence to return
  startFrom?: number;
}

/**
 * The slice of the Qdrant REST API the store depends on. Production code
 * uses createQdrantTransport; tests substitute an in-process fake.
 *
 * `createCollection` also indexes SEQUENCE_PAYLOAD_KEY, and `scroll`
 * returns points ordered by it, ascending.
 */
export interface QdrantTransport {
  collectionExists(name: string): Promise<boolean>;
  getCollection(name: string): Promise<QdrantCollectionDescription | null>;
  createCollection(name: string, size: number, distance: QdrantDistance): Promise<void>;
  deleteCollection(name: string): Promise<void>;
  upsert(name: string, points: Array<{ id: string; vector: number[]; payload: Record<string, unknown> }>): Promise<void>;
  retrieve(name: string, ids: string[], withVector: boolean): Promise<QdrantPoint[]>;
  delete(name: string, ids: string[]): Promise<void>;
  search(name: string, vector: number[], query: QdrantSearchQuery): Promise<QdrantPoint[]>;
  scroll(name: string, query: QdrantScrollQuery): Promise<QdrantPoint[]>;
  count(name: string, filter?: QdrantFilter): Promise<number>;
}

// Original string ids travel in this payload key; Qdrant only accepts UUIDs and integers
export const ID_PAYLOAD_KEY = '_loci_id';

// Insertion order, which Qdrant does not keep: scroll order and score ties follow it
export const SEQUENCE_PAYLOAD_KEY = '_loci_seq';

const RESERVED_PAYLOAD_KEYS = [ID_PAYLOAD_KEY, SEQUENCE_PAYLOAD_KEY];

const DISTANCE_TO_QDRANT: Record<Distance, QdrantDistance> = {
  cosine: 'Cosine',
  euclidean: 'Euclid',
  dot: 'Dot',
};

const QDRANT_TO_DISTANCE: Record<string, Distance> = {
  Cosine: 'cosine',
  Euclid: 'euclidean',
  Dot: 'dot',
};

/** Deterministic name-based UUID (version 5 layout) for a record id. */
export function toPointId(id: string): string {
  const hash = createHash('sha1').update(`loci:${id}`).digest();
  hash[6] = (hash[6] & 0x0f) | 0x50;
  hash[8] = (hash[8] & 0x3f) | 0x80;
  const hex = hash.subarray(0, 16).toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

function equalityCondition(key: string, value: PayloadPrimitive): QdrantCondition {
  if (value === null) return { is_null: { key } };
  // match.value only takes integers among numbers
  if (typeof value === 'number' && !Number.isInteger(value)) {
    return { key, range: { gte: value, lte: value } };
  }
  return { key, match: { value } };
}

function membershipCondition(key: string, values: PayloadPrimitive[]): QdrantCondition {
  const strings = values.filter((v): v is string => typeof v === 'string');
  if (strings.length === values.length) {
    return { key, match: { any: strings } };
  }
  const integers = values.filter((v): v is number => typeof v === 'number' && Number.isInteger(v));
  if (integers.length === values.length) {
    return { key, match: { any: integers } };
  }
  return { should: values.map((v) => equalityCondition(key, v)) };
}

function rangeCondition(condition: Extract<ParsedCondition, { kind: 'range' }>): QdrantCondition {
  const key = condition.field;
  switch (condition.op) {
    case '$gte':
      return { key, range: { gte: condition.value } };
    case '$lte':
      return { key, range: { lte: condition.value } };
    case '$gt':
      return { key, range: { gt: condition.value } };
    case '$lt':
      return { key, range: { lt: condition.value } };
  }
}

// Present, and neither a number nor an array holding one. Qdrant range
// conditions skip such values where the local backends reject them.
function nonNumericCondition(key: string): QdrantCondition {
  return {
    should: [
      { is_null: { key } },
      { must_not: [{ is_empty: { key } }, { key, range: { gte: -Number.MAX_VALUE } }] },
    ],
  };
}

function sequenceOf(point: QdrantPoint): number | undefined {
  const sequence = point.payload[SEQUENCE_PAYLOAD_KEY];
  return typeof sequence === 'number' ? sequence : undefined;
}

/**
 * Translate validated conditions into a Qdrant filter. Returns null when the
 * filter can never match (an empty `$in`), so callers can skip the request.
 */
export function toQdrantFilter(conditions: ParsedCondition[]): QdrantFilter | undefined | null {
  if (conditions.length === 0) return undefined;

  const must: QdrantCondition[] = [];
  for (const condition of conditions) {
    switch (condition.kind) {
      case 'eq':
        must.push(equalityCondition(condition.field, condition.value));
        break;
      case 'in':
        if (condition.values.length === 0) return null;
        must.push(membershipCondition(condition.field, condition.values));
        break;
      case 'range':
        must.push(rangeCondition(condition));
        break;
    }
  }
  return { must };
}

interface CachedCollection {
  dimension: number;
  distance: Distance;
}

export interface QdrantStoreOptions extends StoreOptions {
  // Points fetched per scroll request
  pageSize?: number;
}

/**
 * Adapter to an external Qdrant service.
 *
 * Dimension and filter checks happen locally before any request so callers
 * see the same ValidationError/NotFoundError as with the local backends.
 * Requests are never retried here; that policy belongs to the caller.
 * Qdrant normalizes vectors of cosine collections on write, so vectors read
 * back from them keep their direction but not their magnitude.
 *
 * Every point carries an insertion sequence (SEQUENCE_PAYLOAD_KEY). A new
 * point gets one from a clock-seeded counter and a replaced point keeps its
 * own, so scrolls return records in insertion order and equal scores rank
 * the older record first, as with the local backends. Points written by
 * other tools without a sequence are not returned by scroll.
 */
export class QdrantVectorStore implements VectorStore {
  readonly backend = 'qdrant';

  private collections = new Map<string, CachedCollection>();
  private logger: Logger;
  private scrollCeiling: number;
  private pageSize: number;
  private lastSequence = 0;

  constructor(private transport: QdrantTransport, options: QdrantStoreOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'vector_store', backend: this.backend });
    this.scrollCeiling = options.scrollCeiling ?? DEFAULT_SCROLL_CEILING;
    this.pageSize = options.pageSize ?? 1000;
  }

  async createCollection(name: string, dimension: number, distance: Distance = 'cosine'): Promise<void> {
    assertValidDimension(dimension);
    assertDistance(distance);

    if (await this.transport.collectionExists(name)) {
      throw new AlreadyExistsError(`Collection ${name} already exists`);
    }

    await this.transport.createCollection(name, dimension, DISTANCE_TO_QDRANT[distance]);
    this.collections.set(name, { dimension, distance });
    this.logger.debug('collection.created', { collection: name, dimension, distance });
  }

  async deleteCollection(name: string): Promise<void> {
    await this.require(name);
    await this.transport.deleteCollection(name);
    this.collections.delete(name);
  }

  async getCollectionInfo(name: string): Promise<CollectionInfo | null> {
    const description = await this.transport.getCollection(name);
    if (!description) {
      this.collections.delete(name);
      return null;
    }

    const collection = this.describe(name, description);
    this.collections.set(name, collection);
    return {
      name,
      dimension: collection.dimension,
      distance: collection.distance,
      vectorCount: description.pointsCount,
    };
  }

  async upsert(collection: string, id: string, vector: Float32Array, payload: Payload): Promise<void> {
    const info = await this.require(collection);
    assertDimension(vector, info.dimension, `upsert ${collection}/${id}`);
    assertPayload(payload);
    for (const key of RESERVED_PAYLOAD_KEYS) {
      if (key in payload) {
        throw new ValidationError(`Payload key '${key}' is reserved`);
      }
    }

    const pointId = toPointId(id);
    const [existing] = await this.transport.retrieve(collection, [pointId], false);
    const sequence = (existing ? sequenceOf(existing) : undefined) ?? this.nextSequence();
    await this.transport.upsert(collection, [
      {
        id: pointId,
        vector: Array.from(vector),
        payload: { ...payload, [ID_PAYLOAD_KEY]: id, [SEQUENCE_PAYLOAD_KEY]: sequence },
      },
    ]);
  }

  async get(collection: string, id: string, options: GetOptions = {}): Promise<VectorRecord | null> {
    await this.require(collection);
    const [point] = await this.transport.retrieve(collection, [toPointId(id)], options.withVector ?? false);
    if (!point) return null;

    const result = this.toResult(collection, point, 0);
    return {
      id: result.id,
      payload: result.payload,
      ...(result.vector ? { vector: result.vector } : {}),
    };
  }

  async delete(collection: string, id: string): Promise<void> {
    await this.require(collection);
    await this.transport.delete(collection, [toPointId(id)]);
  }

  async search(collection: string, query: Float32Array, options: SearchOptions = {}): Promise<SearchResult[]> {
    const info = await this.require(collection);
    assertDimension(query, info.dimension, `search ${collection}`);
    const limit = resolveSearchLimit(options.limit);
    const conditions = parseFilters(options.filters);
    const filter = toQdrantFilter(conditions);
    if (filter === null || limit === 0) return [];
    await this.assertNumericRanges(collection, conditions);

    const points = await this.searchThroughTies(collection, Array.from(query), {
      limit,
      filter,
      withVector: options.withVectors ?? false,
    });

    return points
      .map((point) => ({
        result: this.toResult(collection, point, this.toScore(info.distance, point.score ?? 0)),
        sequence: sequenceOf(point) ?? Number.MAX_SAFE_INTEGER,
      }))
      .sort((a, b) => b.result.score - a.result.score || a.sequence - b.sequence)
      .slice(0, limit)
      .map(({ result }) => result);
  }

  async scroll(collection: string, options: ScrollOptions = {}): Promise<SearchResult[]> {
    await this.require(collection);
    const limit = resolveScrollLimit(options.limit, this.scrollCeiling);
    const conditions = parseFilters(options.filters);
    const filter = toQdrantFilter(conditions);
    if (filter === null || limit === 0) return [];
    await this.assertNumericRanges(collection, conditions);

    const results: SearchResult[] = [];
    let startFrom: number | undefined;

    while (results.length < limit) {
      const requested = Math.min(this.pageSize, limit - results.length);
      const page = await this.transport.scroll(collection, {
        limit: requested,
        filter,
        withVector: options.withVectors ?? false,
        ...(startFrom !== undefined ? { startFrom } : {}),
      });
      for (const point of page) {
        results.push(this.toResult(collection, point, 0));
      }
      const last = page.length === requested ? sequenceOf(page[page.length - 1]) : undefined;
      if (last === undefined) break;
      startFrom = last + 1;
    }

    const trimmed = results.slice(0, limit);
    checkScrollCeiling(this.logger, collection, trimmed.length, this.scrollCeiling);
    return trimmed;
  }

  async count(collection: string, filters?: Filters | null): Promise<number> {
    await this.require(collection);
    const conditions = parseFilters(filters);
    const filter = toQdrantFilter(conditions);
    if (filter === null) return 0;
    await this.assertNumericRanges(collection, conditions);
    return this.transport.count(collection, filter);
  }

  async close(): Promise<void> {
    this.collections.clear();
  }

  private nextSequence(): number {
    this.lastSequence = Math.max(this.lastSequence + 1, Date.now() * 1000);
    return this.lastSequence;
  }

  // Equal scores can straddle the limit. Fetch one point more than asked;
  // if it ties with the last one, fetch every point scoring at least that
  // well so the caller can order the tie by sequence.
  private async searchThroughTies(collection: string, vector: number[], query: QdrantSearchQuery): Promise<QdrantPoint[]> {
    const { limit } = query;
    const points = await this.transport.search(collection, vector, { ...query, limit: limit + 1 });
    const edge = points.length > limit ? points[limit - 1].score : undefined;
    if (edge === undefined || points[limit].score !== edge) return points;

    for (let size = 2 * (limit + 1); ; size *= 2) {
      const tied = await this.transport.search(collection, vector, { ...query, limit: size, scoreThreshold: edge });
      if (tied.length < size) return tied;
    }
  }

  // Mirrors the local filter engine, which raises on a non-numeric value
  // under a range condition once the conditions before it have matched
  private async assertNumericRanges(collection: string, conditions: ParsedCondition[]): Promise<void> {
    for (const [index, condition] of conditions.entries()) {
      if (condition.kind !== 'range') continue;
      const preceding = toQdrantFilter(conditions.slice(0, index));
      if (preceding === null) return;

      const offending = await this.transport.count(collection, {
        must: [...(preceding?.must ?? []), nonNumericCondition(condition.field)],
      });
      if (offending > 0) {
        throw new ValidationError(`Cannot apply ${condition.op} to non-numeric value of '${condition.field}'`);
      }
    }
  }

  private async require(name: string): Promise<CachedCollection> {
    const cached = this.collections.get(name);
    if (cached) return cached;

    const description = await this.transport.getCollection(name);
    if (!description) {
      throw new NotFoundError(`Collection ${name} not found`);
    }
    const collection = this.describe(name, description);
    this.collections.set(name, collection);
    return collection;
  }

  private describe(name: string, description: QdrantCollectionDescription): CachedCollection {
    const distance = QDRANT_TO_DISTANCE[description.distance];
    if (!distance) {
      throw new ValidationError(`Collection ${name} uses unsupported distance ${description.distance}`);
    }
    return { dimension: description.size, distance };
  }

  // Qdrant reports the raw distance for Euclid; map it onto (0, 1] like the local backends
  private toScore(distance: Distance, score: number): number {
    return distance === 'euclidean' ? 1 / (1 + score) : score;
  }

  private toResult(collection: string, point: QdrantPoint, score: number): SearchResult {
    const { [ID_PAYLOAD_KEY]: originalId, [SEQUENCE_PAYLOAD_KEY]: _sequence, ...rest } = point.payload;
    const id = typeof originalId === 'string' ? originalId : point.id;
    return {
      id,
      score,
      payload: toPayload(rest, `${collection}/${id}`),
      ...(point.vector ? { vector: Float32Array.from(point.vector) } : {}),
    };
  }
}

function toDenseVector(value: unknown): number[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const vector: number[] = [];
  for (const component of value) {
    if (typeof component !== 'number') return undefined;
    vector.push(component);
  }
  return vector;
}

function toPayloadRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return { ...value };
}

function readVectorParams(vectors: unknown): { size: number; distance: string } | null {
  if (typeof vectors !== 'object' || vectors === null) return null;
  if (!('size' in vectors) || !('distance' in vectors)) return null;
  const { size, distance } = vectors;
  if (typeof size !== 'number' || typeof distance !== 'string') return null;
  return { size, distance };
}

function toPoint(raw: { id: string | number; payload?: unknown; vector?: unknown; score?: number }): QdrantPoint {
  const vector = toDenseVector(raw.vector);
  return {
    id: String(raw.id),
    payload: toPayloadRecord(raw.payload),
    ...(vector ? { vector } : {}),
    ...(raw.score !== undefined ? { score: raw.score } : {}),
  };
}

/** QdrantTransport over the official REST client. */
export function createQdrantTransport(url: string, apiKey?: string): QdrantTransport {
  const client = new QdrantClient({ url, ...(apiKey ? { apiKey } : {}) });

  return {
    async collectionExists(name) {
      const result = await client.collectionExists(name);
      return result.exists;
    },

    async getCollection(name) {
      const exists = await client.collectionExists(name);
      if (!exists.exists) return null;

      const info = await client.getCollection(name);
      const params = readVectorParams(info.config.params.vectors);
      if (!params) {
        throw new ValidationError(`Collection ${name} does not use a single unnamed dense vector`);
      }
      return { size: params.size, distance: params.distance, pointsCount: info.points_count ?? 0 };
    },

    async createCollection(name, size, distance) {
      await client.createCollection(name, { vectors: { size, distance } });
      // order_by needs a range index on the key
      await client.createPayloadIndex(name, { field_name: SEQUENCE_PAYLOAD_KEY, field_schema: 'integer', wait: true });
    },

    async deleteCollection(name) {
      await client.deleteCollection(name);
    },

    async upsert(name, points) {
      await client.upsert(name, { wait: true, points });
    },

    async retrieve(name, ids, withVector) {
      const records = await client.retrieve(name, { ids, with_payload: true, with_vector: withVector });
      return records.map(toPoint);
    },

    async delete(name, ids) {
      await client.delete(name, { wait: true, points: ids });
    },

    async search(name, vector, query) {
      const points = await client.search(name, {
        vector,
        limit: query.limit,
        with_payload: true,
        with_vector: query.withVector,
        ...(query.filter ? { filter: query.filter } : {}),
        ...(query.scoreThreshold !== undefined ? { score_threshold: query.scoreThreshold } : {}),
      });
      return points.map(toPoint);
    },

    async scroll(name, query) {
      const page = await client.scroll(name, {
        limit: query.limit,
        with_payload: true,
        with_vector: query.withVector,
        order_by: {
          key: SEQUENCE_PAYLOAD_KEY,
          direction: 'asc',
          ...(query.startFrom !== undefined ? { start_from: query.startFrom } : {}),
        },
        ...(query.filter ? { filter: query.filter } : {}),
      });
      return page.points.map(toPoint);
    },

    async count(name, filter) {
      const result = await client.count(name, { exact: true, ...(filter ? { filter } : {}) });
      return result.count;
    },
  };
}
