export type Distance = 'cosine' | 'euclidean' | 'dot';

export const DISTANCES: readonly Distance[] = ['cosine', 'euclidean', 'dot'];

export type PayloadPrimitive = string | number | boolean | null;

export type PayloadValue =
  | PayloadPrimitive
  | PayloadValue[]
  | { [key: string]: PayloadValue };

export type Payload = Record<string, PayloadValue>;

export type RangeOperator = '$gte' | '$lte' | '$gt' | '$lt';

export type FilterOperators = { [op in RangeOperator]?: number } & { $in?: PayloadPrimitive[] };

export type FilterCondition = PayloadPrimitive | FilterOperators;

// All top-level keys are ANDed
export type Filters = Record<string, FilterCondition>;

export interface CollectionInfo {
  name: string;
  dimension: number;
  distance: Distance;
  vectorCount: number;
}

export interface VectorRecord {
  id: string;
  vector?: Float32Array;
  payload: Payload;
}

export interface SearchResult {
  id: string;
  // Higher is more similar: cosine in [-1, 1], euclidean 1/(1+d) in (0, 1], dot unbounded
  score: number;
  payload: Payload;
  vector?: Float32Array;
}

export interface SearchOptions {
  limit?: number;
  filters?: Filters | null;
  withVectors?: boolean;
}

export interface ScrollOptions {
  limit?: number;
  filters?: Filters | null;
  withVectors?: boolean;
}

export interface GetOptions {
  withVector?: boolean;
}

/**
 * Typed vector record storage shared by every backend.
 *
 * Implementations: InMemoryVectorStore (reference, offline default),
 * SqliteVectorStore (persistent local) and QdrantVectorStore (external
 * service). All of them pass the same conformance suite.
 */
export interface VectorStore {
  readonly backend: string;

  createCollection(name: string, dimension: number, distance?: Distance): Promise<void>;
  deleteCollection(name: string): Promise<void>;
  getCollectionInfo(name: string): Promise<CollectionInfo | null>;

  upsert(collection: string, id: string, vector: Float32Array, payload: Payload): Promise<void>;
  get(collection: string, id: string, options?: GetOptions): Promise<VectorRecord | null>;
  delete(collection: string, id: string): Promise<void>;

  search(collection: string, query: Float32Array, options?: SearchOptions): Promise<SearchResult[]>;
  scroll(collection: string, options?: ScrollOptions): Promise<SearchResult[]>;
  count(collection: string, filters?: Filters | null): Promise<number>;

  close(): Promise<void>;
}

export const DEFAULT_SEARCH_LIMIT = 10;
export const DEFAULT_SCROLL_LIMIT = 100;
export const DEFAULT_SCROLL_CEILING = 10000;
