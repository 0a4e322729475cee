import type { TierWeights } from '../config/index.js';
import { NoDataError } from '../errors.js';
import { AXES, experienceCollection } from '../search/collections.js';
import type { Axis } from '../search/collections.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';
import { DEFAULT_SCROLL_CEILING } from '../storage/types.js';
import type { VectorStore } from '../storage/types.js';
import { computeCentroids } from './clusterer.js';
import type { ClusterRunner } from './pool.js';
import type { ClusterInfo } from './types.js';
import { DEFAULT_TIER_WEIGHTS, tierWeight } from './weights.js';

export interface ExtractorOptions {
  scrollLimit?: number;
  tierWeights?: TierWeights;
  logger?: Logger;
}

export interface ExtractOptions {
  // Abandons the run: no further reads, and the clustering job is dropped
  signal?: AbortSignal;
}

/**
 * Pulls every experience of one axis out of the store and hands the vectors
 * to a ClusterRunner. Reads and centroids happen here; HDBSCAN does not.
 * Run it through the ClusteringScheduler.
 */
export class ClusterExtractor {
  private scrollLimit: number;
  private tierWeights: TierWeights;
  private logger: Logger;

  constructor(
    private store: VectorStore,
    private runner: ClusterRunner,
    options: ExtractorOptions = {}
  ) {
    this.scrollLimit = options.scrollLimit ?? DEFAULT_SCROLL_CEILING;
    this.tierWeights = options.tierWeights ?? DEFAULT_TIER_WEIGHTS;
    this.logger = (options.logger ?? silentLogger).child({ component: 'clustering' });
  }

  async countExperiences(axis: string): Promise<number> {
    return this.store.count(experienceCollection(axis));
  }

  async extract(axis: string, options: ExtractOptions = {}): Promise<ClusterInfo[]> {
    const { signal } = options;
    const collection = experienceCollection(axis);
    const info = await this.store.getCollectionInfo(collection);
    const records = info
      ? await this.store.scroll(collection, { limit: this.scrollLimit, withVectors: true })
      : [];
    signal?.throwIfAborted();

    if (records.length === 0) {
      throw new NoDataError(`No embeddings found for axis '${axis}' (collection: ${collection})`);
    }
    if (records.length >= this.scrollLimit) {
      this.logger.warn('clustering.scroll_limit_reached', { axis, collection, count: records.length });
    }

    const vectors: Float32Array[] = [];
    const ids: string[] = [];
    const weights: number[] = [];
    for (const record of records) {
      if (!record.vector) continue;
      vectors.push(record.vector);
      ids.push(record.id);
      weights.push(tierWeight(record.payload.confidence_tier, this.tierWeights));
    }
    if (vectors.length === 0) {
      throw new NoDataError(`No vectors returned for axis '${axis}' (collection: ${collection})`);
    }

    const metric = info?.distance === 'cosine' ? 'cosine' : 'euclidean';
    const result = await this.runner.cluster(vectors, metric, { signal });

    if (result.clusterCount === 0) {
      this.logger.warn('clustering.all_noise', { axis, points: vectors.length, noise: result.noiseCount });
      return [];
    }

    const clusters = computeCentroids(vectors, result.labels, ids, weights);
    this.logger.info('clustering.complete', {
      axis,
      clusters: clusters.length,
      points: vectors.length,
      noise: result.noiseCount,
    });
    return clusters;
  }

  /** Cluster every axis; axes with no data are skipped. */
  async extractAll(options: ExtractOptions = {}): Promise<Partial<Record<Axis, ClusterInfo[]>>> {
    const results: Partial<Record<Axis, ClusterInfo[]>> = {};
    for (const axis of AXES) {
      try {
        results[axis] = await this.extract(axis, options);
      } catch (error) {
        if (!(error instanceof NoDataError)) throw error;
        this.logger.warn('clustering.axis_skipped', { axis, error: error.message });
      }
    }
    return results;
  }
}
