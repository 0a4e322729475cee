import { ComputationError, ValidationError } from '../errors.js';
import { l2Normalize } from '../storage/vector.js';
import { hdbscan } from './hdbscan.js';
import { NOISE } from './types.js';
import type { ClusterInfo, ClusterMetric, ClusterResult, HdbscanOptions, SelectionMethod } from './types.js';

export interface ClustererOptions {
  minClusterSize?: number;
  minSamples?: number;
  selectionMethod?: SelectionMethod;
}

export interface ClusterOptions {
  metric?: ClusterMetric;
}

/**
 * Labels vectors with HDBSCAN and summarizes each cluster by a weighted
 * centroid.
 *
 * With the cosine metric, labels come from the L2-normalized vectors but
 * centroids are averaged over the vectors exactly as given. The centroid
 * therefore lives in the original embedding space and is not unit length.
 *
 * `cluster` is synchronous and CPU bound. Outside tests it only runs inside
 * a clustering worker (see ClusterWorkerPool).
 */
export class Clusterer {
  private options: HdbscanOptions;

  constructor(options: ClustererOptions = {}) {
    this.options = {
      minClusterSize: options.minClusterSize ?? 5,
      minSamples: options.minSamples ?? 3,
      selectionMethod: options.selectionMethod ?? 'eom',
    };
  }

  cluster(vectors: Float32Array[], options: ClusterOptions = {}): ClusterResult {
    if (vectors.length === 0) {
      throw new ValidationError('Cannot cluster an empty set of vectors');
    }
    const dimension = vectors[0].length;
    if (dimension === 0) {
      throw new ValidationError('Cannot cluster zero-dimensional vectors');
    }
    vectors.forEach((vector, index) => {
      if (vector.length !== dimension) {
        throw new ValidationError(`Vector ${index} has dimension ${vector.length}, expected ${dimension}`);
      }
    });

    const points = (options.metric ?? 'cosine') === 'cosine' ? vectors.map(l2Normalize) : vectors;
    const { labels, probabilities } = hdbscan(points, this.options);

    const clusterCount = new Set(labels.filter((label) => label !== NOISE)).size;
    const noiseCount = labels.filter((label) => label === NOISE).length;
    return { labels, clusterCount, noiseCount, probabilities };
  }

  computeCentroids(vectors: Float32Array[], labels: number[], ids: string[], weights?: number[]): ClusterInfo[] {
    return computeCentroids(vectors, labels, ids, weights);
  }
}

/**
 * Weighted mean of each cluster's members, over the vectors as given.
 * Noise is skipped and clusters come back in label order.
 */
export function computeCentroids(
  vectors: Float32Array[],
  labels: number[],
  ids: string[],
  weights?: number[]
): ClusterInfo[] {
  if (vectors.length !== labels.length || vectors.length !== ids.length) {
    throw new ValidationError(
      `Array lengths don't match: vectors=${vectors.length}, labels=${labels.length}, ids=${ids.length}`
    );
  }
  const memberWeights = weights ?? vectors.map(() => 1);
  if (memberWeights.length !== vectors.length) {
    throw new ValidationError(`Weights length (${memberWeights.length}) doesn't match vectors (${vectors.length})`);
  }

  const clusterLabels = Array.from(new Set(labels))
    .filter((label) => label !== NOISE)
    .sort((a, b) => a - b);

  return clusterLabels.map((label) => {
    const members = labels.flatMap((l, index) => (l === label ? [index] : []));
    const dimension = vectors[members[0]].length;
    const sum = new Float64Array(dimension);
    let totalWeight = 0;

    for (const index of members) {
      const weight = memberWeights[index];
      const vector = vectors[index];
      for (let d = 0; d < dimension; d++) {
        sum[d] += vector[d] * weight;
      }
      totalWeight += weight;
    }

    if (totalWeight === 0) {
      throw new ComputationError(`Cluster ${label} has zero total weight`);
    }

    return {
      label,
      centroid: Float32Array.from(sum, (value) => value / totalWeight),
      memberIds: members.map((index) => ids[index]),
      size: members.length,
      avgWeight: totalWeight / members.length,
    };
  });
}
