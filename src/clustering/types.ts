import type { Axis } from '../search/collections.js';

export type ClusterMetric = 'cosine' | 'euclidean';

export type SelectionMethod = 'eom' | 'leaf';

export const NOISE = -1;

export interface HdbscanOptions {
  minClusterSize: number;
  minSamples: number;
  selectionMethod?: SelectionMethod;
}

export interface ClusterResult {
  // One per input vector; NOISE for points outside every cluster
  labels: number[];
  clusterCount: number;
  noiseCount: number;
  // Membership strength in [0, 1]; 0 for noise
  probabilities: number[];
}

export interface ClusterInfo {
  label: number;
  // Weighted mean of the members' original vectors
  centroid: Float32Array;
  memberIds: string[];
  size: number;
  avgWeight: number;
}

export interface AxisCluster extends ClusterInfo {
  // `<axis>_<label>`
  clusterId: string;
  axis: Axis;
}
