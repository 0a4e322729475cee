import { customAlphabet } from 'nanoid';
import { NoDataError, NotFoundError, ValidationError, isLociError } from '../errors.js';
import type { ClusteringScheduler } from '../clustering/scheduler.js';
import type { AxisCluster } from '../clustering/types.js';
import { DEFAULT_TIER_WEIGHTS, tierWeight } from '../clustering/weights.js';
import type { TierWeights } from '../config/index.js';
import type { EmbedderRegistry } from '../embedding/registry.js';
import { Collections, assertAxis, experienceCollection } from '../search/collections.js';
import type { Axis } from '../search/collections.js';
import { toValueResult } from '../search/results.js';
import type { ValueResult } from '../search/results.js';
import type { ManagedVectorStore } from '../storage/managed.js';
import type { Payload } from '../storage/types.js';
import { cosineSimilarity } from '../storage/vector.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';

export const DEFAULT_MIN_EXPERIENCES = 20;
// Candidate may sit this many standard deviations past the mean member distance
const STD_TOLERANCE = 0.5;
const LIST_LIMIT = 1000;

const valueSuffix = customAlphabet('0123456789abcdef', 8);

export interface ClusterMember {
  id: string;
  vector: Float32Array;
  payload: Payload;
  weight: number;
}

export interface CandidateValidation {
  valid: boolean;
  reason?: string;
  similarity?: number;
  candidateDistance?: number;
  meanDistance?: number;
  stdDistance?: number;
  threshold?: number;
}

export interface ValueStoreOptions {
  minExperiences?: number;
  tierWeights?: TierWeights;
  logger?: Logger;
}

function cosineDistance(a: Float32Array, b: Float32Array): number {
  return 1 - cosineSimilarity(a, b);
}

export function parseClusterId(clusterId: string): { axis: Axis; label: number } {
  const split = clusterId.lastIndexOf('_');
  const axis = clusterId.slice(0, split);
  const label = clusterId.slice(split + 1);
  if (split <= 0 || !/^\d+$/.test(label)) {
    throw new ValidationError(`Invalid cluster id '${clusterId}', expected <axis>_<label>`);
  }
  assertAxis(axis);
  return { axis, label: Number.parseInt(label, 10) };
}

/**
 * Values are short statements an agent distills from a cluster of
 * experiences. A candidate is accepted only if its embedding sits about as
 * close to the cluster centroid as the members themselves do.
 */
export class ValueStore {
  private minExperiences: number;
  private tierWeights: TierWeights;
  private logger: Logger;

  constructor(
    private scheduler: ClusteringScheduler,
    private embedders: EmbedderRegistry,
    private store: ManagedVectorStore,
    options: ValueStoreOptions = {}
  ) {
    this.minExperiences = options.minExperiences ?? DEFAULT_MIN_EXPERIENCES;
    this.tierWeights = options.tierWeights ?? DEFAULT_TIER_WEIGHTS;
    this.logger = (options.logger ?? silentLogger).child({ component: 'values' });
  }

  /** Clusters of one axis, largest first. Clustering goes through the scheduler. */
  async getClusters(axis: string): Promise<AxisCluster[]> {
    assertAxis(axis);

    const count = await this.scheduler.countExperiences(axis);
    if (count < this.minExperiences) {
      throw new NoDataError(
        `Not enough experiences for clustering on axis '${axis}'. Found ${count}, need at least ${this.minExperiences}.`
      );
    }

    const clusters = await this.scheduler.extract(axis);
    return clusters
      .map((cluster) => ({ ...cluster, axis, clusterId: `${axis}_${cluster.label}` }))
      .sort((a, b) => b.size - a.size);
  }

  async getClusterMembers(clusterId: string): Promise<ClusterMember[]> {
    return this.membersOf(await this.findCluster(clusterId));
  }

  private async membersOf(cluster: AxisCluster): Promise<ClusterMember[]> {
    const collection = experienceCollection(cluster.axis);

    const records = await Promise.all(
      cluster.memberIds.map((id) => this.store.get(collection, id, { withVector: true }))
    );

    const members: ClusterMember[] = [];
    for (const record of records) {
      if (!record?.vector) continue;
      members.push({
        id: record.id,
        vector: record.vector,
        payload: record.payload,
        weight: tierWeight(record.payload.confidence_tier, this.tierWeights),
      });
    }
    return members;
  }

  /**
   * Unknown clusters and axes without enough data make the candidate invalid
   * rather than throwing. Store and embedder failures still propagate.
   */
  async validateCandidate(text: string, clusterId: string): Promise<CandidateValidation> {
    const { validation } = await this.evaluate(text, clusterId);
    return validation;
  }

  async storeValue(text: string, clusterId: string, axis: string): Promise<ValueResult> {
    assertAxis(axis);
    const parsed = parseClusterId(clusterId);
    if (parsed.axis !== axis) {
      throw new ValidationError(`Cluster '${clusterId}' does not belong to axis '${axis}'`);
    }

    const { validation, cluster, vector } = await this.evaluate(text, clusterId);
    if (!validation.valid || !cluster || !vector) {
      throw new ValidationError(`Value failed validation: ${validation.reason ?? 'unknown reason'}`);
    }

    const id = `value_${axis}_${cluster.label}_${valueSuffix()}`;
    const payload: Payload = {
      text,
      cluster_id: clusterId,
      axis,
      cluster_label: cluster.label,
      member_count: cluster.size,
      avg_confidence: cluster.avgWeight,
      created_at: new Date().toISOString(),
      validation: {
        candidate_distance: validation.candidateDistance ?? null,
        mean_distance: validation.meanDistance ?? null,
        std_distance: validation.stdDistance ?? null,
        threshold: validation.threshold ?? null,
      },
    };

    await this.store.ensureCollection(Collections.VALUES);
    await this.store.upsert(Collections.VALUES, id, vector, payload);
    this.logger.info('value.stored', { id, clusterId, axis });

    return toValueResult({ id, score: 1, payload });
  }

  /** Stored values, newest first. */
  async listValues(axis?: string): Promise<ValueResult[]> {
    if (axis !== undefined) assertAxis(axis);

    const results = await this.store.scroll(Collections.VALUES, {
      limit: LIST_LIMIT,
      filters: axis !== undefined ? { axis } : null,
    });
    return results
      .map(toValueResult)
      .sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0));
  }

  private async findCluster(clusterId: string): Promise<AxisCluster> {
    const { axis } = parseClusterId(clusterId);
    const clusters = await this.getClusters(axis);
    const cluster = clusters.find((c) => c.clusterId === clusterId);
    if (!cluster) {
      throw new NotFoundError(`Cluster not found: ${clusterId}`);
    }
    return cluster;
  }

  private async evaluate(
    text: string,
    clusterId: string
  ): Promise<{ validation: CandidateValidation; cluster?: AxisCluster; vector?: Float32Array }> {
    if (!text.trim()) {
      throw new ValidationError('Value text must not be empty');
    }

    let cluster: AxisCluster;
    let members: ClusterMember[];
    try {
      cluster = await this.findCluster(clusterId);
      members = await this.membersOf(cluster);
    } catch (error) {
      if (isLociError(error) && (error.code === 'VALIDATION' || error.code === 'NOT_FOUND' || error.code === 'NO_DATA')) {
        return { validation: { valid: false, reason: error.message } };
      }
      throw error;
    }

    if (members.length === 0) {
      return { validation: { valid: false, reason: 'Cluster has no members' } };
    }

    const embedder = await this.embedders.semantic();
    const vector = await embedder.embed(text);

    const candidateDistance = cosineDistance(vector, cluster.centroid);
    const distances = members.map((member) => cosineDistance(member.vector, cluster.centroid));
    const meanDistance = distances.reduce((sum, d) => sum + d, 0) / distances.length;
    const stdDistance = Math.sqrt(
      distances.reduce((sum, d) => sum + (d - meanDistance) ** 2, 0) / distances.length
    );
    const threshold = meanDistance + STD_TOLERANCE * stdDistance;
    const metrics = { candidateDistance, meanDistance, stdDistance, threshold };

    if (candidateDistance <= threshold) {
      return { validation: { valid: true, similarity: 1 - candidateDistance, ...metrics }, cluster, vector };
    }

    this.logger.debug('value.rejected', { clusterId, candidateDistance, threshold });
    return {
      validation: {
        valid: false,
        reason:
          `Value too far from centroid (distance=${candidateDistance.toFixed(3)}, ` +
          `threshold=${threshold.toFixed(3)} [mean=${meanDistance.toFixed(3)} + 0.5*std=${stdDistance.toFixed(3)}])`,
        ...metrics,
      },
      cluster,
      vector,
    };
  }
}
