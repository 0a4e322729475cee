import { describe, it, expect, beforeEach } from 'vitest';
import { NoDataError, NotFoundError, TimeoutError, ValidationError } from '../../src/errors.js';
import { ClusterExtractor } from '../../src/clustering/extractor.js';
import { ClusteringScheduler } from '../../src/clustering/scheduler.js';
import { Collections, standardCollections } from '../../src/search/collections.js';
import { ManagedVectorStore } from '../../src/storage/managed.js';
import { InMemoryVectorStore } from '../../src/storage/memory.js';
import { ValueStore, parseClusterId } from '../../src/values/store.js';
import { InlineClusterRunner, StalledClusterRunner } from '../helpers/cluster-runner.js';
import { FixedEmbedder, registryWith } from '../helpers/embedder.js';
import { captureLogger, events } from '../helpers/logger.js';
import type { LogEntry } from '../helpers/logger.js';
import { valuePayload } from '../helpers/payloads.js';

const unit = (angle: number) => Float32Array.from([Math.cos(angle), Math.sin(angle)]);

// Ten experiences fanned out just above the x axis, ten just below the y axis
const nearX = Array.from({ length: 10 }, (_, i) => ({ id: `x${i}`, vector: unit(0.01 * i) }));
const nearY = Array.from({ length: 10 }, (_, i) => ({ id: `y${i}`, vector: unit(Math.PI / 2 - 0.01 * i) }));

describe('parseClusterId', () => {
  it('splits on the last underscore', () => {
    expect(parseClusterId('root_cause_3')).toEqual({ axis: 'root_cause', label: 3 });
    expect(parseClusterId('full_0')).toEqual({ axis: 'full', label: 0 });
  });

  it.each(['full', 'full_', '_1', 'full_x', 'mood_1'])('rejects %s', (id) => {
    expect(() => parseClusterId(id)).toThrow(ValidationError);
  });
});

describe('ValueStore', () => {
  let store: ManagedVectorStore;
  let entries: LogEntry[];
  let runner: InlineClusterRunner;
  let values: ValueStore;
  const embedder = new FixedEmbedder([1, 0], {
    'Prefer small reproducible steps': [Math.cos(0.045), Math.sin(0.045)],
    'Ship on Fridays': [0, 1],
  });

  async function seed(records: Array<{ id: string; vector: Float32Array }>): Promise<void> {
    await store.ensureCollection(Collections.EXPERIENCES_FULL);
    for (const { id, vector } of records) {
      await store.upsert(Collections.EXPERIENCES_FULL, id, vector, { ghap_id: id, confidence_tier: 'gold' });
    }
  }

  async function clusterIdOf(memberId: string): Promise<string> {
    const clusters = await values.getClusters('full');
    const cluster = clusters.find((c) => c.memberIds.includes(memberId));
    if (!cluster) throw new Error(`no cluster holds ${memberId}`);
    return cluster.clusterId;
  }

  beforeEach(async () => {
    store = new ManagedVectorStore(new InMemoryVectorStore(), standardCollections({ code: 2, semantic: 2 }));
    entries = [];
    const logger = captureLogger(entries);
    runner = new InlineClusterRunner({ minClusterSize: 6, minSamples: 3 });
    const scheduler = new ClusteringScheduler(new ClusterExtractor(store, runner, { logger }), { logger });
    values = new ValueStore(scheduler, registryWith(embedder), store, { logger });
    await seed([...nearX, ...nearY]);
  });

  describe('getClusters', () => {
    it('returns axis clusters, largest first', async () => {
      const clusters = await values.getClusters('full');

      expect(clusters).toHaveLength(2);
      expect(clusters.map((c) => c.clusterId).sort()).toEqual(['full_0', 'full_1']);
      expect(clusters.every((c) => c.axis === 'full' && c.size === 10)).toBe(true);
      const x = clusters.find((c) => c.memberIds.includes('x0'));
      expect(x?.memberIds).toEqual(nearX.map((r) => r.id));
    });

    it('needs enough experiences', async () => {
      await store.delete(Collections.EXPERIENCES_FULL, 'y9');

      await expect(values.getClusters('full')).rejects.toThrow(
        new NoDataError("Not enough experiences for clustering on axis 'full'. Found 19, need at least 20.")
      );
    });

    it('treats a never-written axis as having no experiences', async () => {
      await expect(values.getClusters('strategy')).rejects.toThrow(
        new NoDataError("Not enough experiences for clustering on axis 'strategy'. Found 0, need at least 20.")
      );
    });

    it('rejects an unknown axis', async () => {
      await expect(values.getClusters('mood')).rejects.toBeInstanceOf(ValidationError);
    });

    it('gives up on clustering that overruns the scheduler timeout', async () => {
      const stalled = new StalledClusterRunner();
      const scheduler = new ClusteringScheduler(new ClusterExtractor(store, stalled), { timeoutMs: 20 });
      const slow = new ValueStore(scheduler, registryWith(embedder), store);

      await expect(slow.getClusters('full')).rejects.toThrow(new TimeoutError('clustering.extract(full)', 20));
      expect(stalled.calls).toBe(1);
      expect(stalled.signals[0].aborted).toBe(true);
    });
  });

  describe('getClusterMembers', () => {
    it('loads member vectors and tier weights', async () => {
      const members = await values.getClusterMembers(await clusterIdOf('y0'));

      expect(members.map((m) => m.id)).toEqual(nearY.map((r) => r.id));
      expect(members.every((m) => m.weight === 1 && m.vector.length === 2)).toBe(true);
      expect(members[0].payload).toEqual({ ghap_id: 'y0', confidence_tier: 'gold' });
    });

    it('raises for an unknown cluster', async () => {
      await expect(values.getClusterMembers('full_7')).rejects.toThrow(new NotFoundError('Cluster not found: full_7'));
    });
  });

  describe('validateCandidate', () => {
    it('accepts text that lands among the members', async () => {
      const result = await values.validateCandidate('Prefer small reproducible steps', await clusterIdOf('x0'));

      expect(result.valid).toBe(true);
      expect(result.similarity).toBeCloseTo(1, 4);
      expect(result.candidateDistance).toBeLessThanOrEqual(result.threshold ?? 0);
      expect(result.reason).toBeUndefined();
    });

    it('clusters the axis once per candidate', async () => {
      const clusterId = await clusterIdOf('x0');
      runner.calls = 0;

      await values.validateCandidate('Prefer small reproducible steps', clusterId);
      expect(runner.calls).toBe(1);
    });

    it('rejects text far from the centroid', async () => {
      const result = await values.validateCandidate('Ship on Fridays', await clusterIdOf('x0'));

      expect(result.valid).toBe(false);
      expect(result.similarity).toBeUndefined();
      expect(result.candidateDistance).toBeCloseTo(1 - Math.sin(0.045), 3);
      expect(result.reason?.startsWith('Value too far from centroid (distance=0.955, threshold=')).toBe(true);
    });

    it('reports lookup problems as an invalid candidate', async () => {
      expect(await values.validateCandidate('anything', 'full_7'))
        .toEqual({ valid: false, reason: 'Cluster not found: full_7' });
      expect((await values.validateCandidate('anything', 'nonsense')).valid).toBe(false);
      expect(await values.validateCandidate('anything', 'surprise_0')).toEqual({
        valid: false,
        reason: "Not enough experiences for clustering on axis 'surprise'. Found 0, need at least 20.",
      });
    });

    it('throws on empty text', async () => {
      await expect(values.validateCandidate('  ', 'full_0')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('storeValue', () => {
    it('stores a validated value with its cluster statistics', async () => {
      const clusterId = await clusterIdOf('x0');
      const { label } = parseClusterId(clusterId);

      const stored = await values.storeValue('Prefer small reproducible steps', clusterId, 'full');

      expect(stored.kind).toBe('value');
      expect(stored.id).toMatch(new RegExp(`^value_full_${label}_[0-9a-f]{8}$`));
      expect(stored.text).toBe('Prefer small reproducible steps');
      expect(stored.clusterId).toBe(clusterId);
      expect(stored.memberCount).toBe(10);
      expect(stored.avgConfidence).toBe(1);

      const record = await store.get(Collections.VALUES, stored.id);
      expect(record?.payload.cluster_label).toBe(label);
      expect(Object.keys(record?.payload.validation ?? {}).sort())
        .toEqual(['candidate_distance', 'mean_distance', 'std_distance', 'threshold']);
      expect(events(entries, 'info')).toContain('value.stored');
    });

    it('refuses a value that fails validation', async () => {
      const clusterId = await clusterIdOf('x0');

      await expect(values.storeValue('Ship on Fridays', clusterId, 'full'))
        .rejects.toThrow(/^Value failed validation: Value too far from centroid/);
      expect(await store.count(Collections.VALUES)).toBe(0);
    });

    it('refuses a cluster from another axis', async () => {
      await expect(values.storeValue('Prefer small reproducible steps', 'full_0', 'surprise'))
        .rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('listValues', () => {
    it('is empty before anything was stored', async () => {
      expect(await values.listValues()).toEqual([]);
    });

    it('lists newest first and filters by axis', async () => {
      await store.ensureCollection(Collections.VALUES);
      await store.upsert(Collections.VALUES, 'v-old', Float32Array.from([1, 0]), valuePayload({
        created_at: '2026-01-01T00:00:00.000Z',
      }));
      await store.upsert(Collections.VALUES, 'v-new', Float32Array.from([1, 0]), valuePayload({
        created_at: '2026-03-01T00:00:00.000Z',
      }));
      await store.upsert(Collections.VALUES, 'v-surprise', Float32Array.from([0, 1]), valuePayload({
        axis: 'surprise',
        cluster_id: 'surprise_0',
        created_at: '2026-02-01T00:00:00.000Z',
      }));

      expect((await values.listValues()).map((v) => v.id)).toEqual(['v-new', 'v-surprise', 'v-old']);
      expect((await values.listValues('surprise')).map((v) => v.id)).toEqual(['v-surprise']);
    });

    it('rejects an unknown axis', async () => {
      await expect(values.listValues('mood')).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
