import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '../../src/errors.js';
import { Collections, standardCollections } from '../../src/search/collections.js';
import type { CollectionName } from '../../src/search/collections.js';
import { Searcher, buildFilters } from '../../src/search/searcher.js';
import { ManagedVectorStore } from '../../src/storage/managed.js';
import { InMemoryVectorStore } from '../../src/storage/memory.js';
import type { Payload } from '../../src/storage/types.js';
import { FixedEmbedder, registryWith } from '../helpers/embedder.js';
import { codePayload, commitPayload, experiencePayload, memoryPayload, valuePayload } from '../helpers/payloads.js';

describe('buildFilters', () => {
  it('skips unset fields and turns dates into lower bounds', () => {
    expect(buildFilters({ author: 'dev', project: undefined, committed_at: new Date(5000) })).toEqual({
      author: 'dev',
      committed_at: { $gte: 5 },
    });
  });

  it('returns null when nothing is set', () => {
    expect(buildFilters({ axis: undefined })).toBeNull();
  });
});

describe('Searcher', () => {
  let store: ManagedVectorStore;
  let embedder: FixedEmbedder;
  let searcher: Searcher;

  async function put(collection: CollectionName, id: string, vector: number[], payload: Payload): Promise<void> {
    await store.ensureCollection(collection);
    await store.upsert(collection, id, Float32Array.from(vector), payload);
  }

  beforeEach(() => {
    store = new ManagedVectorStore(new InMemoryVectorStore(), standardCollections({ code: 3, semantic: 3 }));
    embedder = new FixedEmbedder([1, 0, 0]);
    searcher = new Searcher(registryWith(embedder), store);
  });

  it('returns typed memories by similarity and filters by category', async () => {
    await put(Collections.MEMORIES, 'm1', [0.6, 0.8, 0], memoryPayload({ category: 'fact', content: 'Node 20 is the floor' }));
    await put(Collections.MEMORIES, 'm2', [1, 0, 0], memoryPayload({ tags: ['tooling'] }));

    const all = await searcher.searchMemories('tooling');
    expect(all.map((m) => m.id)).toEqual(['m2', 'm1']);
    expect(all[0]).toMatchObject({
      kind: 'memory',
      category: 'preference',
      content: 'Use workspaces for the monorepo',
      importance: 0.8,
      tags: ['tooling'],
      verifiedAt: null,
      createdAt: '2026-01-15T10:00:00.000Z',
    });

    const facts = await searcher.searchMemories('tooling', { category: 'fact' });
    expect(facts.map((m) => m.id)).toEqual(['m1']);
  });

  it('reads a collection that was never written as empty', async () => {
    expect(await searcher.searchCommits('anything')).toEqual([]);
    expect(await searcher.searchExperiences('anything', { axis: 'root_cause' })).toEqual([]);
  });

  it('returns nothing for a blank query without embedding it', async () => {
    await put(Collections.MEMORIES, 'm1', [1, 0, 0], memoryPayload());
    expect(await searcher.searchMemories('  ')).toEqual([]);
    expect(embedder.calls).toEqual([]);
  });

  it('validates the axis before anything else', async () => {
    await expect(searcher.searchExperiences('', { axis: 'mood' })).rejects.toBeInstanceOf(ValidationError);
    expect(embedder.calls).toEqual([]);
  });

  it('searches one experience axis with domain, strategy and outcome filters', async () => {
    await put(Collections.EXPERIENCES_SURPRISE, 'g1', [1, 0, 0], experiencePayload({ axis: 'surprise', surprise: 'It was DNS' }));
    await put(Collections.EXPERIENCES_SURPRISE, 'g2', [1, 0, 0], experiencePayload({
      ghap_id: 'g2',
      axis: 'surprise',
      outcome_status: 'confirmed',
    }));
    await put(Collections.EXPERIENCES_FULL, 'g3', [1, 0, 0], experiencePayload({ ghap_id: 'g3' }));

    const results = await searcher.searchExperiences('dns', { axis: 'surprise', outcome: 'falsified', domain: 'debugging' });

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ kind: 'experience', ghapId: 'ghap_1', axis: 'surprise', surprise: 'It was DNS' });
  });

  it('defaults experience search to the full axis', async () => {
    await put(Collections.EXPERIENCES_FULL, 'g3', [1, 0, 0], experiencePayload({ ghap_id: 'g3' }));
    expect((await searcher.searchExperiences('flaky')).map((e) => e.ghapId)).toEqual(['g3']);
  });

  it('filters code by project, language and unit type', async () => {
    await put(Collections.CODE, 'c1', [1, 0, 0], codePayload());
    await put(Collections.CODE, 'c2', [1, 0, 0], codePayload({ qualified_name: 'Parser', unit_type: 'class' }));
    await put(Collections.CODE, 'c3', [1, 0, 0], codePayload({ project: 'other' }));

    const results = await searcher.searchCode('parse', { project: 'demo', language: 'typescript', unitType: 'class' });
    expect(results.map((c) => c.qualifiedName)).toEqual(['Parser']);
    expect(results[0]).toMatchObject({ filePath: 'src/cli.ts', lineStart: 10, lineEnd: 12, docstring: null });
  });

  it('filters commits by author and date', async () => {
    await put(Collections.COMMITS, 'new', [1, 0, 0], commitPayload());
    await put(Collections.COMMITS, 'old', [1, 0, 0], commitPayload({ sha: 'old0000', committed_at: 1704067200 }));
    await put(Collections.COMMITS, 'other', [1, 0, 0], commitPayload({ sha: 'oth0000', author: 'someone' }));

    const results = await searcher.searchCommits('cache', { author: 'dev', since: new Date('2025-01-01T00:00:00Z') });

    expect(results.map((c) => c.sha)).toEqual(['abcdef1234567890']);
    expect(results[0].committedAt).toBe('2026-01-01T00:00:00.000Z');
    expect(results[0].filesChanged).toEqual(['src/cache.ts']);
  });

  it('caps value search at five results by default', async () => {
    for (let i = 0; i < 7; i++) {
      await put(Collections.VALUES, `v${i}`, [1, 0, 0], valuePayload({ cluster_id: `full_${i}` }));
    }
    await put(Collections.VALUES, 'vs', [1, 0, 0], valuePayload({ axis: 'surprise', cluster_id: 'surprise_0' }));

    expect(await searcher.searchValues('principles')).toHaveLength(5);
    expect((await searcher.searchValues('principles', { axis: 'surprise' })).map((v) => v.id)).toEqual(['vs']);
  });

  it('rejects a malformed payload', async () => {
    await put(Collections.MEMORIES, 'bad', [1, 0, 0], { category: 'fact', created_at: '2026-01-01T00:00:00.000Z' });
    await expect(searcher.searchMemories('anything')).rejects.toThrow(/^Malformed memory payload for record bad: content/);
  });
});
