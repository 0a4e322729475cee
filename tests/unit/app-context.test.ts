import { describe, it, expect } from 'vitest';
import { createAppContext } from '../../src/app/context.js';
import { defaultConfig } from '../../src/config/index.js';
import { Collections } from '../../src/search/collections.js';
import { ClusterWorkerPool } from '../../src/clustering/pool.js';
import { InMemoryVectorStore } from '../../src/storage/memory.js';
import { InlineClusterRunner } from '../helpers/cluster-runner.js';
import { FixedEmbedder, registryWith } from '../helpers/embedder.js';
import { captureLogger, events } from '../helpers/logger.js';
import type { LogEntry } from '../helpers/logger.js';

describe('createAppContext', () => {
  it('wires shared services over the injected store and embedders', async () => {
    const entries: LogEntry[] = [];
    const app = await createAppContext({
      config: defaultConfig(),
      projectRoot: '/nonexistent',
      logger: captureLogger(entries),
      store: new InMemoryVectorStore(),
      embedders: registryWith(new FixedEmbedder([1, 0, 0])),
    });

    expect(app.store.backend).toBe('memory');
    expect(app.store.standardCollections().every((c) => c.dimension === 3)).toBe(true);
    expect(events(entries, 'debug')).toContain('app.ready');

    await app.recorder.storeMemory({ content: 'Run the linter before pushing', category: 'workflow', id: 'mem-1' });
    expect(await app.store.count(Collections.MEMORIES)).toBe(1);

    const context = await app.assembler.assemble('linting', { sources: ['memory'] });
    expect(context.itemCount).toBe(1);
    expect(context.markdown).toContain('Run the linter before pushing');

    await app.close();
  });

  it('starts from empty collections', async () => {
    const app = await createAppContext({
      config: defaultConfig(),
      projectRoot: '/nonexistent',
      store: new InMemoryVectorStore(),
      embedders: registryWith(new FixedEmbedder([1, 0])),
    });

    expect(await app.searcher.searchValues('anything')).toEqual([]);
    expect(await app.extractor.countExperiences('full')).toBe(0);
    expect(app.clusterRunner).toBeInstanceOf(ClusterWorkerPool);

    await app.close();
  });

  it('clusters through the injected runner and closes it', async () => {
    const runner = new InlineClusterRunner();
    const app = await createAppContext({
      config: defaultConfig(),
      projectRoot: '/nonexistent',
      store: new InMemoryVectorStore(),
      embedders: registryWith(new FixedEmbedder([1, 0])),
      clusterRunner: runner,
    });

    expect(app.clusterRunner).toBe(runner);
    await app.close();
    expect(runner.closed).toBe(true);
  });
});
