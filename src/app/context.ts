import * as path from 'path';
import { ClusterExtractor } from '../clustering/extractor.js';
import { ClusterWorkerPool, clusterPoolOptions } from '../clustering/pool.js';
import type { ClusterRunner } from '../clustering/pool.js';
import { ClusteringScheduler } from '../clustering/scheduler.js';
import { findProjectRoot, LOCI_DIR, loadConfig } from '../config/index.js';
import type { Config } from '../config/index.js';
import { ContextAssembler } from '../context/assembler.js';
import { EmbedderRegistry } from '../embedding/registry.js';
import { Recorder } from '../ingest/recorder.js';
import { standardCollections } from '../search/collections.js';
import { Searcher } from '../search/searcher.js';
import { createVectorStore } from '../storage/index.js';
import { ManagedVectorStore } from '../storage/managed.js';
import type { VectorStore } from '../storage/types.js';
import { createLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';
import { ValueStore } from '../values/store.js';

export interface AppContext {
  config: Config;
  logger: Logger;
  embedders: EmbedderRegistry;
  store: ManagedVectorStore;
  searcher: Searcher;
  recorder: Recorder;
  assembler: ContextAssembler;
  clusterRunner: ClusterRunner;
  extractor: ClusterExtractor;
  scheduler: ClusteringScheduler;
  values: ValueStore;
  close(): Promise<void>;
}

export interface AppContextOptions {
  config?: Config;
  projectRoot?: string;
  logger?: Logger;
  // Overrides the backend named in config
  store?: VectorStore;
  embedders?: EmbedderRegistry;
  // Replaces the worker pool, e.g. where compiled worker files are absent
  clusterRunner?: ClusterRunner;
}

/**
 * Build every service once and hand out the shared instances. Both embedders
 * are resolved up front: their dimensions decide the standard collections.
 */
export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const projectRoot = options.projectRoot ?? findProjectRoot();
  const bootLogger = options.logger ?? createLogger();
  const config = options.config ?? loadConfig({ projectRoot: projectRoot ?? undefined, logger: bootLogger });
  const logger = options.logger ?? createLogger({ level: config.logging.level });

  const embedders = options.embedders ?? new EmbedderRegistry(config.embeddings, { logger });
  const [codeEmbedder, semanticEmbedder] = await Promise.all([embedders.code(), embedders.semantic()]);

  const inner = options.store ?? createVectorStore(config.storage, {
    logger,
    baseDir: projectRoot ? path.join(projectRoot, LOCI_DIR) : undefined,
  });
  const store = new ManagedVectorStore(
    inner,
    standardCollections({ code: codeEmbedder.dimension, semantic: semanticEmbedder.dimension }),
    { logger }
  );

  const clusterRunner =
    options.clusterRunner ?? new ClusterWorkerPool({ ...clusterPoolOptions(config.clustering), logger });
  const extractor = new ClusterExtractor(store, clusterRunner, {
    scrollLimit: config.storage.scrollLimit,
    tierWeights: config.clustering.tierWeights,
    logger,
  });
  const scheduler = new ClusteringScheduler(extractor, {
    concurrency: config.clustering.concurrency,
    timeoutMs: config.clustering.timeoutMs,
    logger,
  });
  const searcher = new Searcher(embedders, store, logger);

  logger.debug('app.ready', { backend: store.backend, projectRoot });

  return {
    config,
    logger,
    embedders,
    store,
    searcher,
    recorder: new Recorder(embedders, store, logger),
    assembler: new ContextAssembler(searcher, config.context, logger),
    clusterRunner,
    extractor,
    scheduler,
    values: new ValueStore(scheduler, embedders, store, {
      minExperiences: config.values.minExperiences,
      tierWeights: config.clustering.tierWeights,
      logger,
    }),
    async close() {
      await scheduler.stop();
      await clusterRunner.close();
      await store.close();
    },
  };
}
