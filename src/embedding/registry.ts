import type { EmbeddingsConfig } from '../config/index.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';
import { createEmbedder } from './embeddings.js';
import type { EmbeddingService } from './embeddings.js';

export type EmbedderRole = 'code' | 'semantic';

export type EmbedderFactory = (role: EmbedderRole) => Promise<EmbeddingService>;

export interface EmbedderRegistryOptions {
  logger?: Logger;
  // Replaces provider construction, mainly for tests
  factory?: EmbedderFactory;
}

/**
 * Holds one embedder per role, built on first use and reused afterwards.
 *
 * Constructed once at startup and passed to whoever needs embeddings.
 * Concurrent first calls share a single construction; a failed construction
 * is forgotten so a later call can try again.
 */
export class EmbedderRegistry {
  private embedders = new Map<EmbedderRole, Promise<EmbeddingService>>();
  private factory: EmbedderFactory;
  private logger: Logger;

  constructor(config: EmbeddingsConfig, options: EmbedderRegistryOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'embedder_registry' });
    this.factory = options.factory ?? ((role) => createEmbedder(config[role], this.logger));
  }

  get(role: EmbedderRole): Promise<EmbeddingService> {
    const existing = this.embedders.get(role);
    if (existing) return existing;

    const pending = this.factory(role).then(
      (embedder) => {
        this.logger.info('embedder.loaded', { role, name: embedder.name, dimension: embedder.dimension });
        return embedder;
      },
      (error: unknown) => {
        this.embedders.delete(role);
        throw error;
      }
    );
    this.embedders.set(role, pending);
    return pending;
  }

  code(): Promise<EmbeddingService> {
    return this.get('code');
  }

  semantic(): Promise<EmbeddingService> {
    return this.get('semantic');
  }

  /** Install an already-built embedder for a role. */
  register(role: EmbedderRole, embedder: EmbeddingService): void {
    this.embedders.set(role, Promise.resolve(embedder));
  }

  isLoaded(role: EmbedderRole): boolean {
    return this.embedders.has(role);
  }
}
