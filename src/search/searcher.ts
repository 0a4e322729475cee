import type { EmbedderRegistry, EmbedderRole } from '../embedding/registry.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';
import type { Filters, PayloadPrimitive, SearchResult, VectorStore } from '../storage/types.js';
import { Collections, experienceCollection } from './collections.js';
import type { CollectionName } from './collections.js';
import {
  toCodeResult,
  toCommitResult,
  toExperienceResult,
  toMemoryResult,
  toValueResult,
} from './results.js';
import type { CodeResult, CommitResult, ExperienceResult, MemoryResult, ValueResult } from './results.js';

export const DEFAULT_RESULT_LIMIT = 10;
// Values are sparse
export const DEFAULT_VALUE_LIMIT = 5;

export interface MemorySearchOptions {
  category?: string;
  limit?: number;
}

export interface CodeSearchOptions {
  project?: string;
  language?: string;
  unitType?: string;
  limit?: number;
}

export interface ExperienceSearchOptions {
  axis?: string;
  domain?: string;
  strategy?: string;
  outcome?: string;
  limit?: number;
}

export interface ValueSearchOptions {
  axis?: string;
  limit?: number;
}

export interface CommitSearchOptions {
  author?: string;
  since?: Date;
  limit?: number;
}

type FilterInput = PayloadPrimitive | Date | undefined;

/** Equality for plain values, `$gte` epoch seconds for dates; unset keys are skipped. */
export function buildFilters(fields: Record<string, FilterInput>): Filters | null {
  const filters: Filters = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    filters[key] = value instanceof Date ? { $gte: value.getTime() / 1000 } : value;
  }
  return Object.keys(filters).length > 0 ? filters : null;
}

/**
 * One query surface over every collection. Results come back typed;
 * store and embedder failures propagate to the caller unchanged.
 */
export class Searcher {
  private logger: Logger;

  constructor(
    private embedders: EmbedderRegistry,
    private store: VectorStore,
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child({ component: 'searcher' });
  }

  async searchMemories(query: string, options: MemorySearchOptions = {}): Promise<MemoryResult[]> {
    const results = await this.run(query, 'semantic', Collections.MEMORIES, options.limit ?? DEFAULT_RESULT_LIMIT, {
      category: options.category,
    });
    return results.map(toMemoryResult);
  }

  async searchCode(query: string, options: CodeSearchOptions = {}): Promise<CodeResult[]> {
    const results = await this.run(query, 'code', Collections.CODE, options.limit ?? DEFAULT_RESULT_LIMIT, {
      project: options.project,
      language: options.language,
      unit_type: options.unitType,
    });
    return results.map(toCodeResult);
  }

  async searchExperiences(query: string, options: ExperienceSearchOptions = {}): Promise<ExperienceResult[]> {
    // Validates the axis before touching the embedder
    const collection = experienceCollection(options.axis ?? 'full');
    const results = await this.run(query, 'semantic', collection, options.limit ?? DEFAULT_RESULT_LIMIT, {
      domain: options.domain,
      strategy: options.strategy,
      outcome_status: options.outcome,
    });
    return results.map(toExperienceResult);
  }

  async searchValues(query: string, options: ValueSearchOptions = {}): Promise<ValueResult[]> {
    const results = await this.run(query, 'semantic', Collections.VALUES, options.limit ?? DEFAULT_VALUE_LIMIT, {
      axis: options.axis,
    });
    return results.map(toValueResult);
  }

  async searchCommits(query: string, options: CommitSearchOptions = {}): Promise<CommitResult[]> {
    const results = await this.run(query, 'semantic', Collections.COMMITS, options.limit ?? DEFAULT_RESULT_LIMIT, {
      author: options.author,
      committed_at: options.since,
    });
    return results.map(toCommitResult);
  }

  private async run(
    query: string,
    role: EmbedderRole,
    collection: CollectionName,
    limit: number,
    filterFields: Record<string, FilterInput>
  ): Promise<SearchResult[]> {
    if (!query.trim()) return [];

    const embedder = await this.embedders.get(role);
    const vector = await embedder.embed(query);
    const filters = buildFilters(filterFields);

    const results = await this.store.search(collection, vector, { limit, filters });
    this.logger.debug('search.complete', { collection, results: results.length, filtered: filters !== null });
    return results;
  }
}
