import { CONTEXT_SOURCES } from '../config/index.js';
import type { ContextConfig } from '../config/index.js';
import { ValidationError } from '../errors.js';
import type { Searcher } from '../search/searcher.js';
import type { TypedResult } from '../search/results.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';
import { allocateBudget, presentSources } from './allocate.js';
import { deduplicate } from './dedup.js';
import { renderPremortem, renderStandard, toContextItem } from './formatting.js';
import { assertMaxTokens, estimateTokens, isContextSource } from './tokens.js';
import type {
  AssembleOptions,
  AssembledContext,
  ContextItem,
  ContextSource,
  ItemsBySource,
  TokenEstimator,
} from './types.js';

export const DEFAULT_ASSEMBLE_LIMIT = 20;
export const DEFAULT_PREMORTEM_LIMIT = 10;
export const DEFAULT_PREMORTEM_MAX_TOKENS = 1500;
const VALUE_LIMIT = 5;

const PREMORTEM_SOURCES: ContextSource[] = ['experience', 'value'];

function groupBySource(items: ContextItem[]): ItemsBySource {
  const grouped: ItemsBySource = {};
  for (const item of items) {
    const bucket = grouped[item.source];
    if (bucket) {
      bucket.push(item);
    } else {
      grouped[item.source] = [item];
    }
  }
  return grouped;
}

// The same experience appears once per axis; only collapse within an axis
function dedupPremortem(itemsBySource: ItemsBySource, options: AssembleOptions): ItemsBySource {
  const byAxis = new Map<string, ContextItem[]>();
  for (const item of itemsBySource.experience ?? []) {
    const axis = typeof item.metadata.axis === 'string' ? item.metadata.axis : '';
    const group = byAxis.get(axis);
    if (group) {
      group.push(item);
    } else {
      byAxis.set(axis, [item]);
    }
  }

  const experience: ContextItem[] = [];
  for (const group of byAxis.values()) {
    experience.push(...deduplicate(group, options));
  }
  return {
    experience,
    value: deduplicate(itemsBySource.value ?? [], options),
  };
}

/**
 * Turn retrieved items into one markdown document that fits `maxTokens`.
 * Pure: the same input always yields the same document.
 */
export function assembleContext(itemsBySource: ItemsBySource, options: AssembleOptions): AssembledContext {
  const render = options.render ?? { mode: 'standard' };
  const estimator = options.estimator ?? 'chars';

  let deduped: ItemsBySource;
  let sources: ContextSource[];
  if (render.mode === 'premortem') {
    deduped = dedupPremortem(itemsBySource, options);
    sources = options.sources ?? PREMORTEM_SOURCES;
  } else {
    const pooled = presentSources(itemsBySource).flatMap((source) => itemsBySource[source] ?? []);
    deduped = groupBySource(deduplicate(pooled, options));
    sources = options.sources ?? presentSources(itemsBySource);
  }

  const allocation = allocateBudget(deduped, {
    weights: options.weights,
    maxTokens: options.maxTokens,
    maxItemFraction: options.maxItemFraction,
    estimator,
    sources,
  });

  const markdown = render.mode === 'premortem'
    ? renderPremortem(allocation.selected, render.domain, render.strategy)
    : renderStandard(allocation.selected, sources);

  const items: ContextItem[] = [];
  const sourcesUsed: Partial<Record<ContextSource, number>> = {};
  for (const source of sources) {
    const chosen = allocation.selected[source] ?? [];
    if (chosen.length === 0) continue;
    items.push(...chosen);
    sourcesUsed[source] = chosen.length;
  }

  const tokenCount = estimateTokens(markdown, estimator);
  return {
    markdown,
    items,
    tokenCount,
    itemCount: items.length,
    truncated: allocation.truncated,
    truncatedIds: allocation.truncatedIds,
    sourcesUsed,
    budgets: allocation.budgets,
    budgetExceeded: tokenCount > options.maxTokens,
  };
}

export interface AssembleRequest {
  sources?: readonly string[];
  limit?: number;
  maxTokens?: number;
  estimator?: TokenEstimator;
}

export interface PremortemRequest {
  strategy?: string;
  limit?: number;
  maxTokens?: number;
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`limit must be a positive integer, got ${limit}`);
  }
}

function resolveSources(sources: readonly string[] | undefined): ContextSource[] {
  if (sources === undefined) return [...CONTEXT_SOURCES];
  const resolved: ContextSource[] = [];
  for (const source of sources) {
    if (!isContextSource(source)) {
      throw new ValidationError(`Invalid context source '${source}'. Valid: ${CONTEXT_SOURCES.join(', ')}`);
    }
    if (!resolved.includes(source)) resolved.push(source);
  }
  if (resolved.length === 0) {
    throw new ValidationError('At least one context source is required');
  }
  return resolved;
}

/**
 * Queries the searcher for every requested source at once and assembles the
 * results. A failing source fails the whole call.
 */
export class ContextAssembler {
  private logger: Logger;

  constructor(
    private searcher: Searcher,
    private config: ContextConfig,
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child({ component: 'context' });
  }

  async assemble(query: string, request: AssembleRequest = {}): Promise<AssembledContext> {
    const sources = resolveSources(request.sources);
    const limit = request.limit ?? DEFAULT_ASSEMBLE_LIMIT;
    const maxTokens = request.maxTokens ?? this.config.maxTokens;
    assertLimit(limit);
    assertMaxTokens(maxTokens);

    const fetched = await Promise.all(sources.map((source) => this.fetch(source, query, limit)));

    const itemsBySource: ItemsBySource = {};
    sources.forEach((source, index) => {
      itemsBySource[source] = fetched[index].map(toContextItem);
    });

    const context = assembleContext(itemsBySource, {
      ...this.dedupOptions(),
      weights: this.config.sourceWeights,
      maxTokens,
      maxItemFraction: this.config.maxItemFraction,
      estimator: request.estimator ?? this.config.tokenEstimator,
      sources,
    });

    this.report('context.assembled', context, maxTokens);
    return context;
  }

  async premortem(domain: string, request: PremortemRequest = {}): Promise<AssembledContext> {
    const { strategy } = request;
    const limit = request.limit ?? DEFAULT_PREMORTEM_LIMIT;
    const maxTokens = request.maxTokens ?? DEFAULT_PREMORTEM_MAX_TOKENS;
    assertLimit(limit);
    assertMaxTokens(maxTokens);

    const [full, byStrategy, surprise, rootCause, values] = await Promise.all([
      this.searcher.searchExperiences(`failures and issues in ${domain}`, {
        axis: 'full',
        domain,
        outcome: 'falsified',
        limit,
      }),
      strategy
        ? this.searcher.searchExperiences(`outcomes using ${strategy} strategy`, { axis: 'strategy', strategy, limit })
        : Promise.resolve([]),
      this.searcher.searchExperiences(`unexpected outcomes in ${domain}`, { axis: 'surprise', domain, limit }),
      this.searcher.searchExperiences(`why hypotheses fail in ${domain}`, { axis: 'root_cause', domain, limit }),
      this.searcher.searchValues(`principles for ${domain}${strategy ? ` using ${strategy}` : ''}`, {
        limit: VALUE_LIMIT,
      }),
    ]);

    const context = assembleContext(
      {
        experience: [...full, ...byStrategy, ...surprise, ...rootCause].map(toContextItem),
        value: values.map(toContextItem),
      },
      {
        ...this.dedupOptions(),
        weights: this.config.sourceWeights,
        maxTokens,
        maxItemFraction: this.config.maxItemFraction,
        estimator: this.config.tokenEstimator,
        sources: PREMORTEM_SOURCES,
        render: { mode: 'premortem', domain, strategy },
      }
    );

    this.report('context.premortem', context, maxTokens);
    return context;
  }

  private dedupOptions() {
    return {
      similarityThreshold: this.config.similarityThreshold,
      maxFuzzyContentLength: this.config.maxFuzzyContentLength,
    };
  }

  private fetch(source: ContextSource, query: string, limit: number): Promise<TypedResult[]> {
    switch (source) {
      case 'memory':
        return this.searcher.searchMemories(query, { limit });
      case 'code':
        return this.searcher.searchCode(query, { limit });
      case 'experience':
        return this.searcher.searchExperiences(query, { limit });
      case 'value':
        return this.searcher.searchValues(query, { limit: VALUE_LIMIT });
      case 'commit':
        return this.searcher.searchCommits(query, { limit });
    }
  }

  private report(event: string, context: AssembledContext, maxTokens: number): void {
    this.logger.info(event, {
      items: context.itemCount,
      tokens: context.tokenCount,
      truncated: context.truncated,
    });
    if (context.budgetExceeded) {
      this.logger.warn('context.budget_exceeded', { tokens: context.tokenCount, maxTokens });
    }
  }
}
