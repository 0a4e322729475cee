import type { CONTEXT_SOURCES } from '../config/index.js';
import type { Payload } from '../storage/types.js';

export type ContextSource = (typeof CONTEXT_SOURCES)[number];

export type TokenEstimator = 'chars' | 'words';

export type SourceWeights = Record<ContextSource, number>;

/** One retrieved unit of content, built per query and never persisted. */
export interface ContextItem {
  source: ContextSource;
  // Rendered markdown block
  content: string;
  relevance: number;
  metadata: Payload;
}

export type ItemsBySource = Partial<Record<ContextSource, ContextItem[]>>;

export interface DedupOptions {
  similarityThreshold?: number;
  maxFuzzyContentLength?: number;
}

export interface AllocationOptions {
  weights: SourceWeights;
  maxTokens: number;
  maxItemFraction: number;
  estimator?: TokenEstimator;
  // Sources to budget for, in rendering order; defaults to the keys present
  sources?: ContextSource[];
}

export interface Allocation {
  selected: ItemsBySource;
  budgets: Partial<Record<ContextSource, number>>;
  usedTokens: number;
  truncated: boolean;
  truncatedIds: string[];
  omittedCount: number;
}

export type RenderMode =
  | { mode: 'standard' }
  | { mode: 'premortem'; domain: string; strategy?: string };

export interface AssembleOptions extends DedupOptions {
  weights: SourceWeights;
  maxTokens: number;
  maxItemFraction: number;
  estimator?: TokenEstimator;
  sources?: ContextSource[];
  render?: RenderMode;
}

export interface AssembledContext {
  markdown: string;
  items: ContextItem[];
  tokenCount: number;
  itemCount: number;
  truncated: boolean;
  truncatedIds: string[];
  sourcesUsed: Partial<Record<ContextSource, number>>;
  budgets: Partial<Record<ContextSource, number>>;
  // The rendered markdown, headers included, came out above maxTokens
  budgetExceeded: boolean;
}
