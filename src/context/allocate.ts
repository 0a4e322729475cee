import { CONTEXT_SOURCES } from '../config/index.js';
import { ValidationError } from '../errors.js';
import { distributeBudget, estimateTokens, truncateToTokens, truncationMarker } from './tokens.js';
import type { Allocation, AllocationOptions, ContextItem, ContextSource, ItemsBySource } from './types.js';

export function presentSources(itemsBySource: ItemsBySource): ContextSource[] {
  return CONTEXT_SOURCES.filter((source) => itemsBySource[source] !== undefined);
}

function itemId(item: ContextItem): string {
  const id = item.metadata.id;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : 'unknown';
}

/**
 * Fit items into per-source token budgets.
 *
 * Items go in by relevance. One over `budget * maxItemFraction` is cut down
 * to that cap with a truncation marker. A source stops taking items at the
 * first one that no longer fits: over its remaining budget, or too big to
 * cut because the marker alone is over the cap. Everything from that item
 * on counts as omitted, so a lower-ranked item never stands in for a
 * higher-ranked one. Budget a source leaves unused is not handed on.
 */
export function allocateBudget(itemsBySource: ItemsBySource, options: AllocationOptions): Allocation {
  if (!(options.maxItemFraction > 0 && options.maxItemFraction <= 1)) {
    throw new ValidationError(`maxItemFraction must be in (0, 1], got ${options.maxItemFraction}`);
  }
  const estimator = options.estimator ?? 'chars';
  const sources = options.sources ?? presentSources(itemsBySource);
  const budgets = distributeBudget(sources, options.weights, options.maxTokens);

  const selected: ItemsBySource = {};
  const truncatedIds: string[] = [];
  let usedTokens = 0;
  let omittedCount = 0;

  for (const source of sources) {
    const budget = budgets[source] ?? 0;
    const itemCap = Math.floor(budget * options.maxItemFraction);
    const candidates = [...(itemsBySource[source] ?? [])].sort((a, b) => b.relevance - a.relevance);
    const chosen: ContextItem[] = [];
    let used = 0;

    for (let index = 0; index < candidates.length; index++) {
      const item = candidates[index];
      let content = item.content;
      let tokens = estimateTokens(content, estimator);
      let shortened = false;

      if (tokens > itemCap) {
        const cut = truncateToTokens(content, itemCap, truncationMarker(source, item.metadata), estimator);
        if (cut === null) {
          omittedCount += candidates.length - index;
          break;
        }
        content = cut;
        tokens = estimateTokens(content, estimator);
        shortened = true;
      }

      if (used + tokens > budget) {
        omittedCount += candidates.length - index;
        break;
      }

      chosen.push(shortened ? { ...item, content } : item);
      if (shortened) truncatedIds.push(itemId(item));
      used += tokens;
    }

    selected[source] = chosen;
    usedTokens += used;
  }

  return {
    selected,
    budgets,
    usedTokens,
    truncated: truncatedIds.length > 0 || omittedCount > 0,
    truncatedIds,
    omittedCount,
  };
}
