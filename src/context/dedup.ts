import type { ContextItem, DedupOptions } from './types.js';
import { maxPossibleRatio, similarityRatio } from './similarity.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.9;
export const DEFAULT_MAX_FUZZY_CONTENT_LENGTH = 1000;

// Lookup order: cross-source reference, physical artifact, content hash, own id
const KEY_FIELDS = ['ghap_id', 'file_path', 'sha', 'id'] as const;

const KEY_PREFIX: Record<(typeof KEY_FIELDS)[number], string> = {
  ghap_id: 'ghap',
  file_path: 'file',
  sha: 'commit',
  id: 'id',
};

export function canonicalKey(item: ContextItem): string | null {
  for (const field of KEY_FIELDS) {
    const value = item.metadata[field];
    if ((typeof value === 'string' && value.length > 0) || typeof value === 'number') {
      return `${KEY_PREFIX[field]}:${value}`;
    }
  }
  return null;
}

function byRelevance(items: ContextItem[]): ContextItem[] {
  // Stable: equal relevance keeps input order
  return [...items].sort((a, b) => b.relevance - a.relevance);
}

/**
 * Reduce a pooled batch to one item per duplicate group, highest relevance
 * first.
 *
 * Exact duplicates share a canonical metadata key. Fuzzy duplicates are
 * pairs whose text similarity reaches the threshold; only content up to
 * `maxFuzzyContentLength` characters takes part, which bounds the O(n²)
 * pairwise phase for batches of tens to low hundreds of items.
 */
export function deduplicate(items: ContextItem[], options: DedupOptions = {}): ContextItem[] {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const maxLength = options.maxFuzzyContentLength ?? DEFAULT_MAX_FUZZY_CONTENT_LENGTH;

  // Keyed items hold the slot of their first appearance
  const survivors: ContextItem[] = [];
  const slots = new Map<string, number>();

  for (const item of items) {
    const key = canonicalKey(item);
    if (key === null) {
      survivors.push(item);
      continue;
    }
    const slot = slots.get(key);
    if (slot === undefined) {
      slots.set(key, survivors.length);
      survivors.push(item);
    } else if (item.relevance > survivors[slot].relevance) {
      survivors[slot] = item;
    }
  }

  const kept: ContextItem[] = [];
  // Kept items short enough for fuzzy matching
  const comparable: ContextItem[] = [];
  for (const candidate of byRelevance(survivors)) {
    // Code points, as the similarity measure counts them
    const fuzzyEligible = Array.from(candidate.content).length <= maxLength;
    const duplicate = fuzzyEligible && comparable.some((existing) =>
      maxPossibleRatio(existing.content, candidate.content) >= threshold &&
      similarityRatio(existing.content, candidate.content) >= threshold
    );
    if (duplicate) continue;
    kept.push(candidate);
    if (fuzzyEligible) comparable.push(candidate);
  }

  return kept;
}
