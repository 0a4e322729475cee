import { CONTEXT_SOURCES } from '../config/index.js';
import { ValidationError } from '../errors.js';
import type { Payload } from '../storage/types.js';
import type { ContextSource, SourceWeights, TokenEstimator } from './types.js';

export const MAX_TOKENS_LIMIT = 100000;

// Sub-word tokenization overhead for the word-based estimate
const WORD_TOKEN_RATIO = 1.3;

export function estimateTokens(text: string, estimator: TokenEstimator = 'chars'): number {
  if (!text.trim()) return 0;

  if (estimator === 'words') {
    return Math.round(text.trim().split(/\s+/).length * WORD_TOKEN_RATIO);
  }
  return Math.floor(text.length / 4);
}

export function isContextSource(value: string): value is ContextSource {
  return (CONTEXT_SOURCES as readonly string[]).includes(value);
}

export function assertMaxTokens(maxTokens: number): void {
  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new ValidationError(`maxTokens must be a positive integer, got ${maxTokens}`);
  }
  if (maxTokens > MAX_TOKENS_LIMIT) {
    throw new ValidationError(`maxTokens ${maxTokens} exceeds maximum of ${MAX_TOKENS_LIMIT}`);
  }
}

/**
 * Split `maxTokens` across the requested sources in proportion to their
 * weights. Each share is floored, so the shares never sum past the total.
 */
export function distributeBudget(
  sources: readonly string[],
  weights: SourceWeights,
  maxTokens: number
): Partial<Record<ContextSource, number>> {
  assertMaxTokens(maxTokens);

  const requested: ContextSource[] = [];
  for (const source of sources) {
    if (!isContextSource(source)) {
      throw new ValidationError(`Invalid context source '${source}'. Valid: ${CONTEXT_SOURCES.join(', ')}`);
    }
    if (!(weights[source] > 0)) {
      throw new ValidationError(`Weight for ${source} must be positive, got ${weights[source]}`);
    }
    if (!requested.includes(source)) requested.push(source);
  }

  const totalWeight = requested.reduce((sum, source) => sum + weights[source], 0);
  const budgets: Partial<Record<ContextSource, number>> = {};
  for (const source of requested) {
    budgets[source] = Math.floor((maxTokens * weights[source]) / totalWeight);
  }
  return budgets;
}

function metadataText(metadata: Payload, key: string, fallback: string): string {
  const value = metadata[key];
  return typeof value === 'string' || typeof value === 'number' ? String(value) : fallback;
}

export function truncationMarker(source: ContextSource, metadata: Payload): string {
  switch (source) {
    case 'code':
      return `...\n\n*(truncated, see full at ${metadataText(metadata, 'file_path', 'unknown')}:${metadataText(metadata, 'line_start', '?')})*`;
    case 'experience':
      return `...\n\n*(truncated, full experience ID: ${metadataText(metadata, 'id', 'unknown')})*`;
    default:
      return '...\n\n*(truncated)*';
  }
}

// Never cut between the two halves of a surrogate pair
function safeCut(text: string, length: number): number {
  if (length > 0 && length < text.length) {
    const code = text.charCodeAt(length - 1);
    if (code >= 0xd800 && code <= 0xdbff) return length - 1;
  }
  return length;
}

/**
 * Longest leading slice of `text` that, with `marker` appended, stays within
 * `maxTokens`. Prefers ending on a line break when one falls in the last
 * fifth of the slice. Returns null when not even the marker fits.
 */
export function truncateToTokens(
  text: string,
  maxTokens: number,
  marker: string,
  estimator: TokenEstimator = 'chars'
): string | null {
  const fits = (length: number): boolean =>
    estimateTokens(text.slice(0, length) + marker, estimator) <= maxTokens;

  if (!fits(0)) return null;

  let lo = 0;
  let hi = text.length;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (fits(mid)) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }

  let length = safeCut(text, lo);
  const lastNewline = text.lastIndexOf('\n', length - 1);
  if (lastNewline > length * 0.8 && fits(lastNewline)) {
    length = lastNewline;
  }

  return text.slice(0, length) + marker;
}
