import { ValidationError } from '../errors.js';
import type { Logger } from '../telemetry/logger.js';
import { DEFAULT_SCROLL_LIMIT, DEFAULT_SEARCH_LIMIT, DISTANCES } from './types.js';
import type { Distance, Payload, PayloadValue, SearchResult } from './types.js';

export interface StoreOptions {
  logger?: Logger;
  // Ceiling applied to every scroll regardless of the requested limit
  scrollCeiling?: number;
}

export function resolveLimit(limit: number | undefined, fallback: number): number {
  const value = limit ?? fallback;
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`limit must be a non-negative integer, got ${value}`);
  }
  return value;
}

export function resolveSearchLimit(limit: number | undefined): number {
  return resolveLimit(limit, DEFAULT_SEARCH_LIMIT);
}

export function resolveScrollLimit(limit: number | undefined, ceiling: number): number {
  return Math.min(resolveLimit(limit, DEFAULT_SCROLL_LIMIT), ceiling);
}

/**
 * A scroll that comes back exactly at the ceiling has probably been cut
 * short. Downstream clustering would silently work on a sample, so say so.
 */
export function checkScrollCeiling(
  logger: Logger,
  collection: string,
  returned: number,
  ceiling: number
): void {
  if (returned >= ceiling) {
    logger.warn('scroll.ceiling_reached', { collection, count: returned, ceiling });
  }
}

export function assertDistance(distance: string): asserts distance is Distance {
  if (!(DISTANCES as readonly string[]).includes(distance)) {
    throw new ValidationError(`Unsupported distance metric: ${distance}. Supported: ${DISTANCES.join(', ')}`);
  }
}

export function clonePayload(payload: Payload): Payload {
  return structuredClone(payload);
}

export function assertPayload(payload: Payload): void {
  const check = (value: PayloadValue, path: string): void => {
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new ValidationError(`Payload field '${path}' is not a finite number`);
    }
    if (Array.isArray(value)) {
      value.forEach((item, index) => check(item, `${path}[${index}]`));
    } else if (value !== null && typeof value === 'object') {
      for (const [key, nested] of Object.entries(value)) check(nested, `${path}.${key}`);
    }
  };
  for (const [key, value] of Object.entries(payload)) check(value, key);
}

function isPayloadValue(value: unknown): value is PayloadValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isPayloadValue);
      return Object.values(value).every(isPayloadValue);
    default:
      return false;
  }
}

/** Narrow a decoded payload (stored JSON, a remote response) to Payload. */
export function toPayload(value: unknown, context: string): Payload {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new ValidationError(`Payload for ${context} is not an object`);
  }
  const payload: Payload = {};
  for (const [key, field] of Object.entries(value)) {
    if (!isPayloadValue(field)) {
      throw new ValidationError(`Payload field '${key}' for ${context} is not JSON-compatible`);
    }
    payload[key] = field;
  }
  return payload;
}

// Array.prototype.sort is stable, so equal scores keep insertion order
export function rankResults(results: SearchResult[], limit: number): SearchResult[] {
  return results.sort((a, b) => b.score - a.score).slice(0, limit);
}
