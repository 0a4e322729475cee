import { ValidationError } from '../errors.js';
import type { StandardCollection } from '../storage/managed.js';

/**
 * Canonical collection names. Import from here rather than hardcoding them.
 */
export const Collections = {
  MEMORIES: 'memories',
  CODE: 'code',
  EXPERIENCES_FULL: 'experiences_full',
  EXPERIENCES_STRATEGY: 'experiences_strategy',
  EXPERIENCES_SURPRISE: 'experiences_surprise',
  EXPERIENCES_ROOT_CAUSE: 'experiences_root_cause',
  VALUES: 'values',
  COMMITS: 'commits',
} as const;

export type CollectionName = (typeof Collections)[keyof typeof Collections];

export const AXES = ['full', 'strategy', 'surprise', 'root_cause'] as const;

export type Axis = (typeof AXES)[number];

export function isAxis(value: string): value is Axis {
  return (AXES as readonly string[]).includes(value);
}

export function assertAxis(value: string): asserts value is Axis {
  if (!isAxis(value)) {
    throw new ValidationError(`Invalid axis '${value}'. Valid axes: ${AXES.join(', ')}`);
  }
}

export function experienceCollection(axis: string): CollectionName {
  assertAxis(axis);
  switch (axis) {
    case 'full':
      return Collections.EXPERIENCES_FULL;
    case 'strategy':
      return Collections.EXPERIENCES_STRATEGY;
    case 'surprise':
      return Collections.EXPERIENCES_SURPRISE;
    case 'root_cause':
      return Collections.EXPERIENCES_ROOT_CAUSE;
  }
}

export interface CollectionDimensions {
  code: number;
  semantic: number;
}

// Code lives in the code embedder's space; everything else in the semantic one
export function standardCollections(dimensions: CollectionDimensions): StandardCollection[] {
  return Object.values(Collections).map((name): StandardCollection => ({
    name,
    dimension: name === Collections.CODE ? dimensions.code : dimensions.semantic,
    distance: 'cosine',
  }));
}
