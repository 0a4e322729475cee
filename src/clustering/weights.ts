import type { TierWeights } from '../config/index.js';

export const DEFAULT_TIER_WEIGHTS: TierWeights = {
  gold: 1.0,
  silver: 0.8,
  bronze: 0.3,
  abandoned: 0.1,
  unknown: 0.5,
};

/** Centroid weight for a confidence tier. Missing or unrecognized tiers get `unknown`. */
export function tierWeight(tier: unknown, weights: TierWeights = DEFAULT_TIER_WEIGHTS): number {
  if (typeof tier !== 'string') return weights.unknown;
  switch (tier.toLowerCase()) {
    case 'gold':
      return weights.gold;
    case 'silver':
      return weights.silver;
    case 'bronze':
      return weights.bronze;
    case 'abandoned':
      return weights.abandoned;
    default:
      return weights.unknown;
  }
}
