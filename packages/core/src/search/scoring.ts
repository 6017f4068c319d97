import type { MatchTier } from './types';

/**
 * Score of an exact (distance 0) hit per tier. Each weight is at least twice
 * the next one, which keeps the tiers' score bands apart after scaling.
 */
export const TIER_WEIGHTS: Readonly<Record<MatchTier, number>> = {
  name: 1000,
  description: 250,
  topic: 25,
};

/**
 * Scales the tier weight by closeness: 1 for an exact hit, falling linearly
 * towards (but never reaching) 0.5 at `maxDistance`.
 */
export function scoreFor(tier: MatchTier, distance: number, maxDistance: number): number {
  const closeness = 1 - distance / (2 * (maxDistance + 1));
  return TIER_WEIGHTS[tier] * closeness;
}
