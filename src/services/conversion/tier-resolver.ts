import { CONVERSION_TIERS } from './tier-table.js';
import type { ConversionTier, ResolvedTier } from './types.js';

/**
 * Find the tier whose [minBeans, maxBeans] range contains `beans`.
 * Returns null for non-positive amounts or when the table leaves a gap.
 */
export function findTier(
  beans: number,
  tiers: readonly ConversionTier[] = CONVERSION_TIERS,
): ResolvedTier | null {
  if (beans <= 0) return null;

  for (let i = 0; i < tiers.length; i++) {
    const tier = tiers[i];
    if (tier.minBeans <= beans && beans <= tier.maxBeans) {
      return { tier, index: i + 1 };
    }
  }

  return null;
}
