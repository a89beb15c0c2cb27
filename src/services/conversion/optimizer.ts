import { isValidBeanAmount } from './amount.js';
import { CONVERSION_TIERS, tierOutput } from './tier-table.js';
import type { AllocationEntry, ConversionTier, OptimizationResult } from './types.js';

function entryFor(tier: ConversionTier, index: number, beansUsed: number, diamondsEarned: number): AllocationEntry {
  return {
    tier: index,
    beansUsed,
    diamondsEarned,
    rate: tier.rate,
    efficiencyPercent: tier.efficiencyPercent,
  };
}

/**
 * Split `beans` across tiers, filling from the highest threshold down.
 *
 * Fill order is table order reversed, not rate order: tier 6 (27.67%) is
 * filled before tier 5 (27.68%), so 11000 beans yield 3043 diamonds while
 * 10999 yield 3045. Sorting by rate would change results at that boundary.
 *
 * Beans that no tier accepted are converted at tier 1's rate. The breakdown
 * is returned in ascending tier order.
 */
export function optimizeBeans(
  beans: number,
  tiers: readonly ConversionTier[] = CONVERSION_TIERS,
): OptimizationResult {
  if (!isValidBeanAmount(beans) || tiers.length === 0) {
    return { breakdown: [], totalDiamonds: 0 };
  }

  const breakdown: AllocationEntry[] = [];
  let remaining = beans;
  let totalDiamonds = 0;

  for (let i = tiers.length - 1; i >= 0; i--) {
    const tier = tiers[i];
    if (remaining === 0 || remaining < tier.minBeans) continue;

    const cap = Number.isFinite(tier.maxBeans) ? tier.maxBeans : remaining;
    const used = Math.min(remaining, cap);
    const diamonds = tierOutput(tier, used);

    breakdown.push(entryFor(tier, i + 1, used, diamonds));
    totalDiamonds += diamonds;
    remaining -= used;
  }

  if (remaining > 0) {
    const lowest = tiers[0];
    const diamonds = Math.floor(remaining * lowest.rate);
    const existing = breakdown.find((entry) => entry.tier === 1);
    if (existing) {
      // Tier 1 already took its capped share; fold the leftover into that row.
      existing.beansUsed += remaining;
      existing.diamondsEarned += diamonds;
    } else {
      breakdown.push(entryFor(lowest, 1, remaining, diamonds));
    }
    totalDiamonds += diamonds;
  }

  breakdown.sort((a, b) => a.tier - b.tier);

  return { breakdown, totalDiamonds };
}
