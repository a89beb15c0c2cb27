import type { ConversionTier, TierTableIssue } from './types.js';

/**
 * Beans → diamonds conversion tiers, calibrated against wallet data.
 *
 * | Tier | Beans          | Rate   | Efficiency | Exact at max          |
 * |------|----------------|--------|------------|-----------------------|
 * | 1    | 1 – 8          | 0.2500 | 25.00%     | 8 → 2                 |
 * | 2    | 9 – 109        | 0.2661 | 26.61%     | 109 → 29              |
 * | 3    | 110 – 999      | 0.2753 | 27.53%     | 999 → 275             |
 * | 4    | 1000 – 3999    | 0.2763 | 27.63%     | 3999 → 1105           |
 * | 5    | 4000 – 10999   | 0.2768 | 27.68%     | 10999 → 3045          |
 * | 6    | 11000+         | 0.2767 | 27.67%     | —                     |
 *
 * Tier 6 sits just below tier 5. That is real calibration data; keep it.
 */
export const CONVERSION_TIERS: readonly ConversionTier[] = Object.freeze([
  Object.freeze({ minBeans: 1, maxBeans: 8, rate: 0.25, efficiencyPercent: 25.0, fixedDiamonds: 2 }),
  Object.freeze({ minBeans: 9, maxBeans: 109, rate: 0.2661, efficiencyPercent: 26.61, fixedDiamonds: 29 }),
  Object.freeze({ minBeans: 110, maxBeans: 999, rate: 0.2753, efficiencyPercent: 27.53, fixedDiamonds: 275 }),
  Object.freeze({ minBeans: 1000, maxBeans: 3999, rate: 0.2763, efficiencyPercent: 27.63, fixedDiamonds: 1105 }),
  Object.freeze({ minBeans: 4000, maxBeans: 10999, rate: 0.2768, efficiencyPercent: 27.68, fixedDiamonds: 3045 }),
  Object.freeze({ minBeans: 11000, maxBeans: Infinity, rate: 0.2767, efficiencyPercent: 27.67 }),
]);

/**
 * Check that each tier starts one bean after the previous one ends
 * and that only the last tier is unbounded. Returns an empty list for a
 * well-formed table.
 */
export function validateTierTable(tiers: readonly ConversionTier[]): TierTableIssue[] {
  const issues: TierTableIssue[] = [];

  for (let i = 1; i < tiers.length; i++) {
    const prev = tiers[i - 1];
    const curr = tiers[i];

    if (!Number.isFinite(prev.maxBeans)) {
      issues.push({
        tier: i,
        kind: 'unbounded-before-last',
        message: `Tier ${i} is unbounded but is followed by tier ${i + 1}`,
      });
      continue;
    }

    const expectedMin = prev.maxBeans + 1;
    if (curr.minBeans > expectedMin) {
      issues.push({
        tier: i + 1,
        kind: 'gap',
        message: `Beans ${expectedMin}–${curr.minBeans - 1} fall between tier ${i} and tier ${i + 1}`,
      });
    } else if (curr.minBeans < expectedMin) {
      issues.push({
        tier: i + 1,
        kind: 'overlap',
        message: `Tier ${i + 1} starts at ${curr.minBeans}, inside tier ${i} (ends at ${prev.maxBeans})`,
      });
    }
  }

  return issues;
}

/**
 * Diamonds produced by `beans` converted entirely at `tier`'s rate.
 * The calibrated `fixedDiamonds` applies only at exactly `maxBeans`.
 */
export function tierOutput(tier: ConversionTier, beans: number): number {
  if (tier.fixedDiamonds !== undefined && beans === tier.maxBeans) {
    return tier.fixedDiamonds;
  }
  return Math.floor(beans * tier.rate);
}
