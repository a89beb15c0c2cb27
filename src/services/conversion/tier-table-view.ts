import { formatCount, formatPercent, formatRate } from '../../utils/format.js';
import { CONVERSION_TIERS } from './tier-table.js';
import type { ConversionTier, TierTableRow } from './types.js';

/**
 * Display rows for the tier table. Bounded tiers with a calibrated output
 * use it as their example; the open-ended top tier shows its efficiency.
 */
export function getTierTable(tiers: readonly ConversionTier[] = CONVERSION_TIERS): TierTableRow[] {
  return tiers.map((tier, i) => {
    const bounded = Number.isFinite(tier.maxBeans);
    const upper = bounded ? formatCount(tier.maxBeans) : '∞';
    const efficiency = formatPercent(tier.efficiencyPercent);

    const example = bounded && tier.fixedDiamonds !== undefined
      ? `${formatCount(tier.maxBeans)} beans = ${formatCount(tier.fixedDiamonds)} diamonds`
      : efficiency;

    return {
      tier: i + 1,
      range: `${formatCount(tier.minBeans)} - ${upper}`,
      rate: formatRate(tier.rate),
      efficiency,
      example,
    };
  });
}
