import { InvalidAmountError, NoTierMatchError, err, ok } from '../../utils/errors.js';
import type { ConversionError, Result } from '../../utils/errors.js';
import { isValidBeanAmount } from './amount.js';
import { CONVERSION_TIERS, tierOutput } from './tier-table.js';
import { findTier } from './tier-resolver.js';
import type { ConversionResult, ConversionTier } from './types.js';

/**
 * Convert `beans` at the rate of the single tier that contains the amount.
 *
 * The remainder is `beans mod ceil(1 / rate)`: beans left over after the
 * last whole block that yields a diamond. It is reported at exact
 * breakpoints as well.
 */
export function calculateDiamonds(
  beans: number,
  tiers: readonly ConversionTier[] = CONVERSION_TIERS,
): Result<ConversionResult, ConversionError> {
  if (!isValidBeanAmount(beans)) {
    return err(new InvalidAmountError(beans));
  }

  const resolved = findTier(beans, tiers);
  if (!resolved) {
    return err(new NoTierMatchError(beans));
  }

  const { tier, index } = resolved;

  return ok({
    diamonds: tierOutput(tier, beans),
    remainder: beans % Math.ceil(1 / tier.rate),
    rate: tier.rate,
    efficiencyPercent: tier.efficiencyPercent,
    tier: index,
  });
}
