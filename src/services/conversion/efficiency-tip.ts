import { isValidBeanAmount } from './amount.js';

export const TIP_INVALID = '💡 Tip: Please enter a positive number of beans.';
export const TIP_BELOW_109 = '💡 Tip: Efficiency increases significantly after 109 beans!';
export const TIP_BELOW_4000 = '💡 Tip: Maximum efficiency is reached at 4000+ beans!';
export const TIP_MAX_TIER = "💡 Great! You're at maximum efficiency tier!";

export function getEfficiencyTip(beans: number): string {
  if (!isValidBeanAmount(beans)) return TIP_INVALID;
  if (beans < 109) return TIP_BELOW_109;
  if (beans < 4000) return TIP_BELOW_4000;
  return TIP_MAX_TIER;
}
