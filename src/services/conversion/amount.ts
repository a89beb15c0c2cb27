/**
 * Bean amounts must be whole and at least 1. Rejects NaN and Infinity too.
 */
export function isValidBeanAmount(beans: number): boolean {
  return Number.isSafeInteger(beans) && beans > 0;
}
