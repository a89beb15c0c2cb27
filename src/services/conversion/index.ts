export { CONVERSION_TIERS, validateTierTable, tierOutput } from './tier-table.js';
export { findTier } from './tier-resolver.js';
export { calculateDiamonds } from './converter.js';
export { optimizeBeans } from './optimizer.js';
export { getEfficiencyTip } from './efficiency-tip.js';
export { getTierTable } from './tier-table-view.js';
export { isValidBeanAmount } from './amount.js';
export type {
  ConversionTier,
  ResolvedTier,
  ConversionResult,
  AllocationEntry,
  OptimizationResult,
  TierTableRow,
  TierTableIssue,
} from './types.js';
