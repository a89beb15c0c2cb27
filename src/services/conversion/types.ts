export interface ConversionTier {
  /** Inclusive lower bound. */
  readonly minBeans: number;
  /** Inclusive upper bound; `Infinity` for the top tier. */
  readonly maxBeans: number;
  /** Diamonds per bean. */
  readonly rate: number;
  /** `rate * 100`, kept alongside the rate for display. */
  readonly efficiencyPercent: number;
  /** Calibrated output when the input is exactly `maxBeans`. */
  readonly fixedDiamonds?: number;
}

export interface ResolvedTier {
  tier: ConversionTier;
  /** 1-based position in the table. */
  index: number;
}

export interface ConversionResult {
  diamonds: number;
  remainder: number;
  rate: number;
  efficiencyPercent: number;
  tier: number;
}

export interface AllocationEntry {
  tier: number;
  beansUsed: number;
  diamondsEarned: number;
  rate: number;
  efficiencyPercent: number;
}

export interface OptimizationResult {
  breakdown: AllocationEntry[];
  totalDiamonds: number;
}

export interface TierTableRow {
  tier: number;
  range: string;
  rate: string;
  efficiency: string;
  example: string;
}

export interface TierTableIssue {
  /** 1-based index of the tier that does not follow its predecessor. */
  tier: number;
  kind: 'gap' | 'overlap' | 'unbounded-before-last';
  message: string;
}
