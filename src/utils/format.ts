const countFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** Whole number with thousands separators: 11000 → "11,000". */
export function formatCount(value: number): string {
  return countFormatter.format(value);
}

/** Diamonds-per-bean rate to four places: 0.25 → "0.2500". */
export const formatRate = (rate: number) => rate.toFixed(4);

/** Percentage to two places: 27.6 → "27.60%". */
export const formatPercent = (percent: number) => `${percent.toFixed(2)}%`;
