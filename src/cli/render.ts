import { formatCount, formatPercent, formatRate } from '../utils/format.js';
import type { ConversionResult, OptimizationResult, TierTableRow } from '../services/conversion/index.js';

const rule = (char: string, width: number) => char.repeat(width);

export function renderConversion(beans: number, result: ConversionResult): string {
  const lines = [
    rule('=', 50),
    'CONVERSION RESULT',
    rule('=', 50),
    `Beans:           ${formatCount(beans)}`,
    `Diamonds:        ${formatCount(result.diamonds)}`,
  ];

  if (result.remainder > 0) {
    lines.push(`Beans Remainder: ${formatCount(result.remainder)}`);
  }

  lines.push(
    `Rate:            ${formatRate(result.rate)} per bean`,
    `Efficiency:      ${formatPercent(result.efficiencyPercent)} (Tier ${result.tier})`,
    rule('=', 50),
  );

  return lines.join('\n');
}

export function renderTierTable(rows: TierTableRow[]): string {
  const row = (cols: [string, string, string, string]) =>
    `${cols[0].padEnd(20)} ${cols[1].padEnd(12)} ${cols[2].padEnd(12)} ${cols[3]}`;

  return [
    rule('=', 70),
    'CONVERSION TIERS',
    rule('=', 70),
    row(['Beans Range', 'Rate', 'Efficiency', 'Example']),
    rule('-', 70),
    ...rows.map((r) => row([r.range, r.rate, r.efficiency, r.example])),
  ].join('\n');
}

export function renderOptimization(beans: number, result: OptimizationResult): string {
  const lines = [
    rule('=', 50),
    'OPTIMIZED CONVERSION BREAKDOWN',
    rule('=', 50),
    `Beans:           ${formatCount(beans)}`,
    rule('-', 50),
  ];

  for (const entry of result.breakdown) {
    lines.push(
      `Tier ${entry.tier}: ${formatCount(entry.beansUsed)} beans → ${formatCount(entry.diamondsEarned)} diamonds` +
        ` @ ${formatRate(entry.rate)} (${formatPercent(entry.efficiencyPercent)})`,
    );
  }

  lines.push(
    rule('-', 50),
    `Total Diamonds (Optimized): ${formatCount(result.totalDiamonds)}`,
    rule('=', 50),
  );

  return lines.join('\n');
}
