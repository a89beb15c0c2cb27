import { describe, expect, it } from 'vitest';
import { renderConversion, renderOptimization, renderTierTable } from '../../cli/render.js';
import { getTierTable, optimizeBeans } from '../../services/conversion/index.js';

describe('renderConversion', () => {
  it('prints the result block without a remainder line when nothing is left over', () => {
    const text = renderConversion(4000, {
      diamonds: 1107,
      remainder: 0,
      rate: 0.2768,
      efficiencyPercent: 27.68,
      tier: 5,
    });

    expect(text.split('\n')).toEqual([
      '='.repeat(50),
      'CONVERSION RESULT',
      '='.repeat(50),
      'Beans:           4,000',
      'Diamonds:        1,107',
      'Rate:            0.2768 per bean',
      'Efficiency:      27.68% (Tier 5)',
      '='.repeat(50),
    ]);
  });

  it('adds the remainder after the diamonds line', () => {
    const lines = renderConversion(109, {
      diamonds: 29,
      remainder: 1,
      rate: 0.2661,
      efficiencyPercent: 26.61,
      tier: 2,
    }).split('\n');

    expect(lines[4]).toBe('Diamonds:        29');
    expect(lines[5]).toBe('Beans Remainder: 1');
  });
});

describe('renderTierTable', () => {
  const lines = renderTierTable(getTierTable()).split('\n');

  it('prints a header and one line per tier', () => {
    expect(lines).toHaveLength(11);
    expect(lines[1]).toBe('CONVERSION TIERS');
    expect(lines[3]).toBe('Beans Range          Rate         Efficiency   Example');
    expect(lines[4]).toBe('-'.repeat(70));
  });

  it('aligns tier rows in fixed-width columns', () => {
    expect(lines[5]).toBe('1 - 8                0.2500       25.00%       8 beans = 2 diamonds');
    expect(lines[8]).toBe('1,000 - 3,999        0.2763       27.63%       3,999 beans = 1,105 diamonds');
    expect(lines[10]).toBe('11,000 - ∞           0.2767       27.67%       27.67%');
  });
});

describe('renderOptimization', () => {
  it('lists each allocation and the total', () => {
    expect(renderOptimization(10803, optimizeBeans(10803)).split('\n')).toEqual([
      '='.repeat(50),
      'OPTIMIZED CONVERSION BREAKDOWN',
      '='.repeat(50),
      'Beans:           10,803',
      '-'.repeat(50),
      'Tier 5: 10,803 beans → 2,990 diamonds @ 0.2768 (27.68%)',
      '-'.repeat(50),
      'Total Diamonds (Optimized): 2,990',
      '='.repeat(50),
    ]);
  });
});
