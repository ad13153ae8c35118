import { describe, expect, it } from 'vitest';
import { computeCac, computeConversionRate, computeCostPerLead, safeRatio } from './derived-ratios.ts';

describe('derived ratios', () => {
  it('computes CAC as spend over acquired customers', () => {
    expect(computeCac(1000, 50)).toBe(20);
  });

  it('returns missing instead of dividing by zero', () => {
    expect(computeCac(1000, 0)).toBeNull();
    expect(computeCostPerLead(500, 0)).toBeNull();
    expect(safeRatio(0, 0)).toBeNull();
  });

  it('propagates missing operands', () => {
    expect(safeRatio(null, 4)).toBeNull();
    expect(safeRatio(4, null)).toBeNull();
  });

  it('keeps a zero numerator as zero', () => {
    expect(safeRatio(0, 8)).toBe(0);
  });

  it('rounds conversion rates to two decimals', () => {
    expect(computeConversionRate(1, 3)).toBe(33.33);
    expect(computeConversionRate(6, 12)).toBe(50);
    expect(computeConversionRate(2, 0)).toBeNull();
  });

  it('computes cost per lead', () => {
    expect(computeCostPerLead(2500, 40)).toBe(62.5);
  });
});
