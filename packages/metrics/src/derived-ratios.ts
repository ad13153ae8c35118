/**
 * Ratio of two aggregates. Missing operands and a zero denominator yield the
 * missing sentinel instead of 0 or Infinity.
 */
export function safeRatio(numerator: number | null, denominator: number | null): number | null {
  if (numerator === null || denominator === null || denominator === 0) {
    return null;
  }
  return numerator / denominator;
}

export function computeCac(marketingSpend: number | null, acquiredCustomers: number | null): number | null {
  return safeRatio(marketingSpend, acquiredCustomers);
}

export function computeCostPerLead(investment: number | null, leads: number | null): number | null {
  return safeRatio(investment, leads);
}

/** Conversions over proposals as a percentage with two decimals. */
export function computeConversionRate(conversions: number | null, proposals: number | null): number | null {
  const ratio = safeRatio(conversions, proposals);
  return ratio === null ? null : Math.round(ratio * 100 * 100) / 100;
}
