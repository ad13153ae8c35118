import { describe, expect, it } from 'vitest';
import { formatAxisValue, formatCompleteness, formatValue } from './format-utils.ts';

describe('formatValue', () => {
  it('formats numbers with Brazilian separators', () => {
    expect(formatValue(12345.5, 'currency')).toBe('R$ 12.345,50');
    expect(formatValue(12345.5, 'currencyRounded')).toBe('R$ 12.346');
    expect(formatValue(98765, 'integer')).toBe('98.765');
    expect(formatValue(0.5, 'decimal')).toBe('0,50');
    expect(formatValue(36.36, 'percent')).toBe('36,36%');
    expect(formatValue(1.25, 'ratio')).toBe('1,25x');
  });

  it('renders missing values as N/A and keeps text as is', () => {
    expect(formatValue(null, 'currency')).toBe('N/A');
    expect(formatValue('2/3', 'text')).toBe('2/3');
  });
});

describe('formatAxisValue', () => {
  it('abbreviates large values', () => {
    expect(formatAxisValue(1_500_000, 'integer')).toBe('1,5 mi');
    expect(formatAxisValue(45_000, 'currency')).toBe('R$ 45 mil');
  });

  it('keeps small values whole', () => {
    expect(formatAxisValue(25, 'percent')).toBe('25%');
    expect(formatAxisValue(1.5, 'ratio')).toBe('1,5x');
  });
});

describe('formatCompleteness', () => {
  it('uses one decimal', () => {
    expect(formatCompleteness(98.3)).toBe('98,3%');
    expect(formatCompleteness(null)).toBe('N/A');
  });
});
