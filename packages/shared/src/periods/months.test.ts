import { describe, expect, it } from 'vitest';
import { comparePeriods, createPeriod, formatPeriodRange, monthName, parseMonthLabel } from './months.ts';

describe('parseMonthLabel', () => {
  it('parses full Portuguese month names', () => {
    expect(parseMonthLabel('Janeiro')).toBe(1);
    expect(parseMonthLabel('Março')).toBe(3);
    expect(parseMonthLabel('Dezembro')).toBe(12);
  });

  it('ignores case, whitespace and accents', () => {
    expect(parseMonthLabel('  OUTUBRO ')).toBe(10);
    expect(parseMonthLabel('marco')).toBe(3);
  });

  it('recovers the mis-decoded cedilla in March', () => {
    expect(parseMonthLabel('Mar\uFFFDo')).toBe(3);
  });

  it('parses three-letter abbreviations', () => {
    expect(parseMonthLabel('Jan')).toBe(1);
    expect(parseMonthLabel('fev.')).toBe(2);
    expect(parseMonthLabel('Set')).toBe(9);
  });

  it('returns null for anything else', () => {
    expect(parseMonthLabel('Total')).toBeNull();
    expect(parseMonthLabel(3)).toBeNull();
    expect(parseMonthLabel(null)).toBeNull();
    expect(parseMonthLabel('CAC')).toBeNull();
  });
});

describe('periods', () => {
  it('creates a period with ISO first-of-month date', () => {
    expect(createPeriod(2025, 3)).toEqual({ year: 2025, month: 3, label: 'Março', date: '2025-03-01' });
    expect(createPeriod(2025, 11, 'Nov')).toEqual({ year: 2025, month: 11, label: 'Nov', date: '2025-11-01' });
  });

  it('rejects months out of range', () => {
    expect(() => monthName(13)).toThrow(RangeError);
  });

  it('orders periods by year then month', () => {
    const sorted = [createPeriod(2025, 4), createPeriod(2024, 12), createPeriod(2025, 1)].sort(comparePeriods);
    expect(sorted.map((period) => period.date)).toEqual(['2024-12-01', '2025-01-01', '2025-04-01']);
  });

  it('formats reporting windows', () => {
    expect(formatPeriodRange(createPeriod(2025, 1), createPeriod(2025, 10))).toBe('Janeiro - Outubro 2025');
    expect(formatPeriodRange(createPeriod(2025, 5), createPeriod(2025, 5))).toBe('Maio 2025');
    expect(formatPeriodRange(createPeriod(2024, 11), createPeriod(2025, 2))).toBe('Novembro 2024 - Fevereiro 2025');
  });
});
