import { createPeriod } from '@kpi-board/shared';
import { describe, expect, it } from 'vitest';
import { concatLongTables, countMissing, toLongFormat } from './long-format.ts';
import { computeMetricStatistics, summarizeTable } from './summary-statistics.ts';
import type { WideTable } from './table-extractor.ts';

const january = createPeriod(2025, 1);
const february = createPeriod(2025, 2);

const leads: WideTable = {
  tableName: 'Leads_Condominios',
  title: 'Condominium leads',
  periods: [january, february],
  rows: [
    { metricName: 'A', values: [10, 20], sourceRow: 12 },
    { metricName: 'B', values: [null, 5], sourceRow: 13 },
  ],
};

const indices: WideTable = {
  tableName: 'Indices_Condominios',
  title: 'Condominium indices',
  periods: [january],
  rows: [{ metricName: 'CAC', values: [null], sourceRow: 33 }],
};

describe('toLongFormat', () => {
  it('emits metrics times periods rows in metric-major order', () => {
    const observations = toLongFormat(leads);

    expect(observations.map((observation) => [observation.metricName, observation.period.label, observation.value])).toEqual([
      ['A', 'Janeiro', 10],
      ['A', 'Fevereiro', 20],
      ['B', 'Janeiro', null],
      ['B', 'Fevereiro', 5],
    ]);
    expect(observations[0]?.tableName).toBe('Leads_Condominios');
  });

  it('concatenates tables in the given order', () => {
    const observations = concatLongTables([leads, indices]);

    expect(observations).toHaveLength(5);
    expect(observations.at(-1)).toEqual({
      tableName: 'Indices_Condominios',
      metricName: 'CAC',
      period: { year: 2025, month: 1, label: 'Janeiro', date: '2025-01-01' },
      value: null,
    });
    expect(countMissing(observations)).toBe(2);
  });

  it('returns nothing for a table without periods', () => {
    expect(toLongFormat({ ...leads, periods: [] })).toEqual([]);
  });
});

describe('summarizeTable', () => {
  it('counts filled and empty cells', () => {
    expect(summarizeTable(leads)).toEqual({
      tableName: 'Leads_Condominios',
      metricCount: 2,
      periodCount: 2,
      totalCells: 4,
      filledCells: 3,
      emptyCells: 1,
      completenessPct: 75,
    });
  });

  it('rounds completeness to one decimal', () => {
    const table: WideTable = {
      ...leads,
      periods: [january, february, createPeriod(2025, 3)],
      rows: [{ metricName: 'A', values: [1, null, null], sourceRow: 12 }],
    };
    expect(summarizeTable(table).completenessPct).toBe(33.3);
  });
});

describe('computeMetricStatistics', () => {
  it('aggregates non-missing values per metric', () => {
    const statistics = computeMetricStatistics(concatLongTables([leads, indices]));

    expect(statistics).toEqual([
      { tableName: 'Leads_Condominios', metricName: 'A', observationCount: 2, missingCount: 0, sum: 30, mean: 15, min: 10, max: 20 },
      { tableName: 'Leads_Condominios', metricName: 'B', observationCount: 2, missingCount: 1, sum: 5, mean: 5, min: 5, max: 5 },
      { tableName: 'Indices_Condominios', metricName: 'CAC', observationCount: 1, missingCount: 1, sum: null, mean: null, min: null, max: null },
    ]);
  });
});
