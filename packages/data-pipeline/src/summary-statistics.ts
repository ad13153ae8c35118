import type { MetricObservation, MetricStatistics, TableSummary } from '@kpi-board/shared';
import type { WideTable } from './table-extractor.ts';

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function summarizeTable(table: WideTable): TableSummary {
  const totalCells = table.rows.length * table.periods.length;
  const filledCells = table.rows.reduce(
    (count, row) => count + row.values.filter((value) => value !== null).length,
    0,
  );

  return {
    tableName: table.tableName,
    metricCount: table.rows.length,
    periodCount: table.periods.length,
    totalCells,
    filledCells,
    emptyCells: totalCells - filledCells,
    completenessPct: totalCells === 0 ? 0 : roundTo((filledCells / totalCells) * 100, 1),
  };
}

/** Per-metric statistics over non-missing values, in first-seen order. */
export function computeMetricStatistics(observations: readonly MetricObservation[]): MetricStatistics[] {
  const groups = new Map<string, { tableName: string; metricName: string; values: (number | null)[] }>();
  for (const observation of observations) {
    const key = `${observation.tableName}\u0000${observation.metricName}`;
    const group = groups.get(key) ?? {
      tableName: observation.tableName,
      metricName: observation.metricName,
      values: [],
    };
    group.values.push(observation.value);
    groups.set(key, group);
  }

  return [...groups.values()].map(({ tableName, metricName, values }) => {
    const present = values.filter((value): value is number => value !== null);
    const sum = present.length === 0 ? null : present.reduce((total, value) => total + value, 0);
    return {
      tableName,
      metricName,
      observationCount: values.length,
      missingCount: values.length - present.length,
      sum,
      mean: sum === null ? null : sum / present.length,
      min: present.length === 0 ? null : Math.min(...present),
      max: present.length === 0 ? null : Math.max(...present),
    };
  });
}
