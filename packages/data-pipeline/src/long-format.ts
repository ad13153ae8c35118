import type { MetricObservation } from '@kpi-board/shared';
import type { WideTable } from './table-extractor.ts';

/** Metric-major reshape: one observation per (metric, present period). */
export function toLongFormat(table: WideTable): MetricObservation[] {
  const observations: MetricObservation[] = [];
  for (const row of table.rows) {
    table.periods.forEach((period, index) => {
      observations.push({
        tableName: table.tableName,
        metricName: row.metricName,
        period: { ...period },
        value: row.values[index] ?? null,
      });
    });
  }
  return observations;
}

export function concatLongTables(tables: readonly WideTable[]): MetricObservation[] {
  return tables.flatMap((table) => toLongFormat(table));
}

export function countMissing(observations: readonly MetricObservation[]): number {
  return observations.filter((observation) => observation.value === null).length;
}
