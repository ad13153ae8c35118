import { createPeriod, type MetricObservation, type TableSummary } from '@kpi-board/shared';
import type { DashboardDataset } from '../dashboard-pages.ts';

/** Table name to metric name to monthly values starting in January. */
export type SeriesTables = Record<string, Record<string, readonly (number | null)[]>>;

/**
 * In-memory dataset with the shape the ETL writes, for tests and previews.
 */
export function buildDatasetFromSeries(tables: SeriesTables, year = 2025): DashboardDataset {
  const observations: MetricObservation[] = [];
  const tableSummaries: TableSummary[] = [];

  for (const [tableName, metrics] of Object.entries(tables)) {
    const entries = Object.entries(metrics);
    const periodCount = Math.max(0, ...entries.map(([, values]) => values.length));
    let filledCells = 0;

    for (const [metricName, values] of entries) {
      values.forEach((value, index) => {
        observations.push({ tableName, metricName, period: createPeriod(year, index + 1), value });
        if (value !== null) {
          filledCells += 1;
        }
      });
    }

    const totalCells = entries.length * periodCount;
    tableSummaries.push({
      tableName,
      metricCount: entries.length,
      periodCount,
      totalCells,
      filledCells,
      emptyCells: totalCells - filledCells,
      completenessPct: totalCells === 0 ? 0 : Math.round((filledCells / totalCells) * 1000) / 10,
    });
  }

  return { observations, tableSummaries };
}
