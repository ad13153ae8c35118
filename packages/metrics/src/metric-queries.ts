import {
  comparePeriods,
  type MetricObservation,
  type Period,
  type PreparedDatasetDTO,
  type TableSummary,
} from '@kpi-board/shared';

export interface SeriesPoint {
  period: Period;
  value: number | null;
}

export interface MetricSeries {
  tableName: string;
  metricName: string;
  points: SeriesPoint[];
}

export interface ReportingWindow {
  first: Period;
  last: Period;
}

export interface MetricQueries {
  listTables: () => string[];
  listMetrics: (tableName: string) => string[];
  /** First metric (sheet order) whose name contains `pattern`, ignoring case. */
  findSeries: (tableName: string, pattern: string) => MetricSeries | null;
  findAllSeries: (tableName: string, pattern: string) => MetricSeries[];
  /** First and last period holding at least one non-missing value. */
  reportingWindow: () => ReportingWindow | null;
  tableSummaries: () => TableSummary[];
}

type SeriesIndex = Map<string, Map<string, SeriesPoint[]>>;

function indexObservations(observations: readonly MetricObservation[]): SeriesIndex {
  const index: SeriesIndex = new Map();
  for (const observation of observations) {
    const metrics = index.get(observation.tableName) ?? new Map<string, SeriesPoint[]>();
    const points = metrics.get(observation.metricName) ?? [];
    points.push({ period: observation.period, value: observation.value });
    metrics.set(observation.metricName, points);
    index.set(observation.tableName, metrics);
  }

  for (const metrics of index.values()) {
    for (const points of metrics.values()) {
      points.sort((left, right) => comparePeriods(left.period, right.period));
    }
  }
  return index;
}

export function createMetricQueries(dataset: Pick<PreparedDatasetDTO, 'observations' | 'tableSummaries'>): MetricQueries {
  const index = indexObservations(dataset.observations);

  const matchingSeries = (tableName: string, pattern: string): MetricSeries[] => {
    const metrics = index.get(tableName);
    if (!metrics) {
      return [];
    }
    const needle = pattern.toLowerCase();
    return [...metrics.entries()]
      .filter(([metricName]) => metricName.toLowerCase().includes(needle))
      .map(([metricName, points]) => ({ tableName, metricName, points }));
  };

  return {
    listTables: () => [...index.keys()],
    listMetrics: (tableName) => [...(index.get(tableName)?.keys() ?? [])],
    findSeries: (tableName, pattern) => matchingSeries(tableName, pattern)[0] ?? null,
    findAllSeries: matchingSeries,
    reportingWindow: () => {
      let first: Period | null = null;
      let last: Period | null = null;
      for (const observation of dataset.observations) {
        if (observation.value === null) {
          continue;
        }
        if (first === null || comparePeriods(observation.period, first) < 0) {
          first = observation.period;
        }
        if (last === null || comparePeriods(observation.period, last) > 0) {
          last = observation.period;
        }
      }
      return first && last ? { first, last } : null;
    },
    tableSummaries: () => [...dataset.tableSummaries],
  };
}
