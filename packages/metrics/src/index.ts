// Queries
export {
  createMetricQueries,
  type MetricQueries,
  type MetricSeries,
  type ReportingWindow,
  type SeriesPoint,
} from './metric-queries.ts';

// Statistics
export {
  countWhere,
  presentValues,
  seriesMax,
  seriesMean,
  seriesMin,
  seriesSum,
  seriesValues,
  type SeriesInput,
} from './series-stats.ts';

// Derived ratios
export {
  computeCac,
  computeConversionRate,
  computeCostPerLead,
  safeRatio,
} from './derived-ratios.ts';

// Page models
export {
  DASHBOARD_PAGE_IDS,
  type ChartColor,
  type ChartKind,
  type ChartSection,
  type ChartSeries,
  type DashboardOverview,
  type DashboardPage,
  type DashboardPageId,
  type DashboardTab,
  type KpiItem,
  type KpiSection,
  type PageSection,
  type ReferenceLine,
  type TableCell,
  type TableSection,
  type ValueFormat,
} from './pages/page-model.ts';
export {
  LEAD_SOURCE_PAIRS,
  proposalSourceLabel,
  summarizeConversions,
  summarizeProposalSources,
  type SourceConversion,
  type SourceTotal,
} from './pages/lead-analytics.ts';
export { toPercentage } from './pages/campaign-management.ts';
export { summarizeCampaign } from './pages/comparative-analysis.ts';
export { buildDashboardOverview, buildDashboardPages, type DashboardDataset } from './dashboard-pages.ts';

// Fixtures
export { buildDatasetFromSeries, type SeriesTables } from './fixtures/dataset-builder.ts';
export { SAMPLE_SERIES } from './fixtures/sample-series.ts';
