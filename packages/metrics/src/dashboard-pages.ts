import { formatPeriodRange, type PreparedDatasetDTO } from '@kpi-board/shared';
import { createMetricQueries, type MetricQueries } from './metric-queries.ts';
import { buildCampaignManagementPage } from './pages/campaign-management.ts';
import { buildComparativeAnalysisPage } from './pages/comparative-analysis.ts';
import { buildExecutiveSummaryPage } from './pages/executive-summary.ts';
import { buildFinancialKpisPage } from './pages/financial-kpis.ts';
import { buildLeadAnalyticsPage } from './pages/lead-analytics.ts';
import { buildMarketingPerformancePage } from './pages/marketing-performance.ts';
import type { DashboardOverview, DashboardPage } from './pages/page-model.ts';
import { seriesMean } from './series-stats.ts';

export type DashboardDataset = Pick<PreparedDatasetDTO, 'observations' | 'tableSummaries'>;

const PAGE_BUILDERS: readonly ((queries: MetricQueries) => DashboardPage)[] = [
  buildExecutiveSummaryPage,
  buildMarketingPerformancePage,
  buildLeadAnalyticsPage,
  buildFinancialKpisPage,
  buildCampaignManagementPage,
  buildComparativeAnalysisPage,
];

export function buildDashboardPages(dataset: DashboardDataset): DashboardPage[] {
  const queries = createMetricQueries(dataset);
  return PAGE_BUILDERS.map((build) => build(queries));
}

export function buildDashboardOverview(dataset: DashboardDataset): DashboardOverview {
  const reportingWindow = createMetricQueries(dataset).reportingWindow();
  return {
    totalMetrics: dataset.tableSummaries.reduce((total, summary) => total + summary.metricCount, 0),
    tableCount: dataset.tableSummaries.length,
    averageCompletenessPct: seriesMean(dataset.tableSummaries.map((summary) => summary.completenessPct)),
    reportingWindow: reportingWindow ? formatPeriodRange(reportingWindow.first, reportingWindow.last) : null,
  };
}
