import type { MetricQueries } from '../metric-queries.ts';
import { seriesMean, seriesSum } from '../series-stats.ts';
import { cell, kpi, singleTabPage, type DashboardPage } from './page-model.ts';

export function buildExecutiveSummaryPage(queries: MetricQueries): DashboardPage {
  const cac = queries.findSeries('Indices_Condominios', 'CAC');
  const mrr = queries.findSeries('Indices_Condominios', 'MRR');
  const followers = queries.findSeries('Marketing_Geral', 'Seguidores');
  const adSpend = queries.findSeries('Marketing_Geral', 'Custo geral de Ads');
  const summaries = queries.tableSummaries();

  return singleTabPage('executive-summary', 'Executive Summary', 'Consolidated view of the main performance indicators', [
    {
      kind: 'kpis',
      id: 'headline',
      items: [
        kpi('Customer Acquisition Cost', cac && seriesMean(cac), 'currencyRounded', 'Average cost to acquire a customer'),
        kpi('Monthly Recurring Revenue', mrr && seriesMean(mrr), 'currencyRounded', 'Average monthly recurring revenue'),
        kpi('New Followers', followers && seriesSum(followers), 'integer', 'New followers over the period'),
        kpi('Ad Investment', adSpend && seriesSum(adSpend), 'currencyRounded', 'Total advertising investment'),
      ],
    },
    {
      kind: 'chart',
      id: 'data-completeness',
      title: 'Data Completeness',
      chartKind: 'horizontalBar',
      categories: summaries.map((summary) => summary.tableName),
      series: [
        {
          key: 'completeness',
          label: 'Completeness (%)',
          color: 'success',
          values: summaries.map((summary) => summary.completenessPct),
        },
      ],
      valueFormat: 'percent',
    },
    {
      kind: 'table',
      id: 'metrics-summary',
      title: 'Metrics Summary',
      columns: ['Module', 'Metrics', 'Completeness (%)'],
      rows: summaries.map((summary) => [
        cell(summary.tableName, 'text'),
        cell(summary.metricCount, 'integer'),
        cell(summary.completenessPct, 'percent'),
      ]),
    },
  ]);
}
