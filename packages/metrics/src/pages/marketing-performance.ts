import type { MetricQueries } from '../metric-queries.ts';
import { seriesMax, seriesMean, seriesMin, seriesSum } from '../series-stats.ts';
import { kpi, seriesChart, singleTabPage, type DashboardPage, type PageSection } from './page-model.ts';

const TABLE = 'Marketing_Geral';

export function buildMarketingPerformancePage(queries: MetricQueries): DashboardPage {
  const sections: PageSection[] = [];

  const followers = queries.findSeries(TABLE, 'Seguidores');
  if (followers) {
    const average = seriesMean(followers);
    sections.push(
      seriesChart(
        'followers-growth',
        'Instagram Growth Analysis',
        'line',
        [{ key: 'followers', label: 'New Followers', color: 'primary', series: followers }],
        'integer',
        average === null ? {} : { referenceLine: { value: average, label: 'Average', color: 'secondary' } },
      ),
      {
        kind: 'kpis',
        id: 'followers-stats',
        items: [
          kpi('Average', average, 'integer'),
          kpi('Maximum', seriesMax(followers), 'integer'),
          kpi('Minimum', seriesMin(followers), 'integer'),
          kpi('Total', seriesSum(followers), 'integer'),
        ],
      },
    );
  }

  const adSpend = queries.findSeries(TABLE, 'Custo geral de Ads');
  if (adSpend) {
    sections.push(
      seriesChart(
        'ad-investment',
        'Advertising Investment',
        'bar',
        [{ key: 'investment', label: 'Investment (R$)', color: 'primary', series: adSpend }],
        'currency',
      ),
      {
        kind: 'kpis',
        id: 'ad-investment-stats',
        items: [kpi('Total', seriesSum(adSpend), 'currency'), kpi('Average', seriesMean(adSpend), 'currency')],
      },
    );
  }

  const views = queries.findSeries(TABLE, 'Visualizações');
  if (views) {
    sections.push(
      seriesChart('content-views', 'Content Views', 'area', [{ key: 'views', label: 'Views', color: 'success', series: views }], 'integer'),
      {
        kind: 'kpis',
        id: 'content-views-stats',
        items: [kpi('Total', seriesSum(views), 'integer'), kpi('Average', seriesMean(views), 'integer')],
      },
    );
  }

  const organic = queries.findSeries(TABLE, 'Alcance Orgânico');
  const paid = queries.findSeries(TABLE, 'Alcance Pago');
  if (organic && paid) {
    sections.push(
      seriesChart(
        'reach',
        'Reach Analysis: Organic vs Paid',
        'groupedBar',
        [
          { key: 'organic', label: 'Organic', color: 'success', series: organic },
          { key: 'paid', label: 'Paid', color: 'warning', series: paid },
        ],
        'integer',
      ),
    );
  }

  return singleTabPage(
    'marketing-performance',
    'Marketing Performance',
    'Digital channel performance and media investment',
    sections,
  );
}
