import type { MetricQueries } from '../metric-queries.ts';
import { countWhere, presentValues, seriesMax, seriesMean, seriesMin, seriesSum } from '../series-stats.ts';
import { kpi, seriesChart, singleTabPage, type DashboardPage, type PageSection } from './page-model.ts';

const TABLE = 'Indices_Condominios';
const BREAK_EVEN = 1;

export function buildFinancialKpisPage(queries: MetricQueries): DashboardPage {
  const sections: PageSection[] = [];

  const cac = queries.findSeries(TABLE, 'CAC');
  if (cac) {
    const average = seriesMean(cac);
    sections.push(
      seriesChart(
        'cac',
        'Customer Acquisition Cost (CAC)',
        'line',
        [{ key: 'cac', label: 'CAC', color: 'primary', series: cac }],
        'currency',
        average === null ? {} : { referenceLine: { value: average, label: 'Average', color: 'danger' } },
      ),
      {
        kind: 'kpis',
        id: 'cac-stats',
        items: [
          kpi('Average CAC', average, 'currency'),
          kpi('Minimum', seriesMin(cac), 'currency'),
          kpi('Maximum', seriesMax(cac), 'currency'),
        ],
      },
    );
  }

  const mrr = queries.findSeries(TABLE, 'MRR');
  if (mrr) {
    sections.push(
      seriesChart('mrr', 'Monthly Recurring Revenue', 'bar', [{ key: 'mrr', label: 'MRR (R$)', color: 'success', series: mrr }], 'currencyRounded'),
      {
        kind: 'kpis',
        id: 'mrr-stats',
        items: [kpi('Average', seriesMean(mrr), 'currency'), kpi('Total', seriesSum(mrr), 'currency')],
      },
    );
  }

  const revenueToCost = queries.findSeries(TABLE, 'Recorrente mensal / Custo');
  if (revenueToCost) {
    const positiveMonths = countWhere(revenueToCost, (value) => value > BREAK_EVEN);
    sections.push(
      seriesChart(
        'revenue-cost-ratio',
        'Return on Investment Ratio',
        'bar',
        [{ key: 'ratio', label: 'Revenue / Cost', color: 'success', series: revenueToCost }],
        'ratio',
        { referenceLine: { value: BREAK_EVEN, label: 'Break-even', color: 'dark' }, threshold: BREAK_EVEN },
      ),
      {
        kind: 'kpis',
        id: 'revenue-cost-stats',
        items: [
          kpi('Average', seriesMean(revenueToCost), 'ratio'),
          kpi('Positive Months', `${positiveMonths}/${presentValues(revenueToCost).length}`, 'text'),
        ],
      },
    );
  }

  return singleTabPage('financial-kpis', 'Financial Key Performance Indicators', 'Financial indicators and profitability', sections);
}
