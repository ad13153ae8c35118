import { computeCac, computeCostPerLead } from '../derived-ratios.ts';
import type { MetricQueries, MetricSeries } from '../metric-queries.ts';
import { seriesMean, seriesSum } from '../series-stats.ts';
import { cell, kpi, seriesChart, singleTabPage, type DashboardPage, type PageSection, type TableCell } from './page-model.ts';

const REAL_ESTATE = 'Campanha_Imoveis';
const INSURANCE = 'Campanha_Multiseguros';

interface CampaignTotals {
  investment: number | null;
  leads: number | null;
  conversions: number | null;
  averageRoi: number | null;
  costPerLead: number | null;
  costPerConversion: number | null;
}

function sumOf(series: MetricSeries | null): number | null {
  return series && seriesSum(series);
}

export function summarizeCampaign(queries: MetricQueries, tableName: string): CampaignTotals {
  const investment = sumOf(queries.findSeries(tableName, 'Investimento'));
  const leads = sumOf(queries.findSeries(tableName, 'Leads Gerados'));
  const conversions = sumOf(queries.findSeries(tableName, 'Clientes Convertidos'));
  const roi = queries.findSeries(tableName, 'ROI');
  return {
    investment,
    leads,
    conversions,
    averageRoi: roi && seriesMean(roi),
    costPerLead: computeCostPerLead(investment, leads),
    costPerConversion: computeCac(investment, conversions),
  };
}

export function buildComparativeAnalysisPage(queries: MetricQueries): DashboardPage {
  const sections: PageSection[] = [];

  const realEstateInvestment = queries.findSeries(REAL_ESTATE, 'Investimento');
  const insuranceInvestment = queries.findSeries(INSURANCE, 'Investimento');
  if (realEstateInvestment && insuranceInvestment) {
    sections.push(
      seriesChart(
        'investment-comparison',
        'Investment Comparison',
        'groupedBar',
        [
          { key: 'realEstate', label: 'Real Estate', color: 'primary', series: realEstateInvestment },
          { key: 'insurance', label: 'Insurance', color: 'danger', series: insuranceInvestment },
        ],
        'currency',
      ),
      {
        kind: 'kpis',
        id: 'investment-totals',
        items: [
          kpi('Real Estate Total', seriesSum(realEstateInvestment), 'currency'),
          kpi('Insurance Total', seriesSum(insuranceInvestment), 'currency'),
        ],
      },
    );
  }

  const realEstateRoi = queries.findSeries(REAL_ESTATE, 'ROI');
  const insuranceRoi = queries.findSeries(INSURANCE, 'ROI');
  if (realEstateRoi && insuranceRoi) {
    sections.push(
      seriesChart(
        'roi-comparison',
        'Return on Investment Comparison',
        'line',
        [
          { key: 'realEstate', label: 'Real Estate', color: 'primary', series: realEstateRoi },
          { key: 'insurance', label: 'Insurance', color: 'danger', series: insuranceRoi },
        ],
        'percent',
      ),
      {
        kind: 'kpis',
        id: 'roi-averages',
        items: [
          kpi('Real Estate Average', seriesMean(realEstateRoi), 'percent'),
          kpi('Insurance Average', seriesMean(insuranceRoi), 'percent'),
        ],
      },
    );
  }

  const realEstate = summarizeCampaign(queries, REAL_ESTATE);
  const insurance = summarizeCampaign(queries, INSURANCE);
  const row = (label: string, format: TableCell['format'], pick: (totals: CampaignTotals) => number | null): TableCell[] => [
    cell(label, 'text'),
    cell(pick(realEstate), format),
    cell(pick(insurance), format),
  ];
  sections.push({
    kind: 'table',
    id: 'performance-summary',
    title: 'Performance Summary',
    columns: ['Metric', 'Real Estate', 'Insurance'],
    rows: [
      row('Total Investment', 'currency', (totals) => totals.investment),
      row('Leads Generated', 'integer', (totals) => totals.leads),
      row('Conversions', 'integer', (totals) => totals.conversions),
      row('Average ROI', 'percent', (totals) => totals.averageRoi),
      row('Cost per Lead', 'currency', (totals) => totals.costPerLead),
      row('Cost per Conversion', 'currency', (totals) => totals.costPerConversion),
    ],
  });

  return singleTabPage('comparative-analysis', 'Comparative Analysis', 'Side-by-side campaign comparison', sections);
}
