import type { MetricQueries } from '../metric-queries.ts';
import { seriesMax, seriesMean, seriesSum } from '../series-stats.ts';
import { kpi, seriesChart, type DashboardPage, type DashboardTab, type PageSection } from './page-model.ts';

/**
 * Share-of-base cells hold fractions (a percent-formatted cell reads as 0.15),
 * so the value is always scaled by 100. A typed "15%" string is stripped to 15
 * by the ETL and would show as 1500%.
 */
export function toPercentage(value: number | null): number | null {
  return value === null ? null : value * 100;
}

function buildRealEstateTab(queries: MetricQueries): DashboardTab {
  const table = 'Campanha_Imoveis';
  const investment = queries.findSeries(table, 'Investimento');
  const leads = queries.findSeries(table, 'Leads Gerados');
  const roi = queries.findSeries(table, 'ROI');

  const sections: PageSection[] = [
    {
      kind: 'kpis',
      id: 'real-estate-kpis',
      items: [
        kpi('Total Investment', investment && seriesSum(investment), 'currency'),
        kpi('Leads Generated', leads && seriesSum(leads), 'integer'),
        kpi('Average ROI', roi && seriesMean(roi), 'percent'),
      ],
    },
  ];
  if (investment) {
    sections.push(
      seriesChart('real-estate-investment', 'Investment', 'line', [{ key: 'investment', label: 'Investment (R$)', color: 'primary', series: investment }], 'currency'),
    );
  }
  if (roi) {
    sections.push(seriesChart('real-estate-roi', 'ROI', 'bar', [{ key: 'roi', label: 'ROI (%)', color: 'success', series: roi }], 'percent'));
  }

  return { id: 'real-estate', label: 'Real Estate', sections };
}

function buildDigitalBillingTab(queries: MetricQueries): DashboardTab {
  const table = 'Campanha_Boleto_Digital';
  const units = queries.findSeries(table, 'Nº de Unidades');
  const savings = queries.findSeries(table, 'Economia');
  const baseShare = queries.findSeries(table, '% da base');

  const sections: PageSection[] = [
    {
      kind: 'kpis',
      id: 'digital-billing-kpis',
      items: [
        kpi('Registered Units', units && seriesMax(units), 'integer'),
        kpi('Total Savings', savings && seriesSum(savings), 'currency'),
        kpi('Current Base %', baseShare && toPercentage(seriesMax(baseShare)), 'percent'),
      ],
    },
  ];
  if (units) {
    sections.push(seriesChart('digital-billing-units', 'Registered Units', 'area', [{ key: 'units', label: 'Units', color: 'success', series: units }], 'integer'));
  }
  if (savings) {
    sections.push(
      seriesChart('digital-billing-savings', 'Savings', 'bar', [{ key: 'savings', label: 'Savings (R$)', color: 'success', series: savings }], 'currency'),
    );
  }

  return { id: 'digital-billing', label: 'Digital Billing', sections };
}

function buildInsuranceTab(queries: MetricQueries): DashboardTab {
  const table = 'Campanha_Multiseguros';
  const investment = queries.findSeries(table, 'Investimento');
  const leads = queries.findSeries(table, 'Leads Gerados');
  const conversions = queries.findSeries(table, 'Clientes Convertidos');
  const roi = queries.findSeries(table, 'ROI');

  const sections: PageSection[] = [
    {
      kind: 'kpis',
      id: 'insurance-kpis',
      items: [
        kpi('Investment', investment && seriesSum(investment), 'currency'),
        kpi('Leads', leads && seriesSum(leads), 'integer'),
        kpi('Conversions', conversions && seriesSum(conversions), 'integer'),
        kpi('Average ROI', roi && seriesMean(roi), 'percent'),
      ],
    },
  ];
  if (leads && conversions) {
    sections.push(
      seriesChart(
        'insurance-funnel',
        'Leads vs Conversions',
        'groupedBar',
        [
          { key: 'leads', label: 'Leads', color: 'primary', series: leads },
          { key: 'conversions', label: 'Conversions', color: 'success', series: conversions },
        ],
        'integer',
      ),
    );
  }
  if (roi) {
    sections.push(seriesChart('insurance-roi', 'ROI', 'line', [{ key: 'roi', label: 'ROI (%)', color: 'danger', series: roi }], 'percent'));
  }

  return { id: 'insurance', label: 'Insurance', sections };
}

export function buildCampaignManagementPage(queries: MetricQueries): DashboardPage {
  return {
    id: 'campaign-management',
    title: 'Campaign Management',
    subtitle: 'Detailed campaign performance',
    tabs: [buildRealEstateTab(queries), buildDigitalBillingTab(queries), buildInsuranceTab(queries)],
  };
}
