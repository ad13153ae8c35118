import { describe, expect, it } from 'vitest';
import { buildDashboardOverview, buildDashboardPages } from './dashboard-pages.ts';
import { buildDatasetFromSeries } from './fixtures/dataset-builder.ts';
import { SAMPLE_SERIES } from './fixtures/sample-series.ts';
import { toPercentage } from './pages/campaign-management.ts';
import { proposalSourceLabel } from './pages/lead-analytics.ts';
import type { ChartSection, DashboardPage, DashboardPageId, KpiSection, PageSection, TableSection } from './pages/page-model.ts';

const dataset = buildDatasetFromSeries(SAMPLE_SERIES);
const pages = buildDashboardPages(dataset);

function page(id: DashboardPageId): DashboardPage {
  const found = pages.find((candidate) => candidate.id === id);
  if (!found) {
    throw new Error(`Page ${id} missing`);
  }
  return found;
}

function section(pageId: DashboardPageId, sectionId: string): PageSection {
  const found = page(pageId)
    .tabs.flatMap((tab) => tab.sections)
    .find((candidate) => candidate.id === sectionId);
  if (!found) {
    throw new Error(`Section ${sectionId} missing`);
  }
  return found;
}

function chart(pageId: DashboardPageId, sectionId: string): ChartSection {
  const found = section(pageId, sectionId);
  if (found.kind !== 'chart') {
    throw new Error(`Section ${sectionId} is not a chart`);
  }
  return found;
}

function kpiValues(pageId: DashboardPageId, sectionId: string): Record<string, number | string | null> {
  const found: PageSection = section(pageId, sectionId);
  if (found.kind !== 'kpis') {
    throw new Error(`Section ${sectionId} is not a KPI row`);
  }
  const kpis: KpiSection = found;
  return Object.fromEntries(kpis.items.map((item) => [item.label, item.value]));
}

function tableValues(pageId: DashboardPageId, sectionId: string): (number | string | null)[][] {
  const found = section(pageId, sectionId);
  if (found.kind !== 'table') {
    throw new Error(`Section ${sectionId} is not a table`);
  }
  const table: TableSection = found;
  return table.rows.map((row) => row.map((cell) => cell.value));
}

describe('buildDashboardPages', () => {
  it('builds the six pages in navigation order', () => {
    expect(pages.map((candidate) => candidate.id)).toEqual([
      'executive-summary',
      'marketing-performance',
      'lead-analytics',
      'financial-kpis',
      'campaign-management',
      'comparative-analysis',
    ]);
    expect(page('campaign-management').tabs.map((tab) => tab.label)).toEqual(['Real Estate', 'Digital Billing', 'Insurance']);
  });

  it('summarizes headline KPIs and completeness', () => {
    expect(kpiValues('executive-summary', 'headline')).toEqual({
      'Customer Acquisition Cost': 24,
      'Monthly Recurring Revenue': 50000,
      'New Followers': 220,
      'Ad Investment': 4500,
    });
    expect(chart('executive-summary', 'data-completeness').series[0]?.values).toEqual([86.7, 94.4, 88.9, 66.7, 100, 75]);
    expect(tableValues('executive-summary', 'metrics-summary')[0]).toEqual(['Marketing_Geral', 5, 86.7]);
  });

  it('charts followers with an average line and keeps gaps', () => {
    const followers = chart('marketing-performance', 'followers-growth');

    expect(followers.categories).toEqual(['Janeiro', 'Fevereiro', 'Março']);
    expect(followers.series[0]?.values).toEqual([100, 120, null]);
    expect(followers.referenceLine).toEqual({ value: 110, label: 'Average', color: 'secondary' });
    expect(kpiValues('marketing-performance', 'followers-stats')).toEqual({ Average: 110, Maximum: 120, Minimum: 100, Total: 220 });
    expect(kpiValues('marketing-performance', 'ad-investment-stats')).toEqual({ Total: 4500, Average: 1500 });
  });

  it('groups organic and paid reach on shared periods', () => {
    const reach = chart('marketing-performance', 'reach');

    expect(reach.chartKind).toBe('groupedBar');
    expect(reach.series.map((series) => series.values)).toEqual([
      [500, 600, 700],
      [200, null, 400],
    ]);
  });

  it('omits lead sources without proposals from the distribution', () => {
    const share = chart('lead-analytics', 'lead-sources-share');
    const ranking = chart('lead-analytics', 'lead-sources-ranking');

    expect(share.categories).toEqual(['Indicação', 'Ads']);
    expect(share.series[0]?.values).toEqual([20, 10]);
    expect(ranking.categories).toEqual(['Ads', 'Indicação']);
  });

  it('ranks conversion rates and leaves zero-proposal sources missing', () => {
    expect(tableValues('lead-analytics', 'conversion-table')).toEqual([
      ['Indicação', 20, 10, 50],
      ['Ads', 10, 2, 20],
      ['Reativação', 0, 0, null],
    ]);
  });

  it('computes financial KPIs and break-even months', () => {
    expect(kpiValues('financial-kpis', 'cac-stats')).toEqual({ 'Average CAC': 24, Minimum: 18, Maximum: 30 });
    expect(kpiValues('financial-kpis', 'mrr-stats')).toEqual({ Average: 50000, Total: 150000 });
    expect(kpiValues('financial-kpis', 'revenue-cost-stats')['Positive Months']).toBe('2/3');

    const ratio = chart('financial-kpis', 'revenue-cost-ratio');
    expect(ratio.threshold).toBe(1);
    expect(ratio.referenceLine?.label).toBe('Break-even');
  });

  it('builds one KPI row per campaign tab', () => {
    expect(kpiValues('campaign-management', 'real-estate-kpis')).toEqual({
      'Total Investment': 5000,
      'Leads Generated': 100,
      'Average ROI': 3.5,
    });
    expect(kpiValues('campaign-management', 'digital-billing-kpis')).toEqual({
      'Registered Units': 340,
      'Total Savings': 600,
      'Current Base %': 25,
    });
    expect(kpiValues('campaign-management', 'insurance-kpis')).toEqual({
      Investment: 3000,
      Leads: 0,
      Conversions: null,
      'Average ROI': 2,
    });
  });

  it('compares campaigns with cost per lead missing when there are no leads', () => {
    expect(tableValues('comparative-analysis', 'performance-summary')).toEqual([
      ['Total Investment', 5000, 3000],
      ['Leads Generated', 100, 0],
      ['Conversions', 10, null],
      ['Average ROI', 3.5, 2],
      ['Cost per Lead', 50, null],
      ['Cost per Conversion', 500, null],
    ]);
    expect(chart('comparative-analysis', 'investment-comparison').series.map((series) => series.values)).toEqual([
      [2000, 3000, null],
      [1000, 1000, 1000],
    ]);
  });

  it('drops chart sections whose metrics are absent', () => {
    const sparse = buildDashboardPages(buildDatasetFromSeries({ Marketing_Geral: { 'Novos Seguidores': [10] } }));
    const marketing = sparse.find((candidate) => candidate.id === 'marketing-performance');

    expect(marketing?.tabs[0]?.sections.map((candidate) => candidate.id)).toEqual(['followers-growth', 'followers-stats']);
  });
});

describe('buildDashboardOverview', () => {
  it('sums metrics and averages completeness', () => {
    const overview = buildDashboardOverview(dataset);

    expect(overview.totalMetrics).toBe(25);
    expect(overview.tableCount).toBe(6);
    expect(overview.averageCompletenessPct).toBeCloseTo(85.28, 2);
    expect(overview.reportingWindow).toBe('Janeiro - Março 2025');
  });
});

describe('page helpers', () => {
  it('strips the proposal prefix from source labels', () => {
    expect(proposalSourceLabel('Origem da proposta enviada - Capt. Ativa')).toBe('Capt. Ativa');
  });

  it('always scales share-of-base values by 100', () => {
    expect(toPercentage(0.25)).toBe(25);
    expect(toPercentage(0.5)).toBe(50);
    expect(toPercentage(1.5)).toBe(150);
    expect(toPercentage(null)).toBeNull();
  });
});
