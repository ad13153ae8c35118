import { computeConversionRate } from '../derived-ratios.ts';
import type { MetricQueries, MetricSeries } from '../metric-queries.ts';
import { seriesSum } from '../series-stats.ts';
import { cell, singleTabPage, type ChartSection, type DashboardPage, type PageSection } from './page-model.ts';

const TABLE = 'Leads_Condominios';
const PROPOSAL_PREFIX = 'Origem da proposta enviada';

/** Conversion source label, and the fragment naming the same source among proposal rows. */
export const LEAD_SOURCE_PAIRS: readonly (readonly [string, string])[] = [
  ['Indicação', 'Indica'],
  ['Capt. Ativa', 'Capt. Ativa'],
  ['Capt. Receptiva', 'Contato Receptivo'],
  ['Construtora', 'Construtora'],
  ['Reativação', 'Reativa'],
  ['Ads', 'Ads'],
  ['Mala Direta', 'Mala Direta'],
];

export interface SourceTotal {
  source: string;
  total: number;
}

export interface SourceConversion {
  source: string;
  proposals: number | null;
  conversions: number | null;
  ratePct: number | null;
}

export function proposalSourceLabel(metricName: string): string {
  return metricName.replace(PROPOSAL_PREFIX, '').replace(/^[\s-]+|[\s-]+$/g, '');
}

/** Proposal totals per source; sources without proposals are left out. */
export function summarizeProposalSources(proposals: readonly MetricSeries[]): SourceTotal[] {
  return proposals
    .map((series) => ({ source: proposalSourceLabel(series.metricName), total: seriesSum(series) ?? 0 }))
    .filter((entry) => entry.total > 0);
}

function includesIgnoringCase(name: string, fragment: string): boolean {
  return name.toLowerCase().includes(fragment.toLowerCase());
}

/** Conversion rate per source, highest first; sources without a rate go last. */
export function summarizeConversions(
  proposals: readonly MetricSeries[],
  conversions: readonly MetricSeries[],
): SourceConversion[] {
  const rows: SourceConversion[] = [];
  for (const [conversionKey, proposalKey] of LEAD_SOURCE_PAIRS) {
    const proposalSeries = proposals.find((series) => includesIgnoringCase(series.metricName, proposalKey));
    const conversionSeries = conversions.find((series) => includesIgnoringCase(series.metricName, conversionKey));
    if (!proposalSeries || !conversionSeries) {
      continue;
    }
    const proposalTotal = seriesSum(proposalSeries);
    const conversionTotal = seriesSum(conversionSeries);
    rows.push({
      source: conversionKey,
      proposals: proposalTotal,
      conversions: conversionTotal,
      ratePct: computeConversionRate(conversionTotal, proposalTotal),
    });
  }

  return rows.sort((left, right) => {
    if (left.ratePct === null) {
      return right.ratePct === null ? 0 : 1;
    }
    if (right.ratePct === null) {
      return -1;
    }
    return right.ratePct - left.ratePct;
  });
}

function totalsChart(id: string, title: string, chartKind: ChartSection['chartKind'], totals: readonly SourceTotal[]): ChartSection {
  return {
    kind: 'chart',
    id,
    title,
    chartKind,
    categories: totals.map((entry) => entry.source),
    series: [{ key: 'proposals', label: 'Proposals', color: 'primary', values: totals.map((entry) => entry.total) }],
    valueFormat: 'integer',
  };
}

export function buildLeadAnalyticsPage(queries: MetricQueries): DashboardPage {
  const proposals = queries.findAllSeries(TABLE, 'proposta enviada');
  const conversions = queries.findAllSeries(TABLE, 'Lead Convertido');
  const sections: PageSection[] = [];

  const sourceTotals = summarizeProposalSources(proposals);
  if (sourceTotals.length > 0) {
    const ascending = [...sourceTotals].sort((left, right) => left.total - right.total);
    sections.push(
      totalsChart('lead-sources-share', 'Lead Source Distribution', 'donut', sourceTotals),
      totalsChart('lead-sources-ranking', 'Proposals by Source', 'horizontalBar', ascending),
    );
  }

  const conversionRows = summarizeConversions(proposals, conversions);
  if (conversionRows.length > 0) {
    sections.push(
      {
        kind: 'chart',
        id: 'conversion-rate',
        title: 'Conversion Rate by Source',
        chartKind: 'bar',
        categories: conversionRows.map((row) => row.source),
        series: [{ key: 'rate', label: 'Rate (%)', color: 'success', values: conversionRows.map((row) => row.ratePct) }],
        valueFormat: 'percent',
      },
      {
        kind: 'table',
        id: 'conversion-table',
        title: 'Conversion by Source',
        columns: ['Source', 'Proposals', 'Conversions', 'Rate (%)'],
        rows: conversionRows.map((row) => [
          cell(row.source, 'text'),
          cell(row.proposals, 'integer'),
          cell(row.conversions, 'integer'),
          cell(row.ratePct, 'percent'),
        ]),
      },
    );
  }

  return singleTabPage('lead-analytics', 'Lead Analytics', 'Lead generation and conversion by channel', sections);
}
