import { comparePeriods, type Period } from '@kpi-board/shared';
import type { MetricSeries } from '../metric-queries.ts';

export const DASHBOARD_PAGE_IDS = [
  'executive-summary',
  'marketing-performance',
  'lead-analytics',
  'financial-kpis',
  'campaign-management',
  'comparative-analysis',
] as const;

export type DashboardPageId = (typeof DASHBOARD_PAGE_IDS)[number];

/** How the UI renders a number; `null` values always render as "N/A" or a gap. */
export type ValueFormat = 'currency' | 'currencyRounded' | 'integer' | 'decimal' | 'percent' | 'ratio' | 'text';

export type ChartKind = 'line' | 'area' | 'bar' | 'groupedBar' | 'horizontalBar' | 'donut';

export type ChartColor = 'primary' | 'secondary' | 'success' | 'warning' | 'danger' | 'dark';

export interface KpiItem {
  label: string;
  value: number | string | null;
  format: ValueFormat;
  help?: string;
}

export interface KpiSection {
  kind: 'kpis';
  id: string;
  title?: string;
  items: KpiItem[];
}

export interface ChartSeries {
  key: string;
  label: string;
  color: ChartColor;
  values: (number | null)[];
}

export interface ReferenceLine {
  value: number;
  label: string;
  color: ChartColor;
}

export interface ChartSection {
  kind: 'chart';
  id: string;
  title: string;
  chartKind: ChartKind;
  categories: string[];
  series: ChartSeries[];
  valueFormat: ValueFormat;
  referenceLine?: ReferenceLine;
  /** Bars above the threshold use `success`, the others `danger`. */
  threshold?: number;
}

export interface TableCell {
  value: number | string | null;
  format: ValueFormat;
}

export interface TableSection {
  kind: 'table';
  id: string;
  title: string;
  columns: string[];
  rows: TableCell[][];
}

export type PageSection = KpiSection | ChartSection | TableSection;

export interface DashboardTab {
  id: string;
  label: string;
  sections: PageSection[];
}

export interface DashboardPage {
  id: DashboardPageId;
  title: string;
  subtitle: string;
  tabs: DashboardTab[];
}

export interface DashboardOverview {
  totalMetrics: number;
  tableCount: number;
  averageCompletenessPct: number | null;
  reportingWindow: string | null;
}

// ─── Section helpers ──────────────────────────────────────────────

export function singleTabPage(id: DashboardPageId, title: string, subtitle: string, sections: PageSection[]): DashboardPage {
  return { id, title, subtitle, tabs: [{ id: 'overview', label: title, sections }] };
}

export function kpi(label: string, value: number | string | null, format: ValueFormat, help?: string): KpiItem {
  return help === undefined ? { label, value, format } : { label, value, format, help };
}

export function cell(value: number | string | null, format: ValueFormat): TableCell {
  return { value, format };
}

export interface SeriesSpec {
  key: string;
  label: string;
  color: ChartColor;
  series: MetricSeries;
}

/**
 * Aligns several metric series on the union of their periods, so a period
 * absent from one series becomes a gap rather than a shifted value.
 */
export function alignSeries(specs: readonly SeriesSpec[]): { categories: string[]; series: ChartSeries[] } {
  const periods = new Map<string, Period>();
  for (const spec of specs) {
    for (const point of spec.series.points) {
      periods.set(point.period.date, point.period);
    }
  }
  const ordered = [...periods.values()].sort(comparePeriods);

  return {
    categories: ordered.map((period) => period.label),
    series: specs.map((spec) => {
      const byDate = new Map(spec.series.points.map((point) => [point.period.date, point.value]));
      return {
        key: spec.key,
        label: spec.label,
        color: spec.color,
        values: ordered.map((period) => byDate.get(period.date) ?? null),
      };
    }),
  };
}

export function seriesChart(
  id: string,
  title: string,
  chartKind: ChartKind,
  specs: readonly SeriesSpec[],
  valueFormat: ValueFormat,
  extras: Pick<ChartSection, 'referenceLine' | 'threshold'> = {},
): ChartSection {
  return { kind: 'chart', id, title, chartKind, valueFormat, ...alignSeries(specs), ...extras };
}
