import type { ChartColor, ChartSection } from '@kpi-board/metrics';

export interface ChartRow {
  category: string;
  [seriesKey: string]: string | number | null;
}

export interface SliceDatum {
  name: string;
  value: number;
}

/** One row per category, one column per series key; missing values stay null so lines show gaps. */
export function toChartRows(section: Pick<ChartSection, 'categories' | 'series'>): ChartRow[] {
  return section.categories.map((category, index) => {
    const row: ChartRow = { category };
    for (const series of section.series) {
      row[series.key] = series.values[index] ?? null;
    }
    return row;
  });
}

/** Donut slices from the first series; missing and non-positive values are left out. */
export function toSliceData(section: Pick<ChartSection, 'categories' | 'series'>): SliceDatum[] {
  const values = section.series[0]?.values ?? [];
  const slices: SliceDatum[] = [];
  section.categories.forEach((name, index) => {
    const value = values[index] ?? null;
    if (value !== null && value > 0) {
      slices.push({ name, value });
    }
  });
  return slices;
}

export function thresholdColor(value: number | null, threshold: number): ChartColor {
  return value !== null && value > threshold ? 'success' : 'danger';
}
