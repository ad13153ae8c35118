import type { MetricSeries } from './metric-queries.ts';

export type SeriesInput = MetricSeries | readonly (number | null)[];

export function seriesValues(input: SeriesInput): (number | null)[] {
  return 'points' in input ? input.points.map((point) => point.value) : [...input];
}

/** Non-missing values only; an empty result means "no data", never zero. */
export function presentValues(input: SeriesInput): number[] {
  return seriesValues(input).filter((value): value is number => value !== null);
}

export function seriesSum(input: SeriesInput): number | null {
  const values = presentValues(input);
  return values.length === 0 ? null : values.reduce((total, value) => total + value, 0);
}

export function seriesMean(input: SeriesInput): number | null {
  const values = presentValues(input);
  const sum = seriesSum(values);
  return sum === null ? null : sum / values.length;
}

export function seriesMin(input: SeriesInput): number | null {
  const values = presentValues(input);
  return values.length === 0 ? null : Math.min(...values);
}

export function seriesMax(input: SeriesInput): number | null {
  const values = presentValues(input);
  return values.length === 0 ? null : Math.max(...values);
}

export function countWhere(input: SeriesInput, predicate: (value: number) => boolean): number {
  return presentValues(input).filter(predicate).length;
}
