import { z } from 'zod/v4';

// ─── Long-format observations ─────────────────────────────────────

export const PeriodSchema = z.object({
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  label: z.string().min(1),
  date: z.iso.date(),
});

/**
 * One tidy row: `value: null` is the missing-value sentinel (blank or error cell),
 * distinct from a recorded zero.
 */
export const MetricObservationSchema = z.object({
  tableName: z.string().min(1),
  metricName: z.string().min(1),
  period: PeriodSchema,
  value: z.number().nullable(),
});

export type MetricObservation = z.infer<typeof MetricObservationSchema>;

// ─── Informational summaries ──────────────────────────────────────

export const TableSummarySchema = z.object({
  tableName: z.string().min(1),
  metricCount: z.number().int().nonnegative(),
  periodCount: z.number().int().nonnegative(),
  totalCells: z.number().int().nonnegative(),
  filledCells: z.number().int().nonnegative(),
  emptyCells: z.number().int().nonnegative(),
  completenessPct: z.number().min(0).max(100),
});

export type TableSummary = z.infer<typeof TableSummarySchema>;

export const MetricStatisticsSchema = z.object({
  tableName: z.string().min(1),
  metricName: z.string().min(1),
  observationCount: z.number().int().nonnegative(),
  missingCount: z.number().int().nonnegative(),
  sum: z.number().nullable(),
  mean: z.number().nullable(),
  min: z.number().nullable(),
  max: z.number().nullable(),
});

export type MetricStatistics = z.infer<typeof MetricStatisticsSchema>;

// ─── Prepared dataset consumed by the dashboard ───────────────────

export const PreparedDatasetDTOSchema = z.object({
  sourceFile: z.string(),
  loadedAt: z.iso.datetime(),
  observations: z.array(MetricObservationSchema),
  tableSummaries: z.array(TableSummarySchema),
});

export type PreparedDatasetDTO = z.infer<typeof PreparedDatasetDTOSchema>;
