import fs from 'node:fs';
import path from 'node:path';
import { AppError, err, ok, type MetricObservation, type MetricStatistics, type Result, type TableSummary } from '@kpi-board/shared';
import ExcelJS from 'exceljs';
import type { WideTable } from './table-extractor.ts';

export const PREPARED_SHEETS = {
  tableSummary: 'Table_Summary',
  metricStatistics: 'Metric_Statistics',
  consolidatedLong: 'Consolidated_Long',
} as const;

export const LONG_COLUMNS = ['Table', 'Metric', 'Year', 'Month', 'MonthNumber', 'Date', 'Value'] as const;

export const SUMMARY_COLUMNS = [
  'Table',
  'Metrics',
  'Periods',
  'TotalCells',
  'FilledCells',
  'EmptyCells',
  'CompletenessPct',
] as const;

export const STATISTICS_COLUMNS = ['Table', 'Metric', 'Observations', 'Missing', 'Sum', 'Mean', 'Min', 'Max'] as const;

/** Workbook metadata dates are pinned so reruns over the same source write the same content. */
export const PREPARED_WORKBOOK_DATE = new Date('2025-01-01T00:00:00.000Z');

export interface PreparedWorkbookContent {
  tables: readonly WideTable[];
  observations: readonly MetricObservation[];
  tableSummaries: readonly TableSummary[];
  metricStatistics: readonly MetricStatistics[];
}

function addHeaderRow(worksheet: ExcelJS.Worksheet, header: readonly string[]): void {
  const row = worksheet.addRow([...header]);
  row.font = { bold: true };
  worksheet.views = [{ state: 'frozen', ySplit: 1 }];
}

function addTableSheet(workbook: ExcelJS.Workbook, table: WideTable): void {
  const worksheet = workbook.addWorksheet(table.tableName);
  addHeaderRow(worksheet, ['Metric', ...table.periods.map((period) => period.label)]);
  for (const row of table.rows) {
    worksheet.addRow([row.metricName, ...row.values]);
  }
  worksheet.getColumn(1).width = 40;
}

function buildWorkbook(content: PreparedWorkbookContent): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'kpi-board';
  workbook.lastModifiedBy = 'kpi-board';
  workbook.created = PREPARED_WORKBOOK_DATE;
  workbook.modified = PREPARED_WORKBOOK_DATE;

  for (const table of content.tables) {
    addTableSheet(workbook, table);
  }

  const summarySheet = workbook.addWorksheet(PREPARED_SHEETS.tableSummary);
  addHeaderRow(summarySheet, SUMMARY_COLUMNS);
  for (const summary of content.tableSummaries) {
    summarySheet.addRow([
      summary.tableName,
      summary.metricCount,
      summary.periodCount,
      summary.totalCells,
      summary.filledCells,
      summary.emptyCells,
      summary.completenessPct,
    ]);
  }

  const statisticsSheet = workbook.addWorksheet(PREPARED_SHEETS.metricStatistics);
  addHeaderRow(statisticsSheet, STATISTICS_COLUMNS);
  for (const statistics of content.metricStatistics) {
    statisticsSheet.addRow([
      statistics.tableName,
      statistics.metricName,
      statistics.observationCount,
      statistics.missingCount,
      statistics.sum,
      statistics.mean,
      statistics.min,
      statistics.max,
    ]);
  }

  const longSheet = workbook.addWorksheet(PREPARED_SHEETS.consolidatedLong);
  addHeaderRow(longSheet, LONG_COLUMNS);
  for (const observation of content.observations) {
    longSheet.addRow([
      observation.tableName,
      observation.metricName,
      observation.period.year,
      observation.period.label,
      observation.period.month,
      observation.period.date,
      observation.value,
    ]);
  }

  return workbook;
}

/**
 * Writes the prepared workbook through a temporary sibling file, so a failed
 * write leaves any previous output untouched.
 */
export async function writePreparedWorkbook(
  filePath: string,
  content: PreparedWorkbookContent,
): Promise<Result<void, AppError>> {
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    await buildWorkbook(content).xlsx.writeFile(tempPath);
    fs.renameSync(tempPath, filePath);
    return ok(undefined);
  } catch (cause) {
    fs.rmSync(tempPath, { force: true });
    return err(
      AppError.fromCause('ETL_OUTPUT_WRITE_FAILED', 'Prepared workbook could not be written.', cause, { filePath }),
    );
  }
}
