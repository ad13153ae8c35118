import { collectResults, createLogger, type AppError, type Logger, type Result, type TableSummary, err, ok } from '@kpi-board/shared';
import type { SheetGrid } from './cell-values.ts';
import { concatLongTables, countMissing } from './long-format.ts';
import { computeMetricStatistics, summarizeTable } from './summary-statistics.ts';
import { extractTable, type WideTable } from './table-extractor.ts';
import { MARKETING_TABLE_LAYOUTS, SOURCE_SHEET_NAME, type TableLayout } from './table-layout.ts';
import { loadSourceSheet } from './workbook-reader.ts';
import { writePreparedWorkbook } from './workbook-writer.ts';

export interface RunMarketingEtlInput {
  sourcePath: string;
  outputPath: string;
  reportYear: number;
  logger?: Logger;
  sheetName?: string;
  layouts?: readonly TableLayout[];
}

export interface EtlRunResult {
  sourcePath: string;
  outputPath: string;
  tableSummaries: TableSummary[];
  longRowCount: number;
  missingCount: number;
}

function* extractEachTable(
  grid: SheetGrid,
  layouts: readonly TableLayout[],
  reportYear: number,
  logger: Logger,
): Generator<Result<WideTable, AppError>> {
  for (const layout of layouts) {
    const tableResult = extractTable(grid, layout, { reportYear });
    if (tableResult.ok) {
      logger.info('Table extracted.', {
        tableName: layout.tableName,
        metrics: tableResult.value.rows.length,
        periods: tableResult.value.periods.length,
      });
    }
    yield tableResult;
  }
}

/**
 * Source sheet to prepared workbook. Every table is extracted before anything
 * is written, so a layout failure leaves no output behind.
 */
export async function runMarketingEtl(input: RunMarketingEtlInput): Promise<Result<EtlRunResult, AppError>> {
  const logger = (input.logger ?? createLogger()).withContext({ module: 'marketing-etl' });
  const sheetName = input.sheetName ?? SOURCE_SHEET_NAME;
  const layouts = input.layouts ?? MARKETING_TABLE_LAYOUTS;

  logger.info('Loading source sheet.', { sourcePath: input.sourcePath, sheetName });
  const gridResult = await loadSourceSheet(input.sourcePath, sheetName);
  if (!gridResult.ok) {
    logger.fatal('Source sheet could not be loaded.', { error: gridResult.error.toDTO() });
    return err(gridResult.error);
  }

  // collectResults stops pulling at the first failed table.
  const tablesResult = collectResults(extractEachTable(gridResult.value, layouts, input.reportYear, logger));
  if (!tablesResult.ok) {
    logger.fatal('Table extraction failed.', { error: tablesResult.error.toDTO() });
    return err(tablesResult.error);
  }

  const tables = tablesResult.value;
  const observations = concatLongTables(tables);
  const tableSummaries = tables.map((table) => summarizeTable(table));
  const missingCount = countMissing(observations);
  logger.info('Long table built.', { rows: observations.length, missing: missingCount });

  const writeResult = await writePreparedWorkbook(input.outputPath, {
    tables,
    observations,
    tableSummaries,
    metricStatistics: computeMetricStatistics(observations),
  });
  if (!writeResult.ok) {
    logger.fatal('Prepared workbook could not be written.', { error: writeResult.error.toDTO() });
    return err(writeResult.error);
  }

  logger.info('Prepared workbook written.', { outputPath: input.outputPath });
  return ok({
    sourcePath: input.sourcePath,
    outputPath: input.outputPath,
    tableSummaries,
    longRowCount: observations.length,
    missingCount,
  });
}
