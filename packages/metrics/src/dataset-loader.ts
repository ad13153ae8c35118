import fs from 'node:fs';
import path from 'node:path';
import {
  LONG_COLUMNS,
  PREPARED_SHEETS,
  SUMMARY_COLUMNS,
  loadWorkbook,
  worksheetToGrid,
  type RawCell,
  type SheetGrid,
} from '@kpi-board/data-pipeline';
import {
  AppError,
  MetricObservationSchema,
  TableSummarySchema,
  err,
  ok,
  type MetricObservation,
  type PreparedDatasetDTO,
  type Result,
  type TableSummary,
} from '@kpi-board/shared';
import type ExcelJS from 'exceljs';
import type { z } from 'zod/v4';

export interface LoadPreparedDatasetOptions {
  now?: () => Date;
}

type RowReader = (row: readonly RawCell[], column: string) => RawCell;

function createDatasetError(message: string, context: Record<string, unknown>): AppError {
  return AppError.create('DASHBOARD_DATASET_INVALID', message, 'error', context);
}

function readSheetGrid(workbook: ExcelJS.Workbook, sheetName: string, filePath: string): Result<SheetGrid, AppError> {
  const worksheet = workbook.getWorksheet(sheetName);
  if (!worksheet) {
    return err(createDatasetError(`Sheet "${sheetName}" missing from prepared workbook.`, { filePath, sheetName }));
  }
  return ok(worksheetToGrid(worksheet));
}

/** Column lookup by header name, so column order in the sheet does not matter. */
function createRowReader(
  header: readonly RawCell[] | undefined,
  required: readonly string[],
  sheetName: string,
): Result<RowReader, AppError> {
  const positions = new Map<string, number>();
  (header ?? []).forEach((label, index) => {
    if (typeof label === 'string') {
      positions.set(label.trim(), index);
    }
  });

  const missing = required.filter((column) => !positions.has(column));
  if (missing.length > 0) {
    return err(createDatasetError(`Sheet "${sheetName}" lacks required columns.`, { sheetName, missing }));
  }
  return ok((row, column) => row[positions.get(column) ?? -1] ?? null);
}

function parseSheetRows<T>(
  grid: SheetGrid,
  sheetName: string,
  required: readonly string[],
  toCandidate: (read: (column: string) => RawCell) => unknown,
  schema: z.ZodType<T>,
): Result<T[], AppError> {
  const readerResult = createRowReader(grid[0], required, sheetName);
  if (!readerResult.ok) {
    return readerResult;
  }
  const readColumn = readerResult.value;

  const rows: T[] = [];
  for (let rowIndex = 1; rowIndex < grid.length; rowIndex += 1) {
    const row = grid[rowIndex] ?? [];
    if (row.every((value) => value === null)) {
      continue;
    }
    const parsed = schema.safeParse(toCandidate((column) => readColumn(row, column)));
    if (!parsed.success) {
      return err(
        createDatasetError(`Row ${rowIndex + 1} of "${sheetName}" is invalid.`, {
          sheetName,
          rowNumber: rowIndex + 1,
          issues: parsed.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`),
        }),
      );
    }
    rows.push(parsed.data);
  }
  return ok(rows);
}

function toObservationCandidate(read: (column: string) => RawCell): unknown {
  return {
    tableName: read('Table'),
    metricName: read('Metric'),
    period: {
      year: read('Year'),
      month: read('MonthNumber'),
      label: read('Month'),
      date: read('Date'),
    },
    value: read('Value'),
  };
}

function toSummaryCandidate(read: (column: string) => RawCell): unknown {
  return {
    tableName: read('Table'),
    metricCount: read('Metrics'),
    periodCount: read('Periods'),
    totalCells: read('TotalCells'),
    filledCells: read('FilledCells'),
    emptyCells: read('EmptyCells'),
    completenessPct: read('CompletenessPct'),
  };
}

/**
 * Reads the long table and table summaries back from a prepared workbook.
 */
export async function loadPreparedDataset(
  filePath: string,
  options: LoadPreparedDatasetOptions = {},
): Promise<Result<PreparedDatasetDTO, AppError>> {
  if (!fs.existsSync(filePath)) {
    return err(
      AppError.create('DASHBOARD_DATASET_NOT_FOUND', `Prepared workbook not found: ${path.basename(filePath)}`, 'error', {
        filePath,
        hint: 'Run "npm run etl" to generate it first.',
      }),
    );
  }

  const workbookResult = await loadWorkbook(filePath, 'DASHBOARD_DATASET_NOT_FOUND', 'DASHBOARD_DATASET_INVALID');
  if (!workbookResult.ok) {
    return workbookResult;
  }

  const longGrid = readSheetGrid(workbookResult.value, PREPARED_SHEETS.consolidatedLong, filePath);
  if (!longGrid.ok) {
    return longGrid;
  }
  const summaryGrid = readSheetGrid(workbookResult.value, PREPARED_SHEETS.tableSummary, filePath);
  if (!summaryGrid.ok) {
    return summaryGrid;
  }

  const observations = parseSheetRows<MetricObservation>(
    longGrid.value,
    PREPARED_SHEETS.consolidatedLong,
    LONG_COLUMNS,
    toObservationCandidate,
    MetricObservationSchema,
  );
  if (!observations.ok) {
    return observations;
  }
  const tableSummaries = parseSheetRows<TableSummary>(
    summaryGrid.value,
    PREPARED_SHEETS.tableSummary,
    SUMMARY_COLUMNS,
    toSummaryCandidate,
    TableSummarySchema,
  );
  if (!tableSummaries.ok) {
    return tableSummaries;
  }

  const now = options.now ?? (() => new Date());
  return ok({
    sourceFile: path.basename(filePath),
    loadedAt: now().toISOString(),
    observations: observations.value,
    tableSummaries: tableSummaries.value,
  });
}
