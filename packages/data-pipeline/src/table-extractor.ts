import { AppError, createPeriod, err, ok, parseMonthLabel, type Period, type Result } from '@kpi-board/shared';
import { convertCellValue, isBlankCell, readCell, type SheetGrid } from './cell-values.ts';
import { PERIOD_COLUMN_COUNT, toCellReference, type TableLayout } from './table-layout.ts';

export interface WideTableRow {
  metricName: string;
  /** `values[i]` belongs to `periods[i]`; `null` marks a missing value. */
  values: (number | null)[];
  /** 0-indexed sheet row the metric was read from. */
  sourceRow: number;
}

export interface WideTable {
  tableName: string;
  title: string;
  periods: Period[];
  rows: WideTableRow[];
}

export interface ExtractTableOptions {
  reportYear: number;
}

interface PeriodColumn {
  column: number;
  month: number;
}

interface HeaderScan {
  columns: PeriodColumn[];
  hasHeaderRow: boolean;
}

function createLayoutError(layout: TableLayout, message: string, context: Record<string, unknown> = {}): AppError {
  return AppError.fatal('ETL_LAYOUT_INVALID', `${layout.tableName}: ${message}`, {
    tableName: layout.tableName,
    startRow: layout.startRow,
    endRow: layout.endRow,
    ...context,
  });
}

function defaultPeriodColumns(layout: TableLayout): PeriodColumn[] {
  return Array.from({ length: PERIOD_COLUMN_COUNT }, (_, index) => ({
    column: layout.firstPeriodColumn + index,
    month: index + 1,
  }));
}

function scanHeader(grid: SheetGrid, layout: TableLayout): Result<HeaderScan, AppError> {
  const firstLabel = readCell(grid, layout.startRow, layout.firstPeriodColumn);
  if (parseMonthLabel(firstLabel) === null) {
    if (layout.headerRow) {
      const cell = toCellReference(layout.startRow, layout.firstPeriodColumn);
      return err(createLayoutError(layout, `expected a month header at ${cell}.`, { cell, label: String(firstLabel) }));
    }
    return ok({ columns: defaultPeriodColumns(layout), hasHeaderRow: false });
  }

  const columns: PeriodColumn[] = [];
  for (let index = 0; index < PERIOD_COLUMN_COUNT; index += 1) {
    const column = layout.firstPeriodColumn + index;
    const label = readCell(grid, layout.startRow, column);
    if (isBlankCell(label)) {
      continue;
    }

    const month = parseMonthLabel(label);
    const cell = toCellReference(layout.startRow, column);
    if (month === null) {
      return err(createLayoutError(layout, `header ${cell} is not a month name.`, { cell, label: String(label) }));
    }
    const previous = columns.at(-1);
    if (previous && month <= previous.month) {
      return err(createLayoutError(layout, `header ${cell} breaks month order.`, { cell, label: String(label) }));
    }
    columns.push({ column, month });
  }

  return ok({ columns, hasHeaderRow: true });
}

/**
 * Reads one fixed-range table from the sheet grid into wide form. Only
 * periods with at least one non-blank cell among the kept rows survive.
 */
export function extractTable(
  grid: SheetGrid,
  layout: TableLayout,
  options: ExtractTableOptions,
): Result<WideTable, AppError> {
  if (layout.startRow >= grid.length || layout.endRow <= layout.startRow) {
    return err(createLayoutError(layout, 'row range lies outside the sheet.', { sheetRows: grid.length }));
  }

  const headerResult = scanHeader(grid, layout);
  if (!headerResult.ok) {
    return headerResult;
  }
  const { columns, hasHeaderRow } = headerResult.value;

  const keptRows: { metricName: string; sourceRow: number }[] = [];
  const seenMetrics = new Set<string>();
  const presentColumns = new Set<number>();
  const firstDataRow = hasHeaderRow ? layout.startRow + 1 : layout.startRow;

  for (let row = firstDataRow; row < layout.endRow; row += 1) {
    if (parseMonthLabel(readCell(grid, row, layout.firstPeriodColumn)) !== null) {
      const cell = toCellReference(row, layout.firstPeriodColumn);
      return err(createLayoutError(layout, `unexpected header row at ${cell}.`, { cell }));
    }

    const metricCell = readCell(grid, row, layout.metricColumn);
    if (isBlankCell(metricCell)) {
      continue;
    }
    const nonBlankColumns = columns.filter(({ column }) => !isBlankCell(readCell(grid, row, column)));
    if (nonBlankColumns.length === 0) {
      continue;
    }

    const cell = toCellReference(row, layout.metricColumn);
    if (typeof metricCell !== 'string') {
      return err(createLayoutError(layout, `metric name at ${cell} is not text.`, { cell, value: String(metricCell) }));
    }
    const metricName = metricCell.trim();
    if (seenMetrics.has(metricName)) {
      return err(createLayoutError(layout, `metric "${metricName}" appears twice.`, { cell, metricName }));
    }

    seenMetrics.add(metricName);
    for (const { column } of nonBlankColumns) {
      presentColumns.add(column);
    }
    keptRows.push({ metricName, sourceRow: row });
  }

  if (keptRows.length === 0) {
    return err(createLayoutError(layout, 'no metric rows found.'));
  }

  const presentPeriodColumns = columns.filter(({ column }) => presentColumns.has(column));
  return ok({
    tableName: layout.tableName,
    title: layout.title,
    periods: presentPeriodColumns.map(({ month }) => createPeriod(options.reportYear, month)),
    rows: keptRows.map(({ metricName, sourceRow }) => ({
      metricName,
      sourceRow,
      values: presentPeriodColumns.map(({ column }) => convertCellValue(readCell(grid, sourceRow, column))),
    })),
  });
}
