import fs from 'node:fs';
import { AppError, err, ok, type Result } from '@kpi-board/shared';
import ExcelJS from 'exceljs';
import type { RawCell, SheetGrid } from './cell-values.ts';

type FormulaResult = NonNullable<ExcelJS.CellFormulaValue['result']>;

function normalizeFormulaResult(result: FormulaResult | undefined): RawCell {
  if (result === undefined) {
    return null;
  }
  if (typeof result === 'object' && !(result instanceof Date)) {
    return result.error;
  }
  return result;
}

/** Flattens exceljs cell values: cached formula results, error codes, rich text. */
export function normalizeCellValue(value: ExcelJS.CellValue): RawCell {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  if ('error' in value) {
    return value.error;
  }
  if ('richText' in value) {
    return value.richText.map((run) => run.text).join('');
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return normalizeFormulaResult(value.result);
  }
  return typeof value.text === 'string' ? value.text : null;
}

export function worksheetToGrid(worksheet: ExcelJS.Worksheet): SheetGrid {
  const grid: RawCell[][] = [];
  const columnCount = worksheet.columnCount;
  for (let rowNumber = 1; rowNumber <= worksheet.rowCount; rowNumber += 1) {
    const row = worksheet.getRow(rowNumber);
    const cells: RawCell[] = [];
    for (let columnNumber = 1; columnNumber <= columnCount; columnNumber += 1) {
      cells.push(normalizeCellValue(row.getCell(columnNumber).value));
    }
    grid.push(cells);
  }
  return grid;
}

export async function loadWorkbook(
  filePath: string,
  notFoundCode = 'ETL_SOURCE_NOT_FOUND',
  unreadableCode = 'ETL_SOURCE_UNREADABLE',
): Promise<Result<ExcelJS.Workbook, AppError>> {
  if (!fs.existsSync(filePath)) {
    return err(AppError.fatal(notFoundCode, `Workbook not found: ${filePath}`, { filePath }));
  }

  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (cause) {
    return err(AppError.fromCause(unreadableCode, 'Workbook could not be read.', cause, { filePath }));
  }
  return ok(workbook);
}

export async function loadSourceSheet(filePath: string, sheetName: string): Promise<Result<SheetGrid, AppError>> {
  const workbookResult = await loadWorkbook(filePath);
  if (!workbookResult.ok) {
    return workbookResult;
  }

  const worksheet = workbookResult.value.getWorksheet(sheetName);
  if (!worksheet) {
    return err(
      AppError.fatal('ETL_SHEET_NOT_FOUND', `Sheet "${sheetName}" not found in workbook.`, {
        filePath,
        sheetName,
        availableSheets: workbookResult.value.worksheets.map((sheet) => sheet.name),
      }),
    );
  }

  return ok(worksheetToGrid(worksheet));
}
