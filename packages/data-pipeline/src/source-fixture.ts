import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { AppError, MONTH_NAMES, err, ok, type Result } from '@kpi-board/shared';
import ExcelJS from 'exceljs';
import { z } from 'zod/v4';
import { PREPARED_WORKBOOK_DATE } from './workbook-writer.ts';

export const DEFAULT_SOURCE_FIXTURE_PATH = fileURLToPath(
  new URL('../../../fixtures/marketing-source.json', import.meta.url),
);

const EXCEL_ERROR_CODES = ['#N/A', '#REF!', '#NAME?', '#DIV/0!', '#NULL!', '#VALUE!', '#NUM!'] as const;

export const SourceFixtureMetricSchema = z.object({
  name: z.string().min(1),
  base: z.number(),
  step: z.number(),
  format: z.enum(['number', 'currency', 'percent']).default('number'),
  /** Month number (as a string key) to the error marker written instead of a value. */
  errors: z.record(z.string(), z.string().startsWith('#')).default({}),
});

export const SourceFixtureTableSchema = z.object({
  tableName: z.string().min(1),
  title: z.string().min(1),
  startRow: z.number().int().nonnegative(),
  metrics: z.array(SourceFixtureMetricSchema).min(1),
});

export const SourceFixtureSchema = z.object({
  sheetName: z.string().min(1),
  title: z.string(),
  filledMonths: z.number().int().min(0).max(12),
  tables: z.array(SourceFixtureTableSchema).min(1),
});

export type SourceFixture = z.infer<typeof SourceFixtureSchema>;
export type SourceFixtureMetric = z.infer<typeof SourceFixtureMetricSchema>;

export function loadSourceFixtureFromFile(
  filePath: string = DEFAULT_SOURCE_FIXTURE_PATH,
): Result<SourceFixture, AppError> {
  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (cause) {
    return err(AppError.fromCause('ETL_FIXTURE_LOAD_FAILED', 'Source fixture could not be read.', cause, { filePath }));
  }

  const parsedFixture = SourceFixtureSchema.safeParse(parsedJson);
  if (!parsedFixture.success) {
    return err(
      AppError.create('ETL_FIXTURE_INVALID', 'Source fixture has an invalid format.', 'error', {
        filePath,
        issues: parsedFixture.error.issues.map((issue) => issue.message),
      }),
    );
  }
  return ok(parsedFixture.data);
}

/** Value the fixture places in a month column, or null for a blank cell. */
export function fixtureCellValue(metric: SourceFixtureMetric, month: number, filledMonths: number): ExcelJS.CellValue {
  if (month > filledMonths) {
    return null;
  }

  const marker = metric.errors[String(month)];
  if (marker !== undefined) {
    const excelCode = EXCEL_ERROR_CODES.find((code) => code === marker);
    return excelCode === undefined ? marker : { error: excelCode };
  }

  const value = Math.round((metric.base + metric.step * (month - 1)) * 100) / 100;
  switch (metric.format) {
    case 'currency':
      return `R$ ${value.toFixed(2)}`;
    case 'percent':
      return `${value}%`;
    default:
      return value;
  }
}

function buildSourceWorkbook(fixture: SourceFixture): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = PREPARED_WORKBOOK_DATE;
  workbook.modified = PREPARED_WORKBOOK_DATE;
  const worksheet = workbook.addWorksheet(fixture.sheetName);

  // exceljs rows and columns are 1-based; layouts are 0-based.
  worksheet.getCell(1, 1).value = fixture.title;
  for (const table of fixture.tables) {
    if (table.startRow > 0) {
      worksheet.getCell(table.startRow, 1).value = table.title;
    }
    const headerRow = worksheet.getRow(table.startRow + 1);
    headerRow.getCell(1).value = 'Indicador';
    MONTH_NAMES.forEach((name, index) => {
      headerRow.getCell(index + 2).value = name;
    });

    table.metrics.forEach((metric, metricIndex) => {
      const row = worksheet.getRow(table.startRow + metricIndex + 2);
      row.getCell(1).value = metric.name;
      for (let month = 1; month <= MONTH_NAMES.length; month += 1) {
        row.getCell(month + 1).value = fixtureCellValue(metric, month, fixture.filledMonths);
      }
    });
  }
  return workbook;
}

export async function writeSampleSourceWorkbook(
  filePath: string,
  fixture?: SourceFixture,
): Promise<Result<void, AppError>> {
  let resolvedFixture = fixture;
  if (resolvedFixture === undefined) {
    const fixtureResult = loadSourceFixtureFromFile();
    if (!fixtureResult.ok) {
      return fixtureResult;
    }
    resolvedFixture = fixtureResult.value;
  }

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    await buildSourceWorkbook(resolvedFixture).xlsx.writeFile(filePath);
    return ok(undefined);
  } catch (cause) {
    return err(AppError.fromCause('ETL_FIXTURE_WRITE_FAILED', 'Sample workbook could not be written.', cause, { filePath }));
  }
}
