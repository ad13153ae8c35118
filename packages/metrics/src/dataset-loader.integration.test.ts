import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runMarketingEtl, writeSampleSourceWorkbook } from '@kpi-board/data-pipeline';
import { createLogger } from '@kpi-board/shared';
import ExcelJS from 'exceljs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildDashboardPages } from './dashboard-pages.ts';
import { loadPreparedDataset } from './dataset-loader.ts';
import { createMetricQueries } from './metric-queries.ts';
import { seriesMean } from './series-stats.ts';

const LOADED_AT = new Date('2026-01-01T00:00:00.000Z');

let workDir = '';

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kpi-dataset-'));
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

async function writeWorkbook(fileName: string, sheets: Record<string, unknown[][]>): Promise<string> {
  const workbook = new ExcelJS.Workbook();
  for (const [name, rows] of Object.entries(sheets)) {
    const worksheet = workbook.addWorksheet(name);
    for (const row of rows) {
      worksheet.addRow(row);
    }
  }
  const filePath = path.join(workDir, fileName);
  await workbook.xlsx.writeFile(filePath);
  return filePath;
}

const SUMMARY_SHEET = [
  ['Table', 'Metrics', 'Periods', 'TotalCells', 'FilledCells', 'EmptyCells', 'CompletenessPct'],
  ['Indices_Condominios', 1, 1, 1, 1, 0, 100],
];

describe('loadPreparedDataset', () => {
  it('reads back what the ETL wrote', async () => {
    const sourcePath = path.join(workDir, 'source.xlsx');
    const outputPath = path.join(workDir, 'prepared.xlsx');
    expect((await writeSampleSourceWorkbook(sourcePath)).ok).toBe(true);
    const etlResult = await runMarketingEtl({
      sourcePath,
      outputPath,
      reportYear: 2025,
      logger: createLogger({ writer: () => undefined }),
    });
    expect(etlResult.ok).toBe(true);

    const result = await loadPreparedDataset(outputPath, { now: () => LOADED_AT });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.sourceFile).toBe('prepared.xlsx');
    expect(result.value.loadedAt).toBe('2026-01-01T00:00:00.000Z');
    expect(result.value.observations).toHaveLength(530);
    expect(result.value.observations.filter((observation) => observation.value === null)).toHaveLength(5);
    expect(result.value.tableSummaries.map((summary) => summary.metricCount)).toEqual([6, 17, 7, 9, 5, 9]);

    const queries = createMetricQueries(result.value);
    const cac = queries.findSeries('Indices_Condominios', 'CAC');
    expect(cac?.points[2]).toEqual({
      period: { year: 2025, month: 3, label: 'Março', date: '2025-03-01' },
      value: null,
    });
    expect(cac ? seriesMean(cac) : null).toBeCloseTo(25.22, 2);

    const leadPage = buildDashboardPages(result.value).find((page) => page.id === 'lead-analytics');
    const conversion = leadPage?.tabs[0]?.sections.find((section) => section.id === 'conversion-rate');
    expect(conversion?.kind === 'chart' ? conversion.categories : []).toEqual([
      'Mala Direta',
      'Ads',
      'Capt. Receptiva',
      'Indicação',
      'Capt. Ativa',
      'Construtora',
      'Reativação',
    ]);
    expect(conversion?.kind === 'chart' ? conversion.series[0]?.values : []).toEqual([55.56, 43.33, 40, 36.36, 24, 11.76, null]);
  });

  it('fails with a hint when the prepared workbook is missing', async () => {
    const result = await loadPreparedDataset(path.join(workDir, 'missing.xlsx'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('DASHBOARD_DATASET_NOT_FOUND');
      expect(result.error.context.hint).toBe('Run "npm run etl" to generate it first.');
    }
  });

  it('fails when the long sheet is absent', async () => {
    const filePath = await writeWorkbook('partial.xlsx', { Table_Summary: SUMMARY_SHEET });

    const result = await loadPreparedDataset(filePath);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('DASHBOARD_DATASET_INVALID');
      expect(result.error.context.sheetName).toBe('Consolidated_Long');
    }
  });

  it('fails when a required column is missing', async () => {
    const filePath = await writeWorkbook('columns.xlsx', {
      Consolidated_Long: [['Table', 'Metric', 'Year', 'Month', 'MonthNumber', 'Date']],
      Table_Summary: SUMMARY_SHEET,
    });

    const result = await loadPreparedDataset(filePath);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.context.missing).toEqual(['Value']);
    }
  });

  it('fails on a row that does not validate', async () => {
    const filePath = await writeWorkbook('rows.xlsx', {
      Consolidated_Long: [
        ['Table', 'Metric', 'Year', 'Month', 'MonthNumber', 'Date', 'Value'],
        ['Indices_Condominios', 'CAC', 2025, 'Janeiro', 13, '2025-01-01', 30],
      ],
      Table_Summary: SUMMARY_SHEET,
    });

    const result = await loadPreparedDataset(filePath);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('DASHBOARD_DATASET_INVALID');
      expect(result.error.context.rowNumber).toBe(2);
    }
  });

  it('accepts columns in any order', async () => {
    const filePath = await writeWorkbook('reordered.xlsx', {
      Consolidated_Long: [
        ['Value', 'Date', 'MonthNumber', 'Month', 'Year', 'Metric', 'Table'],
        [30, '2025-01-01', 1, 'Janeiro', 2025, 'CAC', 'Indices_Condominios'],
      ],
      Table_Summary: SUMMARY_SHEET,
    });

    const result = await loadPreparedDataset(filePath, { now: () => LOADED_AT });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.observations).toEqual([
        {
          tableName: 'Indices_Condominios',
          metricName: 'CAC',
          period: { year: 2025, month: 1, label: 'Janeiro', date: '2025-01-01' },
          value: 30,
        },
      ]);
      expect(result.value.tableSummaries[0]?.completenessPct).toBe(100);
    }
  });
});
