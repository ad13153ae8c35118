export {
  MARKETING_TABLE_LAYOUTS,
  PERIOD_COLUMN_COUNT,
  SOURCE_SHEET_NAME,
  toCellReference,
  type TableLayout,
} from './table-layout.ts';

export {
  SPREADSHEET_ERROR_MARKERS,
  convertCellValue,
  isBlankCell,
  isErrorMarker,
  readCell,
  type RawCell,
  type SheetGrid,
} from './cell-values.ts';

export { loadSourceSheet, loadWorkbook, normalizeCellValue, worksheetToGrid } from './workbook-reader.ts';

export {
  extractTable,
  type ExtractTableOptions,
  type WideTable,
  type WideTableRow,
} from './table-extractor.ts';

export { concatLongTables, countMissing, toLongFormat } from './long-format.ts';

export { computeMetricStatistics, summarizeTable } from './summary-statistics.ts';

export {
  LONG_COLUMNS,
  PREPARED_SHEETS,
  PREPARED_WORKBOOK_DATE,
  STATISTICS_COLUMNS,
  SUMMARY_COLUMNS,
  writePreparedWorkbook,
  type PreparedWorkbookContent,
} from './workbook-writer.ts';

export {
  DEFAULT_SOURCE_FIXTURE_PATH,
  SourceFixtureSchema,
  fixtureCellValue,
  loadSourceFixtureFromFile,
  writeSampleSourceWorkbook,
  type SourceFixture,
  type SourceFixtureMetric,
} from './source-fixture.ts';

export { runMarketingEtl, type EtlRunResult, type RunMarketingEtlInput } from './pipeline-runner.ts';
