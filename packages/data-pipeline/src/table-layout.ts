import type { TableName } from '@kpi-board/shared';

/** Worksheet in the KPI workbook that holds the six marketing tables. */
export const SOURCE_SHEET_NAME = 'Marketing';

/** Each table carries one column per month, starting at `firstPeriodColumn`. */
export const PERIOD_COLUMN_COUNT = 12;

/**
 * Fixed position of one table inside the source sheet. Rows and columns are
 * 0-indexed; `endRow` is exclusive.
 */
export interface TableLayout {
  tableName: TableName;
  title: string;
  startRow: number;
  endRow: number;
  metricColumn: number;
  firstPeriodColumn: number;
  /** When true, `startRow` must hold the month header; anything else means the table has moved. */
  headerRow: boolean;
}

function layout(tableName: TableName, title: string, startRow: number, endRow: number): TableLayout {
  return { tableName, title, startRow, endRow, metricColumn: 0, firstPeriodColumn: 1, headerRow: true };
}

export const MARKETING_TABLE_LAYOUTS: readonly TableLayout[] = [
  layout('Marketing_Geral', 'General marketing', 3, 10),
  layout('Leads_Condominios', 'Condominium leads', 11, 30),
  layout('Indices_Condominios', 'Condominium indices', 32, 40),
  layout('Campanha_Imoveis', 'Real estate campaign', 42, 52),
  layout('Campanha_Boleto_Digital', 'Digital billing campaign', 53, 59),
  layout('Campanha_Multiseguros', 'Insurance campaign', 60, 70),
];

/** 1-based A1 reference of a 0-indexed cell, for error messages. */
export function toCellReference(row: number, column: number): string {
  let letters = '';
  let remaining = column + 1;
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return `${letters}${row + 1}`;
}
