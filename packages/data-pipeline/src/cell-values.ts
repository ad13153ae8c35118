/** Primitive value of one spreadsheet cell after workbook decoding. */
export type RawCell = string | number | boolean | Date | null;

/** 0-indexed rows of 0-indexed cells; rows may be shorter than the widest row. */
export type SheetGrid = readonly (readonly RawCell[])[];

export const SPREADSHEET_ERROR_MARKERS = [
  '#DIV/0!',
  '#VALOR!',
  '#VALUE!',
  '#REF!',
  '#N/A',
  '#NOME?',
  '#NAME?',
  '#NUM!',
  '#NULL!',
] as const;

const ERROR_MARKER_SET = new Set<string>(SPREADSHEET_ERROR_MARKERS);
const DECORATION_PATTERN = /R\$|%|,|\s/g;
const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function isBlankCell(raw: RawCell | undefined): boolean {
  if (raw === null || raw === undefined) {
    return true;
  }
  return typeof raw === 'string' && raw.trim().length === 0;
}

export function isErrorMarker(raw: RawCell | undefined): boolean {
  return typeof raw === 'string' && ERROR_MARKER_SET.has(raw.trim().toUpperCase());
}

/**
 * Cleans one cell into a number or the missing sentinel `null`.
 * Currency, percent and thousands decoration is stripped before parsing.
 */
export function convertCellValue(raw: RawCell | undefined): number | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw !== 'string' || isErrorMarker(raw)) {
    return null;
  }

  const stripped = raw.replace(DECORATION_PATTERN, '');
  if (!NUMERIC_PATTERN.test(stripped)) {
    return null;
  }
  const parsed = Number(stripped);
  return Number.isFinite(parsed) ? parsed : null;
}

export function readCell(grid: SheetGrid, row: number, column: number): RawCell {
  return grid[row]?.[column] ?? null;
}
