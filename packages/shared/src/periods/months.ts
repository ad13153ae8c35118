export const MONTH_NAMES = [
  'Janeiro',
  'Fevereiro',
  'Março',
  'Abril',
  'Maio',
  'Junho',
  'Julho',
  'Agosto',
  'Setembro',
  'Outubro',
  'Novembro',
  'Dezembro',
] as const;

export type MonthName = (typeof MONTH_NAMES)[number];

export interface Period {
  year: number;
  /** 1-12 */
  month: number;
  label: string;
  /** yyyy-mm-01 */
  date: string;
}

const ABBREVIATIONS = ['jan', 'fev', 'mar', 'abr', 'mai', 'jun', 'jul', 'ago', 'set', 'out', 'nov', 'dez'];

function foldMonthKey(label: string): string {
  return label
    .trim()
    .toLowerCase()
    // Latin-1 workbooks decoded as UTF-8 turn "ç" into U+FFFD.
    .replace(/\uFFFD/g, 'c')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/\.$/, '');
}

const MONTH_BY_KEY: ReadonlyMap<string, number> = new Map([
  ...MONTH_NAMES.map((name, index): [string, number] => [foldMonthKey(name), index + 1]),
  ...ABBREVIATIONS.map((abbreviation, index): [string, number] => [abbreviation, index + 1]),
]);

/**
 * Month number for a Portuguese month header ("Março", "marco", "Mar"), or null.
 */
export function parseMonthLabel(label: unknown): number | null {
  if (typeof label !== 'string') {
    return null;
  }
  return MONTH_BY_KEY.get(foldMonthKey(label)) ?? null;
}

export function monthName(month: number): MonthName {
  const name = MONTH_NAMES[month - 1];
  if (name === undefined) {
    throw new RangeError(`Month out of range: ${month}`);
  }
  return name;
}

export function createPeriod(year: number, month: number, label?: string): Period {
  return {
    year,
    month,
    label: label ?? monthName(month),
    date: `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-01`,
  };
}

export function comparePeriods(a: Pick<Period, 'year' | 'month'>, b: Pick<Period, 'year' | 'month'>): number {
  return a.year - b.year || a.month - b.month;
}

export function formatPeriodRange(first: Period, last: Period): string {
  if (first.year === last.year) {
    return first.month === last.month
      ? `${monthName(first.month)} ${first.year}`
      : `${monthName(first.month)} - ${monthName(last.month)} ${first.year}`;
  }
  return `${monthName(first.month)} ${first.year} - ${monthName(last.month)} ${last.year}`;
}
