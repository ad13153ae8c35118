import type { ValueFormat } from '@kpi-board/metrics';

export const MISSING_LABEL = 'N/A';

const LOCALE = 'pt-BR';

function formatNumber(value: number, fractionDigits: number): string {
  return new Intl.NumberFormat(LOCALE, {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  }).format(value);
}

export function formatValue(value: number | string | null, format: ValueFormat): string {
  if (value === null) {
    return MISSING_LABEL;
  }
  if (typeof value === 'string') {
    return value;
  }

  switch (format) {
    case 'currency':
      return `R$ ${formatNumber(value, 2)}`;
    case 'currencyRounded':
      return `R$ ${formatNumber(value, 0)}`;
    case 'integer':
      return formatNumber(value, 0);
    case 'decimal':
      return formatNumber(value, 2);
    case 'percent':
      return `${formatNumber(value, 2)}%`;
    case 'ratio':
      return `${formatNumber(value, 2)}x`;
    case 'text':
      return String(value);
  }
}

/** Short axis labels: 1,5 mi / 12 mil. */
export function formatAxisValue(value: number, format: ValueFormat): string {
  const magnitude = Math.abs(value);
  const prefix = format === 'currency' || format === 'currencyRounded' ? 'R$ ' : '';
  if (magnitude >= 1_000_000) {
    return `${prefix}${formatNumber(value / 1_000_000, 1)} mi`;
  }
  if (magnitude >= 10_000) {
    return `${prefix}${formatNumber(value / 1_000, 0)} mil`;
  }
  if (format === 'percent') {
    return `${formatNumber(value, 0)}%`;
  }
  if (format === 'ratio') {
    return `${formatNumber(value, 1)}x`;
  }
  return `${prefix}${formatNumber(value, 0)}`;
}

export function formatCompleteness(value: number | null): string {
  return value === null ? MISSING_LABEL : `${formatNumber(value, 1)}%`;
}
