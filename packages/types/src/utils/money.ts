import { fellBack, normalized, type Normalized } from './normalized.js';
import { getLogger } from '../logger.js';

const CURRENCY_MARKERS = /R\$|US\$|BRL|USD|\$/gi;

function count(text: string, char: string): number {
  return text.split(char).length - 1;
}

/**
 * Resolves the decimal separator of a digits-and-separators string.
 *
 * Both `,` and `.` present: the last one is decimal. Commas only: decimal
 * when there is exactly one followed by exactly two digits, otherwise
 * thousands. Dots only: one dot is decimal, several are thousands.
 */
export function toDecimalString(amount: string): string | null {
  if (!/^[\d.,]+$/.test(amount)) return null;

  const lastComma = amount.lastIndexOf(',');
  const lastDot = amount.lastIndexOf('.');
  let result: string;

  if (lastComma >= 0 && lastDot >= 0) {
    result =
      lastComma > lastDot
        ? amount.replace(/\./g, '').replace(',', '.')
        : amount.replace(/,/g, '');
  } else if (lastComma >= 0) {
    result =
      count(amount, ',') === 1 && /,\d{2}$/.test(amount)
        ? amount.replace(',', '.')
        : amount.replace(/,/g, '');
  } else if (lastDot >= 0) {
    result = count(amount, '.') === 1 ? amount : amount.replace(/\./g, '');
  } else {
    result = amount;
  }

  return /^(\d+(\.\d*)?|\.\d+)$/.test(result) ? result : null;
}

/**
 * Parses a monetary amount written in Brazilian or US notation, with or
 * without a currency marker. Never throws: unparseable, empty or negative
 * input yields 0 flagged as a fallback.
 */
export function normalizeValue(input: string | number | null | undefined): Normalized<number> {
  if (typeof input === 'number') {
    if (Number.isFinite(input) && input >= 0) return normalized(input);
    return warnFallback(`Invalid amount ${input}, using 0`);
  }

  const raw = (input ?? '').trim();
  if (raw === '') {
    return warnFallback('Empty amount, using 0');
  }

  const decimal = toDecimalString(raw.replace(CURRENCY_MARKERS, '').replace(/\s+/g, ''));
  if (decimal === null) {
    return warnFallback(`Unparseable amount "${raw}", using 0`);
  }
  return normalized(Number(decimal));
}

function warnFallback(warning: string): Normalized<number> {
  getLogger().warn(warning);
  return fellBack(0, warning);
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

export function sumAmounts(amounts: number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}

function formatGrouped(amount: number, thousands: string, decimal: string): string {
  const [integer = '0', fraction = '00'] = Math.abs(amount).toFixed(2).split('.');
  const grouped = integer.replace(/\B(?=(\d{3})+(?!\d))/g, thousands);
  return `${amount < 0 ? '-' : ''}${grouped}${decimal}${fraction}`;
}

/** `1234.5` → `1.234,50` */
export function formatBrazilianAmount(amount: number): string {
  return formatGrouped(amount, '.', ',');
}

/** `1234.5` → `1,234.50` */
export function formatUsAmount(amount: number): string {
  return formatGrouped(amount, ',', '.');
}

export function formatCurrency(amount: number): string {
  const formatted = `R$ ${formatBrazilianAmount(Math.abs(amount))}`;
  return amount < 0 ? `-${formatted}` : formatted;
}
