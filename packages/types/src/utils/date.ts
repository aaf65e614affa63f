import dayjs from 'dayjs';
import { CANONICAL_DATE_FORMAT } from './constants.js';
import { fellBack, normalized, type Normalized } from './normalized.js';
import { getLogger } from '../logger.js';

type FieldOrder = 'DMY' | 'YMD' | 'MDY';

export interface DateFormat {
  label: string;
  pattern: RegExp;
  order: FieldOrder;
}

export interface DateOptions {
  /** Reference instant for "today"; defaults to the system clock. */
  now?: Date;
}

/**
 * Accepted date layouts in priority order. Day-first layouts come before
 * MM/DD/YYYY, so an ambiguous `03/04/2024` reads as 3 April.
 */
export const DATE_FORMATS: readonly DateFormat[] = [
  { label: 'DD/MM/YYYY', pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'DMY' },
  { label: 'DD/MM/YY', pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/, order: 'DMY' },
  { label: 'DD-MM-YYYY', pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: 'DMY' },
  { label: 'DD-MM-YY', pattern: /^(\d{1,2})-(\d{1,2})-(\d{2})$/, order: 'DMY' },
  { label: 'YYYY-MM-DD', pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: 'YMD' },
  { label: 'YYYY-MM-DDTHH:mm', pattern: /^(\d{4})-(\d{2})-(\d{2})T\d{2}:\d{2}/, order: 'YMD' },
  { label: 'YYYY/MM/DD', pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: 'YMD' },
  { label: 'DD.MM.YYYY', pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/, order: 'DMY' },
  { label: 'DD.MM.YY', pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{2})$/, order: 'DMY' },
  { label: 'DD MM YYYY', pattern: /^(\d{1,2})\s+(\d{1,2})\s+(\d{4})$/, order: 'DMY' },
  { label: 'MM/DD/YYYY', pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'MDY' },
  { label: 'YYYYMMDD', pattern: /^(\d{4})(\d{2})(\d{2})$/, order: 'YMD' },
];

/** `00`-`30` map to 2000-2030, `31`-`99` to 1931-1999. */
export function expandTwoDigitYear(year: number): number {
  return year <= 30 ? 2000 + year : 1900 + year;
}

function toYear(digits: string): number {
  const year = Number(digits);
  return digits.length === 2 ? expandTwoDigitYear(year) : year;
}

/** Builds a local date, or null when the parts are not a real calendar day. */
export function calendarDate(year: number, month: number, day: number): dayjs.Dayjs | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const candidate = dayjs(new Date(year, month - 1, day));
  if (candidate.year() !== year || candidate.month() !== month - 1 || candidate.date() !== day) {
    return null;
  }
  return candidate;
}

export function parseWithFormat(input: string, format: DateFormat): dayjs.Dayjs | null {
  const match = format.pattern.exec(input);
  if (match === null) return null;

  const [, first, second, third] = match;
  if (first === undefined || second === undefined || third === undefined) return null;

  switch (format.order) {
    case 'DMY':
      return calendarDate(toYear(third), Number(second), Number(first));
    case 'MDY':
      return calendarDate(toYear(third), Number(first), Number(second));
    case 'YMD':
      return calendarDate(toYear(first), Number(second), Number(third));
  }
}

export function todayCanonical(now?: Date): string {
  return dayjs(now ?? new Date()).format(CANONICAL_DATE_FORMAT);
}

/**
 * Normalizes a date string to DD/MM/YYYY. Empty input means today; input
 * matching no layout also yields today, flagged as a fallback.
 */
export function normalizeDate(input?: string | null, options: DateOptions = {}): Normalized<string> {
  const trimmed = (input ?? '').trim();
  if (trimmed === '') {
    return normalized(todayCanonical(options.now));
  }

  for (const format of DATE_FORMATS) {
    const parsed = parseWithFormat(trimmed, format);
    if (parsed !== null) {
      return normalized(parsed.format(CANONICAL_DATE_FORMAT));
    }
  }

  const warning = `Unrecognized date "${trimmed}", using today`;
  getLogger().warn(warning);
  return fellBack(todayCanonical(options.now), warning);
}

export function isCanonicalDate(value: string): boolean {
  return parseCanonicalDate(value) !== null;
}

export function parseCanonicalDate(value: string): dayjs.Dayjs | null {
  const format = DATE_FORMATS[0];
  if (format === undefined || !/^\d{2}\/\d{2}\/\d{4}$/.test(value)) return null;
  return parseWithFormat(value, format);
}

/** Absolute number of calendar days between two dates. */
export function daysBetween(a: dayjs.Dayjs, b: dayjs.Dayjs): number {
  return Math.abs(a.startOf('day').diff(b.startOf('day'), 'day'));
}
