import { getLogger, normalizeDate, todayCanonical, type DateOptions } from '@fiscal-intake/types';

export const RECEIPT_DATE_PATTERNS: readonly RegExp[] = [
  /(?<!\d)(\d{2}[/.-]\d{2}[/.-]\d{4})(?!\d)/g,
  /(?<!\d)(\d{2}[/.-]\d{2}[/.-]\d{2})(?!\d)/g,
  /(?<!\d)(\d{4}[/.-]\d{2}[/.-]\d{2})(?!\d)/g,
];

export interface ReceiptDate {
  date: string;
  /** True when no date in the text could be read and today was used. */
  fallback: boolean;
}

export function extractReceiptDate(text: string, options: DateOptions = {}): ReceiptDate {
  for (const pattern of RECEIPT_DATE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const candidate = match[1];
      if (candidate === undefined) continue;
      const result = normalizeDate(candidate, options);
      if (!result.fallback) return { date: result.value, fallback: false };
    }
  }

  getLogger().debug('No date found in receipt text, using today');
  return { date: todayCanonical(options.now), fallback: true };
}
