import {
  DUPLICATE_DEFAULTS,
  INVOICE_SECTIONS,
  LEDGER_SECTIONS,
  daysBetween,
  normalizeDate,
  normalizeValue,
  parseCanonicalDate,
  roundToTwoDecimals,
  type LedgerCell,
  type LedgerSection,
} from '@fiscal-intake/types';
import { withLedger } from './guard.js';
import type { LedgerStore } from './ledger-store.js';

export interface InvoiceDuplicate {
  section: LedgerSection;
  /** Sheet row number; the header is row 1. */
  rowNumber: number;
  invoiceNumber: string;
  /** Date stored on the matching row, as written. */
  date: string;
}

export interface ExpenseCandidate {
  referenceToken: string;
  value: number;
  /** Any accepted date layout; normalized before comparison. */
  date: string;
}

export interface ExpenseDuplicateOptions {
  windowDays?: number;
  tolerancePercent?: number;
}

export interface ExpenseMatch {
  rowNumber: number;
  date: string;
  category: string;
  value: number;
  differencePercent: number;
}

export interface ExpenseDuplicateResult {
  duplicate: boolean;
  /** First matching row in ledger order. */
  match: ExpenseMatch | null;
  matchCount: number;
}

const DEFAULT_OPTIONS: Required<ExpenseDuplicateOptions> = {
  windowDays: DUPLICATE_DEFAULTS.WINDOW_DAYS,
  tolerancePercent: DUPLICATE_DEFAULTS.TOLERANCE_PERCENT,
};

function cellText(cell: LedgerCell | undefined): string {
  return cell === undefined ? '' : String(cell).trim();
}

function cellAmount(cell: LedgerCell | undefined): number | null {
  if (typeof cell === 'number') return cell;
  const { value, fallback } = normalizeValue(cellText(cell));
  return fallback ? null : value;
}

/**
 * Percent difference relative to the candidate. A zero candidate has no
 * meaningful ratio and never matches.
 */
export function differencePercent(candidate: number, existing: number): number | null {
  if (candidate <= 0) return null;
  return (Math.abs(candidate - existing) / candidate) * 100;
}

/**
 * Looks for the invoice number (column 2, compared as a trimmed string) in
 * the import, internal-transfer and customer-sale sections, in that order.
 */
export async function findInvoiceDuplicate(
  store: LedgerStore,
  invoiceNumber: string
): Promise<InvoiceDuplicate | null> {
  const candidate = invoiceNumber.trim();
  if (candidate === '') return null;

  for (const section of INVOICE_SECTIONS) {
    const rows = await withLedger(`read of ${section}`, () => store.readAllRows(section));
    if (rows === null) continue;

    for (const [index, row] of rows.entries()) {
      if (index === 0 || row.length < 2) continue;
      if (cellText(row[1]) === candidate) {
        return {
          section,
          rowNumber: index + 1,
          invoiceNumber: candidate,
          date: row.length > 2 ? cellText(row[2]) : 'N/A',
        };
      }
    }
  }
  return null;
}

/**
 * Finds expense rows with the same reference token, a date within the
 * window (inclusive) and a value within the tolerance. Advisory only.
 */
export async function findExpenseDuplicate(
  store: LedgerStore,
  candidate: ExpenseCandidate,
  options: ExpenseDuplicateOptions = {}
): Promise<ExpenseDuplicateResult> {
  const { windowDays, tolerancePercent } = { ...DEFAULT_OPTIONS, ...options };
  const none: ExpenseDuplicateResult = { duplicate: false, match: null, matchCount: 0 };

  const candidateDate = parseCanonicalDate(normalizeDate(candidate.date).value);
  if (candidateDate === null) return none;

  const rows = await withLedger(`read of ${LEDGER_SECTIONS.EXPENSE}`, () =>
    store.readAllRows(LEDGER_SECTIONS.EXPENSE)
  );
  if (rows === null || rows.length <= 1) return none;

  const token = candidate.referenceToken.trim();
  const matches: ExpenseMatch[] = [];

  for (const [index, row] of rows.entries()) {
    if (index === 0 || row.length < 4) continue;
    if (cellText(row[0]) !== token) continue;

    // Blank or unreadable dates would otherwise read as today.
    const rowDateText = cellText(row[1]);
    if (rowDateText === '') continue;
    const rowDate = normalizeDate(rowDateText);
    if (rowDate.fallback) continue;
    const parsedRowDate = parseCanonicalDate(rowDate.value);
    if (parsedRowDate === null || daysBetween(parsedRowDate, candidateDate) > windowDays) continue;

    const existing = cellAmount(row[3]);
    if (existing === null) continue;
    const difference = differencePercent(candidate.value, existing);
    if (difference === null || difference > tolerancePercent) continue;

    matches.push({
      rowNumber: index + 1,
      date: rowDate.value,
      category: cellText(row[2]),
      value: existing,
      differencePercent: roundToTwoDecimals(difference),
    });
  }

  return { duplicate: matches.length > 0, match: matches[0] ?? null, matchCount: matches.length };
}
