import { RECEIPT_TEXT_LIMIT, type DateOptions, type ReceiptFacts } from '@fiscal-intake/types';
import { guessReceiptCategory } from './categories.js';
import { extractReceiptDate } from './receipt-date.js';
import { extractValueCandidates } from './value-patterns.js';

/** Values, date and category guess from recognized receipt text. */
export function extractReceiptFacts(text: string, options: DateOptions = {}): ReceiptFacts {
  const { date, fallback } = extractReceiptDate(text, options);
  return {
    values: extractValueCandidates(text),
    date,
    dateFallback: fallback,
    category: guessReceiptCategory(text),
    text: text.slice(0, RECEIPT_TEXT_LIMIT),
  };
}
