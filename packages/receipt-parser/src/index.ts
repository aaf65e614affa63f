export { extractReceiptFacts } from './receipt-extractor.js';

export { VALUE_PATTERNS, matchValuePattern, extractValueCandidates } from './value-patterns.js';
export type { ValuePattern, ValuePatternName } from './value-patterns.js';

export { RECEIPT_DATE_PATTERNS, extractReceiptDate } from './receipt-date.js';
export type { ReceiptDate } from './receipt-date.js';

export {
  RECEIPT_KEYWORD_GROUPS,
  DEFAULT_RECEIPT_CATEGORY,
  guessReceiptCategory,
  categorizeExpenseDescription,
  isExpenseCategory,
} from './categories.js';
export type { KeywordGroup } from './categories.js';
