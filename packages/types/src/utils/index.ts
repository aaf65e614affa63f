export * from './constants.js';
export { normalized, fellBack, type Normalized } from './normalized.js';
export {
  DATE_FORMATS,
  normalizeDate,
  parseWithFormat,
  parseCanonicalDate,
  isCanonicalDate,
  calendarDate,
  daysBetween,
  todayCanonical,
  expandTwoDigitYear,
  type DateFormat,
  type DateOptions,
} from './date.js';
export {
  normalizeValue,
  toDecimalString,
  roundToTwoDecimals,
  sumAmounts,
  formatBrazilianAmount,
  formatUsAmount,
  formatCurrency,
} from './money.js';
export { REFERENCE_PATTERNS, extractReferenceToken, type ReferencePattern } from './reference-token.js';
