export {
  CanonicalDateSchema,
  TransactionTypeSchema,
  InvoiceRecordSchema,
  ClassifiedInvoiceSchema,
  SkippedEntrySchema,
  BundleResultSchema,
  isPostableType,
} from './invoice.js';

export type {
  TransactionType,
  InvoiceRecord,
  ClassifiedInvoice,
  SkippedEntry,
  BundleResult,
} from './invoice.js';

export { ReceiptFactsSchema } from './receipt.js';
export type { ReceiptFacts } from './receipt.js';

export { LedgerCellSchema, LedgerRowSchema, ExpenseEntrySchema } from './ledger.js';
export type { LedgerCell, LedgerRow, ExpenseEntry, ExpenseEntryInput } from './ledger.js';
