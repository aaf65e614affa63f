export type { LedgerStore } from './ledger-store.js';
export { InMemoryLedgerStore } from './memory-store.js';
export { FileLedgerStore, DEFAULT_LEDGER_PATH } from './file-store.js';
export {
  SupabaseLedgerStore,
  LEDGER_TABLE,
  LEDGER_SCHEMA_SQL,
  getLedgerMigrationSQL,
} from './supabase-store.js';
export type { SupabaseConfig } from './supabase-store.js';

export {
  buildImportRow,
  buildInternalTransferRow,
  buildCustomerSaleRow,
  buildConsolidatedBundleRow,
  isCustomerSaleBundle,
  buildExpenseRow,
  buildInvoiceRow,
  internalTransferFee,
} from './row-builders.js';
export type { SectionRow } from './row-builders.js';

export {
  findInvoiceDuplicate,
  findExpenseDuplicate,
  differencePercent,
} from './duplicate-detector.js';
export type {
  InvoiceDuplicate,
  ExpenseCandidate,
  ExpenseDuplicateOptions,
  ExpenseMatch,
  ExpenseDuplicateResult,
} from './duplicate-detector.js';

export { LedgerWriter } from './ledger-writer.js';
export type { WriteResult } from './ledger-writer.js';

export { withLedger } from './guard.js';
