export {
  extractInvoice,
  parseInvoiceTree,
  locateInvoiceInfo,
  resolveInvoiceNamespace,
  sumImportDuty,
  sumSurcharge,
  scanCustomsFee,
  CUSTOMS_FEE_PATTERNS,
} from './invoice-extractor.js';
export type { ExtractInvoiceOptions, ParsedInvoiceTree } from './invoice-extractor.js';

export {
  classifyInvoice,
  describeTransactionType,
  digitsOnly,
  TRANSACTION_TYPE_LABELS,
} from './classifier.js';
export type { KnownEntities } from './classifier.js';

export { processInvoiceBundle, isInvoiceEntry } from './bundle-processor.js';
export type { BundleOptions } from './bundle-processor.js';
