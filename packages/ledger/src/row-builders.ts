import {
  INTERNAL_TRANSFER_FEE_RATE,
  LEDGER_SECTIONS,
  roundToTwoDecimals,
  type BundleResult,
  type ExpenseEntry,
  type InvoiceRecord,
  type LedgerRow,
  type LedgerSection,
  type TransactionType,
} from '@fiscal-intake/types';

export interface SectionRow {
  section: LedgerSection;
  row: LedgerRow;
}

export function internalTransferFee(invoiceValue: number): number {
  return roundToTwoDecimals(invoiceValue * INTERNAL_TRANSFER_FEE_RATE);
}

export function buildImportRow(record: InvoiceRecord, reference: string): LedgerRow {
  return [
    reference,
    record.invoiceNumber,
    record.issueDate,
    record.emitterName,
    record.emitterTaxId,
    record.productValue,
    record.invoiceValue,
    record.importDuty,
    record.ipi,
    record.pis,
    record.cofins,
    record.icms,
    record.surcharge,
    record.customsFee,
  ];
}

export function buildInternalTransferRow(record: InvoiceRecord, reference: string): LedgerRow {
  return [
    reference,
    record.invoiceNumber,
    record.issueDate,
    record.invoiceValue,
    internalTransferFee(record.invoiceValue),
  ];
}

export function buildCustomerSaleRow(record: InvoiceRecord, reference: string): LedgerRow {
  return [
    reference,
    record.invoiceNumber,
    record.issueDate,
    record.recipientName,
    record.recipientTaxId,
    record.invoiceValue,
    record.operationNature,
  ];
}

/** True when the bundle is non-empty and every invoice is a customer sale. */
export function isCustomerSaleBundle(bundle: BundleResult): boolean {
  return bundle.invoices.length > 0 && bundle.invoices.every(({ type }) => type === 'ENTITY_TO_CUSTOMER');
}

/**
 * One row standing for a whole customer-sale bundle, described by its first
 * invoice. Returns null for an empty bundle.
 */
export function buildConsolidatedBundleRow(bundle: BundleResult, reference: string): LedgerRow | null {
  const first = bundle.invoices[0]?.record;
  if (first === undefined) return null;
  return [
    reference,
    `ZIP com ${bundle.count} NFs`,
    first.issueDate,
    first.recipientName,
    first.recipientTaxId,
    bundle.totalValue,
    first.operationNature,
  ];
}

export function buildExpenseRow(entry: ExpenseEntry): LedgerRow {
  return [entry.referenceToken, entry.date, entry.category, entry.value, entry.description, entry.note];
}

/** Destination section and row for a postable invoice; null otherwise. */
export function buildInvoiceRow(record: InvoiceRecord, type: TransactionType, reference: string): SectionRow | null {
  switch (type) {
    case 'IMPORT':
      return { section: LEDGER_SECTIONS.IMPORT, row: buildImportRow(record, reference) };
    case 'INTERNAL_TRANSFER':
      return { section: LEDGER_SECTIONS.INTERNAL_TRANSFER, row: buildInternalTransferRow(record, reference) };
    case 'ENTITY_TO_CUSTOMER':
      return { section: LEDGER_SECTIONS.ENTITY_TO_CUSTOMER, row: buildCustomerSaleRow(record, reference) };
    case 'RETURN_SHIPMENT':
    case 'UNKNOWN':
      return null;
  }
}
