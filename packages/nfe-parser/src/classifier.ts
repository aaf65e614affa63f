import type { InvoiceRecord, TransactionType } from '@fiscal-intake/types';

/** Tax IDs of the two business entities the ledger belongs to. */
export interface KnownEntities {
  /** Entity that imports goods and transfers them to the distributor. */
  importer: string;
  /** Entity that sells to end customers. */
  distributor: string;
}

export const TRANSACTION_TYPE_LABELS: Record<TransactionType, string> = {
  IMPORT: 'Import',
  INTERNAL_TRANSFER: 'Internal transfer',
  ENTITY_TO_CUSTOMER: 'Sale to customer',
  RETURN_SHIPMENT: 'Return shipment',
  UNKNOWN: 'Unknown',
};

const RETURN_MARKERS = ['REMESSA'];
const IMPORT_MARKERS = ['IMPORT', 'ENTRADA'];

export function digitsOnly(taxId: string): string {
  return taxId.replace(/\D/g, '');
}

function sameEntity(taxId: string, known: string): boolean {
  const digits = digitsOnly(taxId);
  return digits !== '' && digits === digitsOnly(known);
}

/**
 * Operation nature is checked before the entity pair, so an import-flagged
 * transfer between the two entities is an IMPORT.
 */
export function classifyInvoice(record: InvoiceRecord, entities: KnownEntities): TransactionType {
  const nature = record.operationNature.toUpperCase();

  if (RETURN_MARKERS.some((marker) => nature.includes(marker))) return 'RETURN_SHIPMENT';
  if (IMPORT_MARKERS.some((marker) => nature.includes(marker))) return 'IMPORT';

  const fromImporter = sameEntity(record.emitterTaxId, entities.importer);
  if (fromImporter && sameEntity(record.recipientTaxId, entities.distributor)) {
    return 'INTERNAL_TRANSFER';
  }
  if (sameEntity(record.emitterTaxId, entities.distributor)) return 'ENTITY_TO_CUSTOMER';

  return 'UNKNOWN';
}

export function describeTransactionType(type: TransactionType): string {
  return TRANSACTION_TYPE_LABELS[type];
}
