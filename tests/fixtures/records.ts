import type { BundleResult, ClassifiedInvoice, InvoiceRecord, TransactionType } from '@fiscal-intake/types';
import { CUSTOMER_TAX_ID, DISTRIBUTOR_TAX_ID, IMPORTER_TAX_ID } from './nfe.js';

export const createRecord = (overrides: Partial<InvoiceRecord> = {}): InvoiceRecord => ({
  invoiceNumber: '1001',
  issueDate: '15/03/2024',
  operationNature: 'IMPORTACAO DE MERCADORIA',
  emitterTaxId: IMPORTER_TAX_ID,
  emitterName: 'Importadora Teste',
  recipientTaxId: DISTRIBUTOR_TAX_ID,
  recipientName: 'Distribuidora Teste',
  productValue: 1000,
  invoiceValue: 1100,
  icms: 180,
  ipi: 50,
  pis: 16.5,
  cofins: 76,
  importDuty: 150,
  surcharge: 40.5,
  customsFee: 154.23,
  referenceToken: 'ABCD1234567',
  ...overrides,
});

export const createInvoice = (
  type: TransactionType,
  overrides: Partial<InvoiceRecord> = {}
): ClassifiedInvoice => ({ record: createRecord(overrides), type });

export const createCustomerSale = (overrides: Partial<InvoiceRecord> = {}): ClassifiedInvoice =>
  createInvoice('ENTITY_TO_CUSTOMER', {
    operationNature: 'VENDA DE MERCADORIA',
    emitterTaxId: DISTRIBUTOR_TAX_ID,
    emitterName: 'Distribuidora Teste',
    recipientTaxId: CUSTOMER_TAX_ID,
    recipientName: 'Cliente Teste',
    ...overrides,
  });

export const createBundle = (invoices: ClassifiedInvoice[], overrides: Partial<BundleResult> = {}): BundleResult => ({
  invoices,
  totalValue: Math.round(invoices.reduce((sum, { record }) => sum + record.invoiceValue, 0) * 100) / 100,
  count: invoices.length,
  returnShipmentsIgnored: 0,
  skipped: [],
  dominantType: invoices[0]?.type ?? 'UNKNOWN',
  ...overrides,
});
