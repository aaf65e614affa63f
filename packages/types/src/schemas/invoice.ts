import { z } from 'zod';

const amount = z.number().nonnegative().default(0);

export const CanonicalDateSchema = z
  .string()
  .regex(/^\d{2}\/\d{2}\/\d{4}$/, 'Date must be in DD/MM/YYYY format');

export const TransactionTypeSchema = z.enum([
  'IMPORT',
  'INTERNAL_TRANSFER',
  'ENTITY_TO_CUSTOMER',
  'RETURN_SHIPMENT',
  'UNKNOWN',
]);
export type TransactionType = z.infer<typeof TransactionTypeSchema>;

export const InvoiceRecordSchema = z.object({
  /** Kept verbatim: `007` and `7` are different invoices. */
  invoiceNumber: z.string(),
  issueDate: CanonicalDateSchema,
  operationNature: z.string().default(''),
  emitterTaxId: z.string().default(''),
  emitterName: z.string().default(''),
  recipientTaxId: z.string().default(''),
  recipientName: z.string().default(''),
  productValue: amount,
  invoiceValue: amount,
  icms: amount,
  ipi: amount,
  pis: amount,
  cofins: amount,
  importDuty: amount,
  /** AFRMM, summed over import declarations. */
  surcharge: amount,
  /** SISCOMEX, scanned from the additional-information text. */
  customsFee: amount,
  referenceToken: z.string().min(1),
});
export type InvoiceRecord = z.infer<typeof InvoiceRecordSchema>;

export const ClassifiedInvoiceSchema = z.object({
  record: InvoiceRecordSchema,
  type: TransactionTypeSchema,
});
export type ClassifiedInvoice = z.infer<typeof ClassifiedInvoiceSchema>;

export const SkippedEntrySchema = z.object({
  fileName: z.string(),
  reason: z.string(),
});
export type SkippedEntry = z.infer<typeof SkippedEntrySchema>;

export const BundleResultSchema = z.object({
  invoices: z.array(ClassifiedInvoiceSchema),
  totalValue: z.number().nonnegative(),
  count: z.number().int().nonnegative(),
  returnShipmentsIgnored: z.number().int().nonnegative(),
  skipped: z.array(SkippedEntrySchema),
  dominantType: TransactionTypeSchema,
});
export type BundleResult = z.infer<typeof BundleResultSchema>;

const UNPOSTABLE_TYPES: ReadonlySet<TransactionType> = new Set(['RETURN_SHIPMENT', 'UNKNOWN']);

/** RETURN_SHIPMENT and UNKNOWN records never reach the ledger. */
export function isPostableType(type: TransactionType): boolean {
  return !UNPOSTABLE_TYPES.has(type);
}
