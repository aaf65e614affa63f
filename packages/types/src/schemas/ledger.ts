import { z } from 'zod';
import { CanonicalDateSchema } from './invoice.js';

export const LedgerCellSchema = z.union([z.string(), z.number()]);
export type LedgerCell = z.infer<typeof LedgerCellSchema>;

export const LedgerRowSchema = z.array(LedgerCellSchema);
export type LedgerRow = z.infer<typeof LedgerRowSchema>;

export const ExpenseEntrySchema = z.object({
  referenceToken: z.string().min(1),
  date: CanonicalDateSchema,
  category: z.string().min(1),
  value: z.number().nonnegative(),
  description: z.string().default(''),
  note: z.string().default(''),
});
export type ExpenseEntry = z.infer<typeof ExpenseEntrySchema>;
export type ExpenseEntryInput = z.input<typeof ExpenseEntrySchema>;
