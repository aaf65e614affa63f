import { z } from 'zod';
import { CanonicalDateSchema } from './invoice.js';

export const ReceiptFactsSchema = z.object({
  /** Distinct positive amounts, largest first. */
  values: z.array(z.number().positive()),
  date: CanonicalDateSchema,
  dateFallback: z.boolean(),
  category: z.string().min(1),
  text: z.string(),
});
export type ReceiptFacts = z.infer<typeof ReceiptFactsSchema>;
