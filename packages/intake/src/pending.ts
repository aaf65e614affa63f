import {
  OTHER_CATEGORY,
  type BundleResult,
  type ClassifiedInvoice,
  type ExpenseCategory,
  type ReceiptFacts,
} from '@fiscal-intake/types';

interface PendingBase {
  /** Reference token supplied so far; null until the submitter gives one. */
  referenceToken: string | null;
  /** Milliseconds since epoch. */
  createdAt: number;
}

export interface PendingInvoice extends PendingBase {
  kind: 'invoice';
  invoice: ClassifiedInvoice;
}

export interface PendingBundle extends PendingBase {
  kind: 'bundle';
  bundle: BundleResult;
}

export interface PendingReceipt extends PendingBase {
  kind: 'receipt';
  facts: ReceiptFacts;
  selectedCategory: ExpenseCategory | null;
  /** Free-text description given after choosing `Outros`. */
  customDescription: string | null;
  selectedValue: number | null;
  awaitingManualValue: boolean;
  awaitingCategoryDescription: boolean;
}

export type PendingSubmission = PendingInvoice | PendingBundle | PendingReceipt;

export type Requirement = 'reference' | 'category' | 'category-description' | 'value' | 'manual-value';

/** What the submitter still has to provide before confirming. */
export function outstandingRequirements(pending: PendingSubmission): Requirement[] {
  if (pending.kind !== 'receipt') {
    return pending.referenceToken === null ? ['reference'] : [];
  }

  const needs: Requirement[] = [];
  if (pending.awaitingCategoryDescription) needs.push('category-description');
  if (pending.awaitingManualValue) needs.push('manual-value');
  if (pending.selectedCategory === null) needs.push('category');
  if (pending.referenceToken === null) needs.push('reference');
  if (pending.selectedValue === null && !pending.awaitingManualValue) needs.push('value');
  return needs;
}

/** Description written on the expense row for a receipt. */
export function receiptDescription(pending: PendingReceipt): string {
  if (pending.selectedCategory === OTHER_CATEGORY) {
    return pending.customDescription ?? pending.facts.category;
  }
  return pending.selectedCategory ?? pending.facts.category;
}
