import { EXPENSE_CATEGORIES, OTHER_CATEGORY, type ExpenseCategory } from '@fiscal-intake/types';

export interface KeywordGroup {
  label: string;
  keywords: readonly string[];
}

/** Checked in order against upper-cased text. */
export const RECEIPT_KEYWORD_GROUPS: readonly KeywordGroup[] = [
  { label: 'Frete', keywords: ['FRETE', 'FREIGHT', 'SHIPPING', 'OCEAN'] },
  { label: 'Armazenagem', keywords: ['ARMAZEN', 'STORAGE'] },
  { label: 'Despachante', keywords: ['DESPACH', 'CUSTOMS'] },
  { label: 'AFRMM', keywords: ['AFRMM'] },
  { label: 'SISCOMEX', keywords: ['SISCOMEX'] },
];

export const DEFAULT_RECEIPT_CATEGORY = 'Despesa';

export function guessReceiptCategory(text: string): string {
  const upper = text.toUpperCase();
  const group = RECEIPT_KEYWORD_GROUPS.find(({ keywords }) => keywords.some((keyword) => upper.includes(keyword)));
  return group?.label ?? DEFAULT_RECEIPT_CATEGORY;
}

/**
 * Category for a manually posted expense: the first listed category whose
 * name appears in the description, otherwise `Outros`.
 */
export function categorizeExpenseDescription(description: string): ExpenseCategory {
  const upper = description.toUpperCase();
  const match = EXPENSE_CATEGORIES.find(
    (category) => category !== OTHER_CATEGORY && upper.includes(category.toUpperCase())
  );
  return match ?? OTHER_CATEGORY;
}

export function isExpenseCategory(value: string): value is ExpenseCategory {
  return EXPENSE_CATEGORIES.some((category) => category === value);
}
