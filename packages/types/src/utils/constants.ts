export const NFE_NAMESPACE = 'http://www.portalfiscal.inf.br/nfe';

export const CANONICAL_DATE_FORMAT = 'DD/MM/YYYY';

/** Placeholder reference token for flows that may post without one. */
export const UNKNOWN_REFERENCE = 'N/A';

export const RECEIPT_TEXT_LIMIT = 500;

export const MIN_RECEIPT_TEXT_LENGTH = 10;

/** Fee rate applied to internal-transfer invoice values. */
export const INTERNAL_TRANSFER_FEE_RATE = 0.004;

export const DUPLICATE_DEFAULTS = {
  WINDOW_DAYS: 100,
  TOLERANCE_PERCENT: 1,
} as const;

export const LEDGER_SECTIONS = {
  IMPORT: 'Importacao',
  INTERNAL_TRANSFER: 'Saida_1',
  ENTITY_TO_CUSTOMER: 'Saida_2',
  EXPENSE: 'outras_despesas',
} as const;

export type LedgerSection = (typeof LEDGER_SECTIONS)[keyof typeof LEDGER_SECTIONS];

/** Sections scanned for invoice-number duplicates, in priority order. */
export const INVOICE_SECTIONS: readonly LedgerSection[] = [
  LEDGER_SECTIONS.IMPORT,
  LEDGER_SECTIONS.INTERNAL_TRANSFER,
  LEDGER_SECTIONS.ENTITY_TO_CUSTOMER,
];

export const EXPENSE_HEADER = ['PI', 'Data', 'Categoria', 'Valor', 'Descrição', 'Observação'] as const;

export const SECTION_HEADERS: Record<LedgerSection, readonly string[]> = {
  Importacao: [
    'PI',
    'NF',
    'Data',
    'Emitente',
    'CNPJ Emitente',
    'Valor Produtos',
    'Valor NF',
    'II',
    'IPI',
    'PIS',
    'COFINS',
    'ICMS',
    'AFRMM',
    'SISCOMEX',
  ],
  Saida_1: ['PI', 'NF', 'Data', 'Valor NF', 'Taxa'],
  Saida_2: ['PI', 'NF', 'Data', 'Destinatário', 'CNPJ Destinatário', 'Valor NF', 'Natureza'],
  outras_despesas: EXPENSE_HEADER,
};

export const EXPENSE_CATEGORIES = [
  'Frete Internacional',
  'Frete Nacional',
  'Armazenagem',
  'Despachante',
  'AFRMM',
  'SISCOMEX',
  'ICMS',
  'Seguro',
  'Inspeção',
  'Certificação',
  'Outros',
] as const;

export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

export const OTHER_CATEGORY: ExpenseCategory = 'Outros';
