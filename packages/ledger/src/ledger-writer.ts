import {
  ExpenseEntrySchema,
  LEDGER_SECTIONS,
  SECTION_HEADERS,
  UNKNOWN_REFERENCE,
  UnpostableRecordError,
  getLogger,
  type BundleResult,
  type ClassifiedInvoice,
  type ExpenseEntryInput,
  type LedgerRow,
  type LedgerSection,
} from '@fiscal-intake/types';
import { withLedger } from './guard.js';
import type { LedgerStore } from './ledger-store.js';
import {
  buildConsolidatedBundleRow,
  buildExpenseRow,
  buildInvoiceRow,
  isCustomerSaleBundle,
  type SectionRow,
} from './row-builders.js';

export interface WriteResult {
  rows: SectionRow[];
}

/**
 * Appends fully built rows to the ledger. Every row is built before the
 * first append, so an unpostable record writes nothing.
 */
export class LedgerWriter {
  constructor(private readonly store: LedgerStore) {}

  private async append(section: LedgerSection, row: LedgerRow): Promise<void> {
    await withLedger(`setup of ${section}`, () => this.store.ensureSection(section, SECTION_HEADERS[section]));
    await withLedger(`append to ${section}`, () => this.store.appendRow(section, row));
    getLogger().debug(`Appended to ${section}: ${row.slice(0, 3).join(' | ')}`);
  }

  private async appendAll(rows: SectionRow[]): Promise<WriteResult> {
    for (const { section, row } of rows) {
      await this.append(section, row);
    }
    return { rows };
  }

  private invoiceRow({ record, type }: ClassifiedInvoice, reference: string): SectionRow {
    const built = buildInvoiceRow(record, type, reference);
    if (built === null) {
      throw new UnpostableRecordError(`NF ${record.invoiceNumber} is ${type} and cannot be posted`);
    }
    return built;
  }

  async writeInvoice(invoice: ClassifiedInvoice, referenceToken?: string | null): Promise<WriteResult> {
    const reference = referenceToken ?? invoice.record.referenceToken;
    return this.appendAll([this.invoiceRow(invoice, reference)]);
  }

  /**
   * A bundle made only of customer sales posts one consolidated row; any
   * other bundle posts one row per invoice in its own section.
   */
  async writeBundle(bundle: BundleResult, referenceToken: string): Promise<WriteResult> {
    const row = isCustomerSaleBundle(bundle) ? buildConsolidatedBundleRow(bundle, referenceToken) : null;
    if (row !== null) {
      return this.appendAll([{ section: LEDGER_SECTIONS.ENTITY_TO_CUSTOMER, row }]);
    }

    const rows = bundle.invoices.map((invoice) => this.invoiceRow(invoice, referenceToken));
    if (rows.length === 0) {
      throw new UnpostableRecordError('Bundle has no invoices to post');
    }
    return this.appendAll(rows);
  }

  async writeExpense(entry: ExpenseEntryInput): Promise<WriteResult> {
    const parsed = ExpenseEntrySchema.parse({
      ...entry,
      referenceToken: entry.referenceToken.trim() || UNKNOWN_REFERENCE,
    });
    return this.appendAll([{ section: LEDGER_SECTIONS.EXPENSE, row: buildExpenseRow(parsed) }]);
  }
}
