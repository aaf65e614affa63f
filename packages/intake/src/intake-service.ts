import {
  DUPLICATE_DEFAULTS,
  MIN_RECEIPT_TEXT_LENGTH,
  MalformedDocumentError,
  OTHER_CATEGORY,
  errorMessage,
  extractReferenceToken,
  getLogger,
  normalizeValue,
  todayCanonical,
  type BundleResult,
  type ExpenseCategory,
  type InvoiceRecord,
} from '@fiscal-intake/types';
import {
  classifyInvoice,
  extractInvoice,
  processInvoiceBundle,
  type KnownEntities,
} from '@fiscal-intake/nfe-parser';
import {
  categorizeExpenseDescription,
  extractReceiptFacts,
  isExpenseCategory,
} from '@fiscal-intake/receipt-parser';
import {
  LedgerWriter,
  findExpenseDuplicate,
  findInvoiceDuplicate,
  type ExpenseDuplicateResult,
  type InvoiceDuplicate,
  type LedgerStore,
  type SectionRow,
} from '@fiscal-intake/ledger';
import {
  outstandingRequirements,
  receiptDescription,
  type PendingReceipt,
  type PendingSubmission,
  type Requirement,
} from './pending.js';
import type { SessionStore } from './session-store.js';

export type RejectionReason =
  | 'malformed'
  | 'return-shipment'
  | 'unknown-type'
  | 'empty-bundle'
  | 'no-text'
  | 'no-values'
  | 'no-reference'
  | 'invalid-value'
  | 'invalid-category'
  | 'invalid-description'
  | 'not-applicable'
  | 'incomplete';

export type DuplicateNotice =
  | { kind: 'invoice'; duplicate: InvoiceDuplicate }
  | { kind: 'expense'; result: ExpenseDuplicateResult };

export type IntakeResult =
  | { status: 'staged'; pending: PendingSubmission; needs: Requirement[] }
  | { status: 'rejected'; reason: RejectionReason; message: string }
  | { status: 'duplicate-suspected'; notice: DuplicateNotice }
  | { status: 'posted'; rows: SectionRow[]; forced: boolean }
  | { status: 'failed'; message: string }
  | { status: 'cancelled' }
  | { status: 'no-pending' };

export interface IntakeServiceOptions {
  ledger: LedgerStore;
  sessions: SessionStore<PendingSubmission>;
  entities: KnownEntities;
  windowDays?: number;
  tolerancePercent?: number;
  now?: () => Date;
}

export interface ConfirmOptions {
  /** Post even when a duplicate is suspected. */
  force?: boolean;
}

export interface ManualExpense {
  referenceToken: string;
  value: string | number;
  description: string;
}

function rejected(reason: RejectionReason, message: string): IntakeResult {
  return { status: 'rejected', reason, message };
}

/**
 * Document intake workflow: stage an extracted document per submitter,
 * collect reference token, category and value, check for duplicates and
 * post to the ledger on confirmation.
 */
export class IntakeService {
  private readonly ledger: LedgerStore;
  private readonly sessions: SessionStore<PendingSubmission>;
  private readonly entities: KnownEntities;
  private readonly writer: LedgerWriter;
  private readonly windowDays: number;
  private readonly tolerancePercent: number;
  private readonly now: () => Date;

  constructor(options: IntakeServiceOptions) {
    this.ledger = options.ledger;
    this.sessions = options.sessions;
    this.entities = options.entities;
    this.writer = new LedgerWriter(options.ledger);
    this.windowDays = options.windowDays ?? DUPLICATE_DEFAULTS.WINDOW_DAYS;
    this.tolerancePercent = options.tolerancePercent ?? DUPLICATE_DEFAULTS.TOLERANCE_PERCENT;
    this.now = options.now ?? (() => new Date());
  }

  private async stage(submitter: string, pending: PendingSubmission): Promise<IntakeResult> {
    await this.sessions.put(submitter, pending);
    return { status: 'staged', pending, needs: outstandingRequirements(pending) };
  }

  getPending(submitter: string): Promise<PendingSubmission | null> {
    return this.sessions.get(submitter);
  }

  async submitInvoice(submitter: string, xml: string, caption?: string): Promise<IntakeResult> {
    const referenceToken = extractReferenceToken(caption);
    const now = this.now();

    let record: InvoiceRecord;
    try {
      record = extractInvoice(xml, { referenceToken, now });
    } catch (err) {
      if (err instanceof MalformedDocumentError) return rejected('malformed', err.message);
      throw err;
    }

    const type = classifyInvoice(record, this.entities);
    if (type === 'RETURN_SHIPMENT') {
      return rejected('return-shipment', `NF ${record.invoiceNumber} is a return shipment and is not posted`);
    }
    if (type === 'UNKNOWN') {
      return rejected('unknown-type', `NF ${record.invoiceNumber} does not match any known transaction type`);
    }

    return this.stage(submitter, {
      kind: 'invoice',
      invoice: { record, type },
      referenceToken,
      createdAt: now.getTime(),
    });
  }

  async submitBundle(submitter: string, archive: Uint8Array | ArrayBuffer, caption?: string): Promise<IntakeResult> {
    const referenceToken = extractReferenceToken(caption);
    const now = this.now();

    let bundle: BundleResult;
    try {
      bundle = await processInvoiceBundle(archive, { entities: this.entities, referenceToken, now });
    } catch (err) {
      if (err instanceof MalformedDocumentError) return rejected('malformed', err.message);
      throw err;
    }

    if (bundle.count === 0) {
      return bundle.returnShipmentsIgnored > 0
        ? rejected('return-shipment', 'The archive only contains return shipments')
        : rejected('empty-bundle', 'The archive contains no postable invoice XML');
    }

    return this.stage(submitter, { kind: 'bundle', bundle, referenceToken, createdAt: now.getTime() });
  }

  async submitReceipt(submitter: string, text: string, caption?: string): Promise<IntakeResult> {
    if (text.trim().length < MIN_RECEIPT_TEXT_LENGTH) {
      return rejected('no-text', 'No readable text was found in the document');
    }

    const now = this.now();
    const facts = extractReceiptFacts(text, { now });
    if (facts.values.length === 0) {
      return rejected('no-values', 'No amount was found; post it manually as an expense');
    }

    return this.stage(submitter, {
      kind: 'receipt',
      facts,
      referenceToken: extractReferenceToken(caption),
      selectedCategory: null,
      customDescription: null,
      selectedValue: facts.values.length === 1 ? (facts.values[0] ?? null) : null,
      awaitingManualValue: false,
      awaitingCategoryDescription: false,
      createdAt: now.getTime(),
    });
  }

  /**
   * Free text from the submitter: a manual value or a category description
   * when one is awaited, otherwise a reference token.
   */
  async provideText(submitter: string, text: string): Promise<IntakeResult> {
    const pending = await this.sessions.get(submitter);
    if (pending === null) return { status: 'no-pending' };

    const trimmed = text.trim();

    if (pending.kind === 'receipt' && pending.awaitingManualValue) {
      const { value, fallback } = normalizeValue(trimmed);
      if (fallback || value <= 0) {
        return rejected('invalid-value', `"${trimmed}" is not a valid amount; use 1234.56 or 1234,56`);
      }
      return this.stage(submitter, { ...pending, selectedValue: value, awaitingManualValue: false });
    }

    if (pending.kind === 'receipt' && pending.awaitingCategoryDescription) {
      if (trimmed === '') {
        return rejected('invalid-description', 'The description cannot be empty');
      }
      return this.stage(submitter, { ...pending, customDescription: trimmed, awaitingCategoryDescription: false });
    }

    const referenceToken = extractReferenceToken(trimmed);
    if (referenceToken === null) {
      return rejected('no-reference', 'No reference found; use PI: ABCD1234567');
    }
    return this.stage(submitter, { ...pending, referenceToken });
  }

  private async pendingReceipt(submitter: string): Promise<PendingReceipt | IntakeResult> {
    const pending = await this.sessions.get(submitter);
    if (pending === null) return { status: 'no-pending' };
    if (pending.kind !== 'receipt') {
      return rejected('not-applicable', `A pending ${pending.kind} has no category or value to choose`);
    }
    return pending;
  }

  async selectCategory(submitter: string, category: string): Promise<IntakeResult> {
    const pending = await this.pendingReceipt(submitter);
    if ('status' in pending) return pending;

    if (!isExpenseCategory(category)) {
      return rejected('invalid-category', `Unknown category "${category}"`);
    }
    return this.stage(submitter, {
      ...pending,
      selectedCategory: category,
      awaitingCategoryDescription: category === OTHER_CATEGORY,
    });
  }

  /** Picks one of the extracted values by its position in the list. */
  async selectValue(submitter: string, index: number): Promise<IntakeResult> {
    const pending = await this.pendingReceipt(submitter);
    if ('status' in pending) return pending;

    const value = pending.facts.values[index];
    if (value === undefined) {
      return rejected('invalid-value', `There is no value #${index + 1}`);
    }
    return this.stage(submitter, { ...pending, selectedValue: value, awaitingManualValue: false });
  }

  async requestManualValue(submitter: string): Promise<IntakeResult> {
    const pending = await this.pendingReceipt(submitter);
    if ('status' in pending) return pending;
    return this.stage(submitter, { ...pending, awaitingManualValue: true });
  }

  /**
   * Runs the duplicate check unless forced, then posts. A suspected
   * duplicate or a ledger failure keeps the submission staged.
   */
  async confirm(submitter: string, options: ConfirmOptions = {}): Promise<IntakeResult> {
    const pending = await this.sessions.get(submitter);
    if (pending === null) return { status: 'no-pending' };

    const needs = outstandingRequirements(pending);
    if (needs.length > 0) {
      return rejected('incomplete', `Still needed: ${needs.join(', ')}`);
    }

    const force = options.force ?? false;
    try {
      if (!force) {
        const notice = await this.checkDuplicates(pending);
        if (notice !== null) {
          getLogger().warn(`Possible duplicate for submitter ${submitter}`);
          return { status: 'duplicate-suspected', notice };
        }
      }

      const { rows } = await this.post(pending);
      await this.sessions.delete(submitter);
      return { status: 'posted', rows, forced: force };
    } catch (err) {
      const message = errorMessage(err);
      getLogger().error(`Posting failed: ${message}`);
      return { status: 'failed', message };
    }
  }

  async cancel(submitter: string): Promise<IntakeResult> {
    const removed = await this.sessions.delete(submitter);
    return removed ? { status: 'cancelled' } : { status: 'no-pending' };
  }

  /**
   * Posts an expense directly, dated today, with the category taken from
   * the description.
   */
  async postManualExpense(expense: ManualExpense, options: ConfirmOptions = {}): Promise<IntakeResult> {
    const referenceToken = expense.referenceToken.trim().toUpperCase();
    if (referenceToken === '') {
      return rejected('no-reference', 'A reference token is required');
    }

    const { value, fallback } = normalizeValue(expense.value);
    if (fallback || value <= 0) {
      return rejected('invalid-value', `"${String(expense.value)}" is not a valid amount`);
    }

    const description = expense.description.trim();
    const category = categorizeExpenseDescription(description);
    const date = todayCanonical(this.now());

    try {
      if (!(options.force ?? false)) {
        const result = await this.checkExpense(referenceToken, value, date);
        if (result !== null) return { status: 'duplicate-suspected', notice: result };
      }
      const { rows } = await this.writer.writeExpense({ referenceToken, date, category, value, description });
      return { status: 'posted', rows, forced: options.force ?? false };
    } catch (err) {
      return { status: 'failed', message: errorMessage(err) };
    }
  }

  private async checkExpense(referenceToken: string, value: number, date: string): Promise<DuplicateNotice | null> {
    const result = await findExpenseDuplicate(
      this.ledger,
      { referenceToken, value, date },
      { windowDays: this.windowDays, tolerancePercent: this.tolerancePercent }
    );
    return result.duplicate ? { kind: 'expense', result } : null;
  }

  private async checkDuplicates(pending: PendingSubmission): Promise<DuplicateNotice | null> {
    switch (pending.kind) {
      case 'invoice': {
        const duplicate = await findInvoiceDuplicate(this.ledger, pending.invoice.record.invoiceNumber);
        return duplicate === null ? null : { kind: 'invoice', duplicate };
      }
      case 'bundle': {
        for (const { record } of pending.bundle.invoices) {
          const duplicate = await findInvoiceDuplicate(this.ledger, record.invoiceNumber);
          if (duplicate !== null) return { kind: 'invoice', duplicate };
        }
        return null;
      }
      case 'receipt':
        return this.checkExpense(pending.referenceToken ?? '', pending.selectedValue ?? 0, pending.facts.date);
    }
  }

  private post(pending: PendingSubmission): Promise<{ rows: SectionRow[] }> {
    const reference = pending.referenceToken ?? '';
    switch (pending.kind) {
      case 'invoice':
        return this.writer.writeInvoice(pending.invoice, reference);
      case 'bundle':
        return this.writer.writeBundle(pending.bundle, reference);
      case 'receipt': {
        const category: ExpenseCategory = pending.selectedCategory ?? OTHER_CATEGORY;
        return this.writer.writeExpense({
          referenceToken: reference,
          date: pending.facts.date,
          category,
          value: pending.selectedValue ?? 0,
          description: receiptDescription(pending),
        });
      }
    }
  }
}
