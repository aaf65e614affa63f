/* eslint-disable no-console */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import {
  extractReferenceToken,
  formatCurrency,
  getLogger,
  normalizeDate,
  normalizeValue,
  LEDGER_SECTIONS,
} from '@fiscal-intake/types';
import {
  SupabaseLedgerStore,
  findExpenseDuplicate,
  findInvoiceDuplicate,
  type LedgerStore,
} from '@fiscal-intake/ledger';
import { IntakeService, InMemorySessionStore, type IntakeResult, type PendingSubmission } from '@fiscal-intake/intake';
import {
  PDF_MIME_TYPE,
  PdfTextLayerReader,
  RecognizerRouter,
  mimeTypeForFile,
  plainTextRecognizer,
} from '@fiscal-intake/pdf-text';
import type { AppConfig } from './config.js';
import { exitCodeFor, formatResult } from './format.js';

const SUBMITTER = 'cli';

export interface PostingOptions {
  reference?: string;
  force: boolean;
  dryRun: boolean;
}

export interface ReceiptOptions extends PostingOptions {
  category?: string;
  description?: string;
  value?: string;
  manualValue?: string;
}

export function createIntakeService(config: AppConfig, ledger: LedgerStore): IntakeService {
  const sessions = new InMemorySessionStore<PendingSubmission>(
    config.sessionTtlMs === undefined ? {} : { ttlMs: config.sessionTtlMs }
  );
  return new IntakeService({
    ledger,
    sessions,
    entities: config.entities,
    windowDays: config.windowDays,
    tolerancePercent: config.tolerancePercent,
  });
}

/** Accepts `PI: X`, `PROCESSO: X`, a bare token, or any other word as the token itself. */
export function referenceCaption(reference: string | undefined): string | undefined {
  if (reference === undefined || reference.trim() === '') return undefined;
  return extractReferenceToken(reference) === null ? `PI: ${reference.trim()}` : reference;
}

function print(result: IntakeResult): number {
  for (const line of formatResult(result)) {
    console.log(line);
  }
  return exitCodeFor(result);
}

/**
 * Drives a staged submission to the end: prints it, then posts unless it is
 * incomplete or this is a dry run.
 */
async function finish(service: IntakeService, staged: IntakeResult, options: PostingOptions): Promise<number> {
  if (staged.status !== 'staged') return print(staged);

  if (staged.needs.length > 0 || options.dryRun) {
    const code = print(staged);
    await service.cancel(SUBMITTER);
    return staged.needs.length > 0 ? 1 : code;
  }

  return print(await service.confirm(SUBMITTER, { force: options.force }));
}

export async function runInvoice(service: IntakeService, file: string, options: PostingOptions): Promise<number> {
  const xml = await readFile(file, 'utf-8');
  getLogger().info(`Processing invoice ${basename(file)}`);
  const staged = await service.submitInvoice(SUBMITTER, xml, referenceCaption(options.reference));
  return finish(service, staged, options);
}

export async function runBundle(service: IntakeService, file: string, options: PostingOptions): Promise<number> {
  const archive = await readFile(file);
  getLogger().info(`Processing bundle ${basename(file)}`);
  const staged = await service.submitBundle(SUBMITTER, new Uint8Array(archive), referenceCaption(options.reference));
  return finish(service, staged, options);
}

export function createRecognizer(): RecognizerRouter {
  return new RecognizerRouter()
    .register(PDF_MIME_TYPE, new PdfTextLayerReader())
    .register('text/plain', plainTextRecognizer);
}

export async function runReceipt(service: IntakeService, file: string, options: ReceiptOptions): Promise<number> {
  const data = await readFile(file);
  const text = await createRecognizer().recognize(new Uint8Array(data), mimeTypeForFile(file));
  getLogger().debug(`Recognized ${text.length} characters from ${basename(file)}`);

  let result = await service.submitReceipt(SUBMITTER, text, referenceCaption(options.reference));
  if (result.status !== 'staged') return print(result);

  const steps: Array<() => Promise<IntakeResult>> = [];
  if (options.category !== undefined) {
    const category = options.category;
    steps.push(() => service.selectCategory(SUBMITTER, category));
    if (options.description !== undefined) {
      const description = options.description;
      steps.push(() => service.provideText(SUBMITTER, description));
    }
  }
  if (options.manualValue !== undefined) {
    const manualValue = options.manualValue;
    steps.push(() => service.requestManualValue(SUBMITTER));
    steps.push(() => service.provideText(SUBMITTER, manualValue));
  } else if (options.value !== undefined) {
    const position = Number(options.value);
    steps.push(() => service.selectValue(SUBMITTER, Number.isInteger(position) ? position - 1 : -1));
  }

  for (const step of steps) {
    result = await step();
    if (result.status !== 'staged') {
      await service.cancel(SUBMITTER);
      return print(result);
    }
  }

  return finish(service, result, options);
}

export async function runExpense(
  service: IntakeService,
  reference: string,
  value: string,
  description: string,
  options: { force: boolean }
): Promise<number> {
  return print(await service.postManualExpense({ referenceToken: reference, value, description }, options));
}

export async function runCheckInvoice(ledger: LedgerStore, invoiceNumber: string): Promise<number> {
  const duplicate = await findInvoiceDuplicate(ledger, invoiceNumber);
  if (duplicate === null) {
    console.log(`NF ${invoiceNumber} is not in the ledger.`);
    return 0;
  }
  console.log(`NF ${duplicate.invoiceNumber} found in ${duplicate.section}, row ${duplicate.rowNumber}, dated ${duplicate.date}`);
  return 2;
}

export async function runCheckExpense(
  ledger: LedgerStore,
  config: AppConfig,
  reference: string,
  value: string,
  date: string | undefined
): Promise<number> {
  const amount = normalizeValue(value);
  if (amount.fallback) {
    console.error(`[ERROR] "${value}" is not a valid amount`);
    return 1;
  }

  const result = await findExpenseDuplicate(
    ledger,
    { referenceToken: reference.trim().toUpperCase(), value: amount.value, date: normalizeDate(date).value },
    { windowDays: config.windowDays, tolerancePercent: config.tolerancePercent }
  );
  if (result.match === null) {
    console.log('No similar expense found.');
    return 0;
  }
  const { match } = result;
  console.log(
    `Similar expense at row ${match.rowNumber}: ${match.date} ${match.category} ${formatCurrency(match.value)} (${match.differencePercent.toFixed(2)}% difference)`
  );
  if (result.matchCount > 1) console.log(`${result.matchCount} similar rows in total`);
  return 2;
}

export async function runInfo(ledger: LedgerStore, config: AppConfig): Promise<number> {
  console.log(`Ledger: ${ledger.describe()}`);
  if (ledger instanceof SupabaseLedgerStore) {
    const connection = await ledger.testConnection();
    if (!connection.success) {
      console.error(`[ERROR] Supabase connection failed: ${connection.error ?? 'unknown error'}`);
      return 1;
    }
  }
  console.log(`Importer: ${config.entities.importer || 'not set'}`);
  console.log(`Distributor: ${config.entities.distributor || 'not set'}`);
  console.log(`Duplicate window: ±${config.windowDays} days, ${config.tolerancePercent}% tolerance`);

  for (const section of Object.values(LEDGER_SECTIONS)) {
    const rows = await ledger.readAllRows(section);
    console.log(`  ${section}: ${rows === null ? 'missing' : `${Math.max(rows.length - 1, 0)} rows`}`);
  }
  return 0;
}
