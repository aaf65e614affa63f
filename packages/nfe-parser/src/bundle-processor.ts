import JSZip from 'jszip';
import {
  MalformedDocumentError,
  errorMessage,
  getLogger,
  roundToTwoDecimals,
  type BundleResult,
  type ClassifiedInvoice,
  type SkippedEntry,
} from '@fiscal-intake/types';
import { classifyInvoice, type KnownEntities } from './classifier.js';
import { extractInvoice, type ExtractInvoiceOptions } from './invoice-extractor.js';

export interface BundleOptions extends ExtractInvoiceOptions {
  entities: KnownEntities;
  /** Called after each XML entry is handled. */
  onProgress?: (processed: number, total: number, fileName: string) => void;
}

export function isInvoiceEntry(entry: { name: string; dir: boolean }): boolean {
  return (
    !entry.dir &&
    !entry.name.split('/').includes('__MACOSX') &&
    entry.name.toLowerCase().endsWith('.xml')
  );
}

/**
 * Extracts and classifies every XML entry of a ZIP archive, in archive order.
 * Return shipments are counted and left out. Entries that fail extraction or
 * match no known transaction type are logged and listed in `skipped`, so
 * `invoices` and `totalValue` only hold postable invoices. Throws
 * MalformedDocumentError only when the archive itself cannot be read.
 */
export async function processInvoiceBundle(
  archive: Uint8Array | ArrayBuffer,
  options: BundleOptions
): Promise<BundleResult> {
  const logger = getLogger();

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(archive);
  } catch (err) {
    throw new MalformedDocumentError(`Unreadable ZIP archive: ${errorMessage(err)}`, { cause: err });
  }

  const entries = Object.values(zip.files).filter(isInvoiceEntry);
  const invoices: ClassifiedInvoice[] = [];
  const skipped: SkippedEntry[] = [];
  let returnShipmentsIgnored = 0;
  let totalValue = 0;

  for (const [index, entry] of entries.entries()) {
    try {
      const xml = await entry.async('string');
      const record = extractInvoice(xml, options);
      const type = classifyInvoice(record, options.entities);

      if (type === 'RETURN_SHIPMENT') {
        logger.debug(`${entry.name}: return shipment, ignored`);
        returnShipmentsIgnored++;
      } else if (type === 'UNKNOWN') {
        const reason = `NF ${record.invoiceNumber} does not match any known transaction type`;
        logger.warn(`Skipping ${entry.name}: ${reason}`);
        skipped.push({ fileName: entry.name, reason });
      } else {
        invoices.push({ record, type });
        totalValue += record.invoiceValue;
      }
    } catch (err) {
      const reason = errorMessage(err);
      logger.warn(`Skipping ${entry.name}: ${reason}`);
      skipped.push({ fileName: entry.name, reason });
    }
    options.onProgress?.(index + 1, entries.length, entry.name);
  }

  logger.debug(`Bundle: ${invoices.length} invoices, ${returnShipmentsIgnored} return shipments, ${skipped.length} skipped`);

  return {
    invoices,
    totalValue: roundToTwoDecimals(totalValue),
    count: invoices.length,
    returnShipmentsIgnored,
    skipped,
    dominantType: invoices[0]?.type ?? 'UNKNOWN',
  };
}
