import { errorMessage, formatCurrency, isFiscalIntakeError } from '@fiscal-intake/types';
import { describeTransactionType } from '@fiscal-intake/nfe-parser';
import { receiptDescription, type IntakeResult, type PendingSubmission } from '@fiscal-intake/intake';

export function formatPending(pending: PendingSubmission): string[] {
  const reference = `Reference: ${pending.referenceToken ?? 'not given'}`;

  switch (pending.kind) {
    case 'invoice': {
      const { record, type } = pending.invoice;
      return [
        `Invoice NF ${record.invoiceNumber} (${describeTransactionType(type)})`,
        `Date: ${record.issueDate}`,
        `Value: ${formatCurrency(record.invoiceValue)}`,
        reference,
      ];
    }
    case 'bundle': {
      const { bundle } = pending;
      const types = new Set(bundle.invoices.map(({ type }) => type));
      const label = types.size > 1 ? 'mixed types' : describeTransactionType(bundle.dominantType);
      const lines = [
        `Bundle of ${bundle.count} invoices (${label})`,
        `Total: ${formatCurrency(bundle.totalValue)}`,
        reference,
      ];
      if (bundle.returnShipmentsIgnored > 0) {
        lines.push(`${bundle.returnShipmentsIgnored} return shipments ignored`);
      }
      for (const skipped of bundle.skipped) {
        lines.push(`Skipped ${skipped.fileName}: ${skipped.reason}`);
      }
      return lines;
    }
    case 'receipt': {
      const { facts } = pending;
      return [
        `Receipt (${facts.category})`,
        ...facts.values.map((value, index) => `  ${index + 1}. ${formatCurrency(value)}`),
        `Date: ${facts.date}${facts.dateFallback ? ' (not found, using today)' : ''}`,
        `Category: ${pending.selectedCategory === null ? 'not chosen' : receiptDescription(pending)}`,
        `Value: ${pending.selectedValue === null ? 'not chosen' : formatCurrency(pending.selectedValue)}`,
        reference,
      ];
    }
  }
}

export function formatResult(result: IntakeResult): string[] {
  switch (result.status) {
    case 'staged':
      return [
        ...formatPending(result.pending),
        result.needs.length === 0 ? 'Ready to post.' : `Still needed: ${result.needs.join(', ')}`,
      ];
    case 'rejected':
      return [`Rejected (${result.reason}): ${result.message}`];
    case 'duplicate-suspected': {
      const { notice } = result;
      if (notice.kind === 'invoice') {
        const { duplicate } = notice;
        return [
          'Possible duplicate:',
          `NF ${duplicate.invoiceNumber} already in ${duplicate.section}, row ${duplicate.rowNumber}, dated ${duplicate.date}`,
          'Re-run with --force to post anyway.',
        ];
      }
      const { match, matchCount } = notice.result;
      const lines = ['Possible duplicate:'];
      if (match !== null) {
        lines.push(
          `Row ${match.rowNumber}: ${match.date} ${match.category} ${formatCurrency(match.value)} (${match.differencePercent.toFixed(2)}% difference)`
        );
      }
      if (matchCount > 1) lines.push(`${matchCount} similar rows in total`);
      lines.push('Re-run with --force to post anyway.');
      return lines;
    }
    case 'posted':
      return [
        ...result.rows.map(({ section, row }) => `Posted to ${section}: ${row.join(' | ')}`),
        ...(result.forced ? ['Posted despite a suspected duplicate; review it later.'] : []),
      ];
    case 'failed':
      return [`Failed: ${result.message}`];
    case 'cancelled':
      return ['Cancelled.'];
    case 'no-pending':
      return ['Nothing pending.'];
  }
}

/** 0 when posted or staged, 2 on a suspected duplicate, 1 otherwise. */
export function exitCodeFor(result: IntakeResult): number {
  switch (result.status) {
    case 'posted':
    case 'staged':
    case 'cancelled':
      return 0;
    case 'duplicate-suspected':
      return 2;
    default:
      return 1;
  }
}

/** Fiscal failures carry their code so scripts can tell them apart. */
export function formatError(error: unknown): string {
  return isFiscalIntakeError(error) ? `${error.code}: ${error.message}` : errorMessage(error);
}
