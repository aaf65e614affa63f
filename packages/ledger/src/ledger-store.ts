import type { LedgerRow } from '@fiscal-intake/types';

/**
 * Tabular store with named sections. Rows come back in append order with
 * the header (when the section has one) as the first row.
 *
 * Implementations throw LedgerUnavailableError when the backend fails.
 */
export interface LedgerStore {
  /** All rows of a section, or null when the section does not exist. */
  readAllRows(section: string): Promise<LedgerRow[] | null>;
  appendRow(section: string, values: LedgerRow): Promise<void>;
  /** Creates the section with the given header row if it is missing. */
  ensureSection(section: string, header: readonly string[]): Promise<void>;
  /** Human-readable location, for logs and `info` output. */
  describe(): string;
}
