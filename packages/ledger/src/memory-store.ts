/* eslint-disable @typescript-eslint/require-await */

import type { LedgerRow } from '@fiscal-intake/types';
import type { LedgerStore } from './ledger-store.js';

export class InMemoryLedgerStore implements LedgerStore {
  private readonly sections = new Map<string, LedgerRow[]>();

  constructor(initial: Record<string, LedgerRow[]> = {}) {
    for (const [section, rows] of Object.entries(initial)) {
      this.sections.set(
        section,
        rows.map((row) => [...row])
      );
    }
  }

  async readAllRows(section: string): Promise<LedgerRow[] | null> {
    const rows = this.sections.get(section);
    return rows === undefined ? null : rows.map((row) => [...row]);
  }

  async appendRow(section: string, values: LedgerRow): Promise<void> {
    const rows = this.sections.get(section) ?? [];
    rows.push([...values]);
    this.sections.set(section, rows);
  }

  async ensureSection(section: string, header: readonly string[]): Promise<void> {
    if (!this.sections.has(section)) {
      this.sections.set(section, [[...header]]);
    }
  }

  describe(): string {
    return 'in-memory ledger';
  }

  /** Snapshot of every section, for tests and debugging. */
  toJSON(): Record<string, LedgerRow[]> {
    return Object.fromEntries(this.sections);
  }
}
