/**
 * JSON-file ledger for single-machine CLI use.
 */

/* eslint-disable @typescript-eslint/require-await */

import { existsSync, readFileSync, writeFileSync, mkdirSync, renameSync } from 'fs';
import { join, dirname } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { LedgerRowSchema, LedgerUnavailableError, errorMessage, type LedgerRow } from '@fiscal-intake/types';
import type { LedgerStore } from './ledger-store.js';

export const DEFAULT_LEDGER_PATH = join(homedir(), '.fiscal-intake', 'ledger.json');

const LedgerFileSchema = z.object({
  version: z.literal(1),
  sections: z.record(z.array(LedgerRowSchema)),
});
type LedgerFile = z.infer<typeof LedgerFileSchema>;

export class FileLedgerStore implements LedgerStore {
  private sections: Map<string, LedgerRow[]> | null = null;
  private readonly filePath: string;

  constructor(filePath: string = DEFAULT_LEDGER_PATH) {
    this.filePath = filePath;
  }

  private load(): Map<string, LedgerRow[]> {
    if (this.sections !== null) return this.sections;

    if (!existsSync(this.filePath)) {
      this.sections = new Map();
      return this.sections;
    }

    let parsed: LedgerFile;
    try {
      const data: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
      parsed = LedgerFileSchema.parse(data);
    } catch (err) {
      throw new LedgerUnavailableError(`Cannot read ledger file ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    this.sections = new Map(Object.entries(parsed.sections));
    return this.sections;
  }

  private save(sections: Map<string, LedgerRow[]>): void {
    const file: LedgerFile = { version: 1, sections: Object.fromEntries(sections) };
    const tempPath = `${this.filePath}.tmp`;
    try {
      const dir = dirname(this.filePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      writeFileSync(tempPath, JSON.stringify(file, null, 2), 'utf-8');
      renameSync(tempPath, this.filePath);
    } catch (err) {
      // Drop the cache so the next call re-reads what is actually on disk.
      this.sections = null;
      throw new LedgerUnavailableError(`Cannot write ledger file ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async readAllRows(section: string): Promise<LedgerRow[] | null> {
    const rows = this.load().get(section);
    return rows === undefined ? null : rows.map((row) => [...row]);
  }

  async appendRow(section: string, values: LedgerRow): Promise<void> {
    const sections = this.load();
    const rows = sections.get(section) ?? [];
    sections.set(section, [...rows, [...values]]);
    this.save(sections);
  }

  async ensureSection(section: string, header: readonly string[]): Promise<void> {
    const sections = this.load();
    if (sections.has(section)) return;
    sections.set(section, [[...header]]);
    this.save(sections);
  }

  describe(): string {
    return `file ${this.filePath}`;
  }
}
