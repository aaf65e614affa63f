import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { LedgerRowSchema, LedgerUnavailableError, type LedgerRow } from '@fiscal-intake/types';
import type { LedgerStore } from './ledger-store.js';

export interface SupabaseConfig {
  url: string;
  anonKey: string;
  /** Used instead of the anon key when set. */
  serviceRoleKey?: string | undefined;
}

export const LEDGER_TABLE = 'ledger_rows';

const PAGE_SIZE = 1000;

export const LEDGER_SCHEMA_SQL = `
create table if not exists ${LEDGER_TABLE} (
  position bigint generated always as identity primary key,
  section text not null,
  cells jsonb not null,
  created_at timestamptz not null default now()
);

create index if not exists ${LEDGER_TABLE}_section_idx on ${LEDGER_TABLE} (section, position);
`;

/** SQL to run once in the Supabase SQL editor before first use. */
export function getLedgerMigrationSQL(): string {
  let sql = '-- Ledger schema\n';
  sql += '-- Run this SQL in Supabase Dashboard > SQL Editor\n';
  sql += LEDGER_SCHEMA_SQL;
  return sql;
}

const StoredRowSchema = z.object({ cells: LedgerRowSchema });

/**
 * Ledger kept in one Supabase table, one record per row, read back in
 * `position` order. A section exists once it has at least one row (its header).
 */
export class SupabaseLedgerStore implements LedgerStore {
  constructor(private readonly client: SupabaseClient) {}

  static fromConfig({ url, anonKey, serviceRoleKey }: SupabaseConfig): SupabaseLedgerStore {
    const client = createClient(url, serviceRoleKey ?? anonKey, {
      auth: { autoRefreshToken: false, persistSession: false },
    });
    return new SupabaseLedgerStore(client);
  }

  async readAllRows(section: string): Promise<LedgerRow[] | null> {
    const rows: LedgerRow[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.client
        .from(LEDGER_TABLE)
        .select('cells')
        .eq('section', section)
        .order('position', { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      if (error) {
        throw new LedgerUnavailableError(`Failed to read section ${section}: ${error.message}`);
      }

      const page = z.array(StoredRowSchema).safeParse(data ?? []);
      if (!page.success) {
        throw new LedgerUnavailableError(`Unexpected row shape in section ${section}: ${page.error.message}`);
      }

      rows.push(...page.data.map((row) => row.cells));
      if (page.data.length < PAGE_SIZE) break;
    }

    return rows.length === 0 ? null : rows;
  }

  async appendRow(section: string, values: LedgerRow): Promise<void> {
    const { error } = await this.client.from(LEDGER_TABLE).insert({ section, cells: values });
    if (error) {
      throw new LedgerUnavailableError(`Failed to append to section ${section}: ${error.message}`);
    }
  }

  async ensureSection(section: string, header: readonly string[]): Promise<void> {
    const { count, error } = await this.client
      .from(LEDGER_TABLE)
      .select('*', { count: 'exact', head: true })
      .eq('section', section);

    if (error) {
      throw new LedgerUnavailableError(`Failed to check section ${section}: ${error.message}`);
    }
    if ((count ?? 0) === 0) {
      await this.appendRow(section, [...header]);
    }
  }

  describe(): string {
    return `supabase table ${LEDGER_TABLE}`;
  }

  /** Round-trips a trivial query; used by the CLI `info` command. */
  async testConnection(): Promise<{ success: boolean; error?: string }> {
    try {
      const { error } = await this.client.from(LEDGER_TABLE).select('position', { head: true }).limit(1);
      if (error) {
        return { success: false, error: error.message };
      }
      return { success: true };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, error: message };
    }
  }
}
