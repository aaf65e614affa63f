import { describe, it, expect } from 'vitest';
import { FileLedgerStore, InMemoryLedgerStore, SupabaseLedgerStore } from '@fiscal-intake/ledger';
import { createLedgerStore, loadConfig, missingEntities } from '../../apps/cli/src/config.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      ledgerBackend: 'file',
      ledgerFile: undefined,
      entities: { importer: '', distributor: '' },
      windowDays: 100,
      tolerancePercent: 1,
      sessionTtlMs: undefined,
      verbose: false,
      supabase: undefined,
    });
  });

  it('should read and coerce variables', () => {
    const config = loadConfig({
      LEDGER_BACKEND: 'memory',
      LEDGER_FILE: '/tmp/ledger.json',
      IMPORTER_TAX_ID: '11111111000111',
      DISTRIBUTOR_TAX_ID: '22222222000122',
      DUPLICATE_WINDOW_DAYS: '30',
      DUPLICATE_TOLERANCE_PERCENT: '2.5',
      SESSION_TTL_MINUTES: '5',
      FISCAL_VERBOSE: 'true',
    });

    expect(config).toEqual({
      ledgerBackend: 'memory',
      ledgerFile: '/tmp/ledger.json',
      entities: { importer: '11111111000111', distributor: '22222222000122' },
      windowDays: 30,
      tolerancePercent: 2.5,
      sessionTtlMs: 300_000,
      verbose: true,
      supabase: undefined,
    });
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ DUPLICATE_WINDOW_DAYS: '', LEDGER_BACKEND: '' }).windowDays).toBe(100);
  });

  it('should require Supabase credentials for the supabase backend', () => {
    expect(() => loadConfig({ LEDGER_BACKEND: 'supabase' })).toThrow(
      'Invalid configuration: SUPABASE_URL: required by the supabase backend; SUPABASE_ANON_KEY: required by the supabase backend'
    );
  });

  it('should collect Supabase settings', () => {
    const config = loadConfig({
      LEDGER_BACKEND: 'supabase',
      SUPABASE_URL: 'https://ledger.example.test',
      SUPABASE_ANON_KEY: 'test-anon-key',
    });

    expect(config.supabase).toEqual({
      url: 'https://ledger.example.test',
      anonKey: 'test-anon-key',
      serviceRoleKey: undefined,
    });
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ LEDGER_BACKEND: 'sheets' })).toThrow(/^Invalid configuration: LEDGER_BACKEND/);
    expect(() => loadConfig({ DUPLICATE_WINDOW_DAYS: 'soon' })).toThrow('Invalid configuration');
  });
});

describe('missingEntities', () => {
  it('should list unset tax IDs', () => {
    expect(missingEntities(loadConfig({ IMPORTER_TAX_ID: '1' }))).toEqual(['DISTRIBUTOR_TAX_ID']);
  });
});

describe('createLedgerStore', () => {
  it('should build the configured backend', () => {
    expect(createLedgerStore(loadConfig({ LEDGER_BACKEND: 'memory' }))).toBeInstanceOf(InMemoryLedgerStore);

    const file = createLedgerStore(loadConfig({ LEDGER_FILE: '/tmp/fiscal-ledger.json' }));
    expect(file).toBeInstanceOf(FileLedgerStore);
    expect(file.describe()).toBe('file /tmp/fiscal-ledger.json');
  });

  it('should build the Supabase store from its settings', () => {
    const store = createLedgerStore(
      loadConfig({
        LEDGER_BACKEND: 'supabase',
        SUPABASE_URL: 'https://ledger.example.test',
        SUPABASE_ANON_KEY: 'test-anon-key',
      })
    );

    expect(store).toBeInstanceOf(SupabaseLedgerStore);
    expect(store.describe()).toBe('supabase table ledger_rows');
  });
});
