import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { LedgerUnavailableError } from '@fiscal-intake/types';
import { FileLedgerStore } from '@fiscal-intake/ledger';

describe('FileLedgerStore', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'ledger-test-'));
    filePath = join(tempDir, 'nested', 'ledger.json');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should report missing sections as null', async () => {
    const store = new FileLedgerStore(filePath);
    expect(await store.readAllRows('Saida_2')).toBeNull();
    expect(existsSync(filePath)).toBe(false);
  });

  it('should persist sections and rows across instances', async () => {
    const store = new FileLedgerStore(filePath);
    await store.ensureSection('Saida_1', ['PI', 'NF']);
    await store.appendRow('Saida_1', ['PI1', '1001', 12.5]);

    const reopened = new FileLedgerStore(filePath);
    expect(await reopened.readAllRows('Saida_1')).toEqual([
      ['PI', 'NF'],
      ['PI1', '1001', 12.5],
    ]);
  });

  it('should write a versioned JSON document', async () => {
    const store = new FileLedgerStore(filePath);
    await store.appendRow('outras_despesas', ['PI1']);

    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual({
      version: 1,
      sections: { outras_despesas: [['PI1']] },
    });
  });

  it('should leave an existing section header alone', async () => {
    const store = new FileLedgerStore(filePath);
    await store.ensureSection('Saida_1', ['PI', 'NF']);
    await store.ensureSection('Saida_1', ['Other']);

    expect(await store.readAllRows('Saida_1')).toEqual([['PI', 'NF']]);
  });

  it('should not expose its internal rows', async () => {
    const store = new FileLedgerStore(filePath);
    await store.appendRow('Saida_1', ['PI1']);

    const rows = await store.readAllRows('Saida_1');
    rows?.push(['tampered']);

    expect(await store.readAllRows('Saida_1')).toEqual([['PI1']]);
  });

  it('should refuse a corrupt ledger file', async () => {
    const corrupt = join(tempDir, 'corrupt.json');
    writeFileSync(corrupt, '{"version": 2}', 'utf-8');

    await expect(new FileLedgerStore(corrupt).readAllRows('Saida_1')).rejects.toBeInstanceOf(LedgerUnavailableError);
  });

  it('should describe its location', () => {
    expect(new FileLedgerStore(filePath).describe()).toBe(`file ${filePath}`);
  });
});
