import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  EXPENSE_HEADER,
  LedgerUnavailableError,
  SECTION_HEADERS,
  UnpostableRecordError,
  setLogger,
  silentLogger,
  type Logger,
} from '@fiscal-intake/types';
import { InMemoryLedgerStore, LedgerWriter, internalTransferFee } from '@fiscal-intake/ledger';
import { FailingLedgerStore } from '../fixtures/stores.js';
import { createBundle, createCustomerSale, createInvoice } from '../fixtures/records.js';

let previous: Logger;
let store: InMemoryLedgerStore;
let writer: LedgerWriter;

beforeEach(() => {
  previous = setLogger(silentLogger);
  store = new InMemoryLedgerStore();
  writer = new LedgerWriter(store);
});

afterEach(() => {
  setLogger(previous);
});

describe('LedgerWriter.writeInvoice', () => {
  it('should create the import section with its header and append the row', async () => {
    const result = await writer.writeInvoice(createInvoice('IMPORT'));

    const row = ['ABCD1234567', '1001', '15/03/2024', 'Importadora Teste', '11111111000111', 1000, 1100, 150, 50, 16.5, 76, 180, 40.5, 154.23];
    expect(result.rows).toEqual([{ section: 'Importacao', row }]);
    expect(await store.readAllRows('Importacao')).toEqual([[...SECTION_HEADERS.Importacao], row]);
  });

  it('should add the transfer fee to internal transfers', async () => {
    await writer.writeInvoice(createInvoice('INTERNAL_TRANSFER', { invoiceValue: 12345.67 }), 'PI9');

    expect(await store.readAllRows('Saida_1')).toEqual([
      [...SECTION_HEADERS.Saida_1],
      ['PI9', '1001', '15/03/2024', 12345.67, 49.38],
    ]);
  });

  it('should post customer sales with the recipient', async () => {
    await writer.writeInvoice(createCustomerSale());

    expect(await store.readAllRows('Saida_2')).toEqual([
      [...SECTION_HEADERS.Saida_2],
      ['ABCD1234567', '1001', '15/03/2024', 'Cliente Teste', '33333333000133', 1100, 'VENDA DE MERCADORIA'],
    ]);
  });

  it('should refuse unpostable types without writing', async () => {
    await expect(writer.writeInvoice(createInvoice('UNKNOWN'))).rejects.toBeInstanceOf(UnpostableRecordError);
    await expect(writer.writeInvoice(createInvoice('RETURN_SHIPMENT'))).rejects.toBeInstanceOf(UnpostableRecordError);
    expect(store.toJSON()).toEqual({});
  });

  it('should report store failures as ledger unavailability', async () => {
    const failing = new LedgerWriter(new FailingLedgerStore('append'));
    await expect(failing.writeInvoice(createInvoice('IMPORT'))).rejects.toBeInstanceOf(LedgerUnavailableError);
  });
});

describe('LedgerWriter.writeBundle', () => {
  it('should consolidate a customer-sale bundle into one row', async () => {
    const bundle = createBundle([
      createCustomerSale({ invoiceNumber: '1', invoiceValue: 1100 }),
      createCustomerSale({ invoiceNumber: '2', invoiceValue: 250.5, recipientName: 'Outro Cliente' }),
    ]);

    const result = await writer.writeBundle(bundle, 'PI7');

    expect(result.rows).toEqual([
      {
        section: 'Saida_2',
        row: ['PI7', 'ZIP com 2 NFs', '15/03/2024', 'Cliente Teste', '33333333000133', 1350.5, 'VENDA DE MERCADORIA'],
      },
    ]);
  });

  it('should post one row per invoice for other bundle types', async () => {
    const bundle = createBundle([
      createInvoice('IMPORT', { invoiceNumber: '1' }),
      createInvoice('IMPORT', { invoiceNumber: '2' }),
    ]);

    await writer.writeBundle(bundle, 'PI7');

    const rows = await store.readAllRows('Importacao');
    expect(rows?.map((row) => row[1])).toEqual(['NF', '1', '2']);
    expect(rows?.[1]?.[0]).toBe('PI7');
  });

  it('should post each invoice to its own section when a bundle mixes types', async () => {
    const bundle = createBundle([
      createCustomerSale({ invoiceNumber: '1' }),
      createInvoice('INTERNAL_TRANSFER', { invoiceNumber: '2', invoiceValue: 1000 }),
    ]);

    const result = await writer.writeBundle(bundle, 'PI7');

    expect(result.rows).toEqual([
      {
        section: 'Saida_2',
        row: ['PI7', '1', '15/03/2024', 'Cliente Teste', '33333333000133', 1100, 'VENDA DE MERCADORIA'],
      },
      { section: 'Saida_1', row: ['PI7', '2', '15/03/2024', 1000, 4] },
    ]);
  });

  it('should write nothing when any invoice in the bundle is unpostable', async () => {
    const bundle = createBundle([
      createCustomerSale({ invoiceNumber: '1' }),
      createInvoice('UNKNOWN', { invoiceNumber: '2', invoiceValue: 5000 }),
    ]);

    await expect(writer.writeBundle(bundle, 'PI7')).rejects.toThrow('NF 2 is UNKNOWN and cannot be posted');
    expect(await store.readAllRows('Saida_2')).toBeNull();
  });

  it('should refuse empty or unpostable bundles', async () => {
    await expect(writer.writeBundle(createBundle([]), 'PI7')).rejects.toBeInstanceOf(UnpostableRecordError);
    await expect(writer.writeBundle(createBundle([], { dominantType: 'IMPORT' }), 'PI7')).rejects.toThrow(
      'Bundle has no invoices to post'
    );
  });
});

describe('LedgerWriter.writeExpense', () => {
  it('should append to the expense section', async () => {
    await writer.writeExpense({
      referenceToken: 'ABCD1234567',
      date: '05/03/2024',
      category: 'Frete Nacional',
      value: 1500,
      description: 'Frete Nacional',
    });

    expect(await store.readAllRows('outras_despesas')).toEqual([
      [...EXPENSE_HEADER],
      ['ABCD1234567', '05/03/2024', 'Frete Nacional', 1500, 'Frete Nacional', ''],
    ]);
  });

  it('should reject invalid entries', async () => {
    await expect(
      writer.writeExpense({ referenceToken: 'X1', date: '2024-03-05', category: 'Frete', value: 10 })
    ).rejects.toThrow();
    expect(store.toJSON()).toEqual({});
  });
});

describe('internalTransferFee', () => {
  it('should apply the rate and round', () => {
    expect(internalTransferFee(1000)).toBe(4);
    expect(internalTransferFee(12345.67)).toBe(49.38);
  });
});
