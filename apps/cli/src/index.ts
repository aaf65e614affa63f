#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { EXPENSE_CATEGORIES, createConsoleLogger, setLogger } from '@fiscal-intake/types';
import { getLedgerMigrationSQL } from '@fiscal-intake/ledger';
import { createLedgerStore, loadConfig, missingEntities, type AppConfig } from './config.js';
import {
  createIntakeService,
  runBundle,
  runCheckExpense,
  runCheckInvoice,
  runExpense,
  runInfo,
  runInvoice,
  runReceipt,
  type PostingOptions,
  type ReceiptOptions,
} from './commands.js';
import { formatError } from './format.js';

const VERSION = '0.1.0';

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

interface GlobalOptions {
  verbose: boolean;
}

function setup(): AppConfig {
  const config = loadConfig();
  const { verbose } = program.opts<GlobalOptions>();
  setLogger(createConsoleLogger({ verbose: verbose || config.verbose }));
  const missing = missingEntities(config);
  if (missing.length > 0) {
    console.error(`[WARN] ${missing.join(' and ')} not set; transfers and customer sales will not be recognized`);
  }
  return config;
}

/** Runs a command body, turning thrown errors into `[ERROR]` lines and exit code 1. */
function action<A extends unknown[]>(body: (config: AppConfig, ...args: A) => Promise<number>) {
  return async (...args: A): Promise<void> => {
    try {
      const config = setup();
      process.exitCode = await body(config, ...args);
    } catch (error) {
      console.error(`[ERROR] ${formatError(error)}`);
      if (program.opts<GlobalOptions>().verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exitCode = 1;
    }
  };
}

function postingCommand(name: string, argument: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .argument(argument)
    .option('-r, --reference <token>', 'Reference token (PI), e.g. "PI: ABCD1234567"', process.env['FISCAL_REFERENCE'])
    .option('-f, --force', 'Post even when a duplicate is suspected', false)
    .option('--dry-run', 'Show what would be posted without writing', envBool('FISCAL_DRY_RUN', false));
}

program
  .name('fiscal-intake')
  .description('Post NF-e invoices, invoice bundles, receipts and expenses to the ledger')
  .version(VERSION)
  .option('-v, --verbose', 'Enable verbose output', envBool('FISCAL_VERBOSE', false));

postingCommand('invoice', '<xml-file>', 'Post one NF-e XML invoice').action(
  action(async (config: AppConfig, file: string, options: PostingOptions) => {
    const ledger = createLedgerStore(config);
    return runInvoice(createIntakeService(config, ledger), file, options);
  })
);

postingCommand('bundle', '<zip-file>', 'Post a ZIP archive of NF-e XML invoices').action(
  action(async (config: AppConfig, file: string, options: PostingOptions) => {
    const ledger = createLedgerStore(config);
    return runBundle(createIntakeService(config, ledger), file, options);
  })
);

postingCommand('receipt', '<file>', 'Post an expense from a receipt (.txt text or a PDF with a text layer)')
  .option('-c, --category <name>', `Expense category (${EXPENSE_CATEGORIES.join(', ')})`)
  .option('-d, --description <text>', 'Description, required with category "Outros"')
  .option('--value <n>', 'Use the n-th extracted value (1 = largest)')
  .option('--manual-value <amount>', 'Use this amount instead of an extracted one')
  .action(
    action(async (config: AppConfig, file: string, options: ReceiptOptions) => {
      const ledger = createLedgerStore(config);
      return runReceipt(createIntakeService(config, ledger), file, options);
    })
  );

program
  .command('expense')
  .description('Post an expense by hand, dated today')
  .argument('<reference>', 'Reference token')
  .argument('<value>', 'Amount, e.g. 1234.56 or 1.234,56')
  .argument('<description...>', 'Description; its category is taken from the words used')
  .option('-f, --force', 'Post even when a duplicate is suspected', false)
  .action(
    action(async (config: AppConfig, reference: string, value: string, description: string[], options: { force: boolean }) => {
      const ledger = createLedgerStore(config);
      return runExpense(createIntakeService(config, ledger), reference, value, description.join(' '), options);
    })
  );

program
  .command('check-invoice')
  .description('Look an invoice number up in the invoice sections')
  .argument('<number>', 'Invoice number')
  .action(action(async (config: AppConfig, invoiceNumber: string) => runCheckInvoice(createLedgerStore(config), invoiceNumber)));

program
  .command('check-expense')
  .description('Look for similar expenses under a reference token')
  .argument('<reference>', 'Reference token')
  .argument('<value>', 'Amount')
  .argument('[date]', 'Date (default: today)')
  .action(
    action(async (config: AppConfig, reference: string, value: string, date: string | undefined) =>
      runCheckExpense(createLedgerStore(config), config, reference, value, date)
    )
  );

program
  .command('info')
  .description('Show configuration and ledger status')
  .action(action(async (config: AppConfig) => runInfo(createLedgerStore(config), config)));

program
  .command('schema')
  .description('Print the SQL that creates the Supabase ledger table')
  .action(() => {
    console.log(getLedgerMigrationSQL());
  });

await program.parseAsync(process.argv);
