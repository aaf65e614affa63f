import { FiscalIntakeError, LedgerUnavailableError, errorMessage } from '@fiscal-intake/types';

/** Runs a store call, reporting any non-domain failure as LedgerUnavailableError. */
export async function withLedger<T>(action: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof FiscalIntakeError) throw err;
    throw new LedgerUnavailableError(`Ledger ${action} failed: ${errorMessage(err)}`, { cause: err });
  }
}
