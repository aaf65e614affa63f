export type FiscalErrorCode = 'MALFORMED_DOCUMENT' | 'LEDGER_UNAVAILABLE' | 'UNPOSTABLE_RECORD';

export class FiscalIntakeError extends Error {
  readonly code: FiscalErrorCode;

  constructor(code: FiscalErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The XML document or archive cannot be read at all. */
export class MalformedDocumentError extends FiscalIntakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_DOCUMENT', message, options);
  }
}

/** Ledger store connection, auth or lookup failure. */
export class LedgerUnavailableError extends FiscalIntakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LEDGER_UNAVAILABLE', message, options);
  }
}

/** A record still classified UNKNOWN or RETURN_SHIPMENT reached the writer. */
export class UnpostableRecordError extends FiscalIntakeError {
  constructor(message: string) {
    super('UNPOSTABLE_RECORD', message);
  }
}

export function isFiscalIntakeError(error: unknown): error is FiscalIntakeError {
  return error instanceof FiscalIntakeError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
