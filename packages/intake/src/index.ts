export { IntakeService } from './intake-service.js';
export type {
  IntakeResult,
  IntakeServiceOptions,
  RejectionReason,
  DuplicateNotice,
  ConfirmOptions,
  ManualExpense,
} from './intake-service.js';

export { InMemorySessionStore } from './session-store.js';
export type { SessionStore, InMemorySessionStoreOptions } from './session-store.js';

export { outstandingRequirements, receiptDescription } from './pending.js';
export type {
  PendingSubmission,
  PendingInvoice,
  PendingBundle,
  PendingReceipt,
  Requirement,
} from './pending.js';
