/**
 * Ledger Domain
 *
 * Public exports for accounts, PINs, balances and history
 */

// Repository layer
export { InMemoryAccountRepository } from './account-repository.js';
export type { AccountRepository } from './account-repository.js';

// Service layer
export { Ledger, DEFAULT_FIRST_ACCOUNT_NUMBER } from './ledger-service.js';

// Events
export { LedgerEventEmitter } from './ledger-events.js';
export type {
  LedgerEvent,
  LedgerEventType,
  LedgerEventHandler,
  LedgerEventSink,
  AccountCreatedEvent,
  PinSetEvent,
  BalanceChangedEvent,
  AuthFailedEvent,
} from './ledger-events.js';

// Domain types
export type {
  Account,
  AccountSummary,
  CreateAccountInput,
  LedgerOptions,
  TransactionKind,
  TransactionRecord,
} from './ledger-types.js';

// Domain errors
export {
  LedgerError,
  ValidationError,
  AuthError,
  InsufficientFundsError,
  AccountNotFoundError,
} from './ledger-errors.js';
export type { ValidationErrorCode, AuthFailureReason } from './ledger-errors.js';
