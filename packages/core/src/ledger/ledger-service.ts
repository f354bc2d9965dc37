/**
 * Ledger Service
 *
 * Owns every account and enforces the ledger rules:
 * - Owners must be 18 or older, checked once at creation
 * - PINs are exactly 4 digits and only their hash is kept
 * - Deposits, withdrawals and reads require the account PIN
 * - Balance never drops below zero
 * - History is append-only and returned in insertion order
 */

import { hashPin, verifyPin } from '@pinbank/auth';
import {
  CreateAccountInputSchema,
  PinSchema,
  TransactionRecordSchema,
} from '@pinbank/types';
import type { ZodError } from 'zod';
import { InMemoryAccountRepository } from './account-repository.js';
import type { AccountRepository } from './account-repository.js';
import {
  AccountNotFoundError,
  AuthError,
  InsufficientFundsError,
  ValidationError,
} from './ledger-errors.js';
import type { AuthFailureReason } from './ledger-errors.js';
import { LedgerEventEmitter } from './ledger-events.js';
import type { LedgerEventSink } from './ledger-events.js';
import type {
  Account,
  AccountSummary,
  CreateAccountInput,
  LedgerOptions,
  TransactionKind,
  TransactionRecord,
} from './ledger-types.js';
import { fromCents, toCents } from './money.js';

export const DEFAULT_FIRST_ACCOUNT_NUMBER = 1001;

export class Ledger {
  private readonly accounts: AccountRepository;
  private readonly events: LedgerEventSink;
  private readonly clock: () => Date;
  private readonly firstAccountNumber: number;

  constructor(options: LedgerOptions = {}) {
    this.accounts = options.repository ?? new InMemoryAccountRepository();
    this.events = options.events ?? new LedgerEventEmitter();
    this.clock = options.clock ?? (() => new Date());
    this.firstAccountNumber = options.firstAccountNumber ?? DEFAULT_FIRST_ACCOUNT_NUMBER;
  }

  /**
   * Open a new account with a zero balance
   *
   * The whole input is validated before anything is stored, so a bad PIN
   * leaves no half-created account behind. Without an explicit account
   * number the next free one is generated.
   */
  createAccount(input: CreateAccountInput): AccountSummary {
    const parsed = CreateAccountInputSchema.safeParse(input);
    if (!parsed.success) {
      throw toValidationError(parsed.error);
    }

    const { ownerName, age, pin } = parsed.data;
    const accountId = parsed.data.accountId ?? this.nextAccountNumber();
    if (this.accounts.has(accountId)) {
      throw new ValidationError('duplicate', `Account already exists: ${accountId}`);
    }

    const timestamp = this.clock();
    const account: Account = {
      id: accountId,
      ownerName,
      age,
      balanceCents: 0,
      pinHash: pin === undefined ? null : hashPin(pin),
      history: [createRecord('account-creation', 0, timestamp)],
      createdAt: timestamp,
    };
    this.accounts.insert(account);

    this.events.emit({
      type: 'account.created',
      accountId,
      timestamp,
      metadata: { ownerName, hasPin: account.pinHash !== null },
    });

    return toSummary(account);
  }

  /**
   * Set or replace the account PIN
   */
  setPin(accountId: string, pin: string): void {
    const account = this.requireAccount(accountId);
    const parsed = PinSchema.safeParse(pin);
    if (!parsed.success) {
      throw new ValidationError('bad-pin-format');
    }

    account.pinHash = hashPin(parsed.data);
    this.events.emit({ type: 'account.pin_set', accountId, timestamp: this.clock() });
  }

  /**
   * Check a PIN without side effects
   * Unknown accounts and accounts without a PIN never authenticate
   */
  authenticate(accountId: string, pin: string): boolean {
    const account = this.accounts.findById(accountId);
    if (!account || account.pinHash === null) {
      return false;
    }
    return verifyPin(pin, account.pinHash);
  }

  deposit(accountId: string, pin: string, amount: number): number {
    const account = this.authorize(accountId, pin);
    const cents = toCents(amount);
    if (!Number.isSafeInteger(account.balanceCents + cents)) {
      throw new ValidationError('invalid-amount', 'Amount is too large.');
    }

    account.balanceCents += cents;
    const record = this.append(account, 'deposit', cents);
    this.events.emit({
      type: 'account.deposit',
      accountId,
      timestamp: record.timestamp,
      metadata: { amount: record.amount, balance: fromCents(account.balanceCents) },
    });

    return fromCents(account.balanceCents);
  }

  withdraw(accountId: string, pin: string, amount: number): number {
    const account = this.authorize(accountId, pin);
    const cents = toCents(amount);
    if (cents > account.balanceCents) {
      throw new InsufficientFundsError(fromCents(account.balanceCents), fromCents(cents));
    }

    account.balanceCents -= cents;
    const record = this.append(account, 'withdrawal', cents);
    this.events.emit({
      type: 'account.withdrawal',
      accountId,
      timestamp: record.timestamp,
      metadata: { amount: record.amount, balance: fromCents(account.balanceCents) },
    });

    return fromCents(account.balanceCents);
  }

  viewBalance(accountId: string, pin: string): number {
    return fromCents(this.authorize(accountId, pin).balanceCents);
  }

  /**
   * Full history in insertion order
   * Returns copies; mutating them does not touch the ledger
   */
  transactionHistory(accountId: string, pin: string): readonly TransactionRecord[] {
    return this.authorize(accountId, pin).history.map((record) => ({
      ...record,
      timestamp: new Date(record.timestamp.getTime()),
    }));
  }

  hasAccount(accountId: string): boolean {
    return this.accounts.has(accountId);
  }

  private requireAccount(accountId: string): Account {
    const account = this.accounts.findById(accountId);
    if (!account) {
      throw new AccountNotFoundError(accountId);
    }
    return account;
  }

  private authorize(accountId: string, pin: string): Account {
    const account = this.requireAccount(accountId);

    let failure: AuthFailureReason | null = null;
    if (account.pinHash === null) {
      failure = 'pin-not-set';
    } else if (!verifyPin(pin, account.pinHash)) {
      failure = 'pin-mismatch';
    }

    if (failure) {
      this.events.emit({
        type: 'account.auth_failed',
        accountId,
        timestamp: this.clock(),
        metadata: { reason: failure },
      });
      throw new AuthError(failure);
    }

    return account;
  }

  private append(account: Account, kind: TransactionKind, cents: number): TransactionRecord {
    const record = createRecord(kind, fromCents(cents), this.clock());
    account.history.push(record);
    return record;
  }

  private nextAccountNumber(): string {
    let candidate = this.firstAccountNumber + this.accounts.count();
    while (this.accounts.has(String(candidate))) {
      candidate += 1;
    }
    return String(candidate);
  }
}

function createRecord(kind: TransactionKind, amount: number, timestamp: Date): TransactionRecord {
  return Object.freeze(TransactionRecordSchema.parse({ kind, amount, timestamp }));
}

function toSummary(account: Account): AccountSummary {
  return {
    id: account.id,
    ownerName: account.ownerName,
    age: account.age,
    balance: fromCents(account.balanceCents),
    hasPin: account.pinHash !== null,
    createdAt: new Date(account.createdAt.getTime()),
  };
}

/**
 * Map the first schema issue onto a ledger validation code
 */
function toValidationError(error: ZodError): ValidationError {
  const issue = error.issues[0];
  if (!issue) {
    return new ValidationError('invalid-input');
  }

  switch (issue.path[0]) {
    case 'accountId':
      return new ValidationError('invalid-account-id', issue.message);
    case 'ownerName':
      return new ValidationError('empty-name', issue.message);
    case 'age':
      return issue.code === 'too_small'
        ? new ValidationError('underage', issue.message)
        : new ValidationError('invalid-age', issue.message);
    case 'pin':
      return new ValidationError('bad-pin-format', issue.message);
    default:
      return new ValidationError('invalid-input', issue.message);
  }
}
