/**
 * Ledger Domain Types
 */

import type { CreateAccountInput, TransactionKind, TransactionRecord } from '@pinbank/types';
import type { AccountRepository } from './account-repository.js';
import type { LedgerEventSink } from './ledger-events.js';

export type { CreateAccountInput, TransactionKind, TransactionRecord };

/**
 * Live account record, owned by the repository and never handed to callers
 */
export interface Account {
  id: string;
  ownerName: string;
  age: number;
  // Minor units (cents)
  balanceCents: number;
  pinHash: string | null;
  history: TransactionRecord[];
  createdAt: Date;
}

export interface AccountSummary {
  id: string;
  ownerName: string;
  age: number;
  balance: number;
  hasPin: boolean;
  createdAt: Date;
}

export interface LedgerOptions {
  repository?: AccountRepository;
  events?: LedgerEventSink;
  clock?: () => Date;
  firstAccountNumber?: number;
}
