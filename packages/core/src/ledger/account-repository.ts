/**
 * Account Repository
 *
 * In-memory storage for accounts, keyed by account number.
 * No business logic; the Ledger enforces every invariant.
 */

import type { Account } from './ledger-types.js';

export interface AccountRepository {
  has(accountId: string): boolean;
  findById(accountId: string): Account | undefined;
  insert(account: Account): void;
  count(): number;
}

export class InMemoryAccountRepository implements AccountRepository {
  private readonly accounts = new Map<string, Account>();

  has(accountId: string): boolean {
    return this.accounts.has(accountId);
  }

  findById(accountId: string): Account | undefined {
    return this.accounts.get(accountId);
  }

  /**
   * Insert a new account
   * Throws if the key is already taken
   */
  insert(account: Account): void {
    if (this.accounts.has(account.id)) {
      throw new Error(`Account ${account.id} is already stored`);
    }
    this.accounts.set(account.id, account);
  }

  count(): number {
    return this.accounts.size;
  }
}
