/**
 * Ledger event emitter for audit logging
 * Events never carry a PIN or a PIN hash
 */

import type { AuthFailureReason } from './ledger-errors.js';

export type LedgerEventType =
  | 'account.created'
  | 'account.pin_set'
  | 'account.deposit'
  | 'account.withdrawal'
  | 'account.auth_failed';

interface LedgerEventBase {
  type: LedgerEventType;
  accountId: string;
  timestamp: Date;
}

export interface AccountCreatedEvent extends LedgerEventBase {
  type: 'account.created';
  metadata: { ownerName: string; hasPin: boolean };
}

export interface PinSetEvent extends LedgerEventBase {
  type: 'account.pin_set';
}

export interface BalanceChangedEvent extends LedgerEventBase {
  type: 'account.deposit' | 'account.withdrawal';
  metadata: { amount: number; balance: number };
}

export interface AuthFailedEvent extends LedgerEventBase {
  type: 'account.auth_failed';
  metadata: { reason: AuthFailureReason };
}

export type LedgerEvent = AccountCreatedEvent | PinSetEvent | BalanceChangedEvent | AuthFailedEvent;

export type LedgerEventHandler = (event: LedgerEvent) => void | Promise<void>;

export interface LedgerEventSink {
  emit(event: LedgerEvent): void;
}

export class LedgerEventEmitter implements LedgerEventSink {
  private handlers: LedgerEventHandler[] = [];

  constructor(
    private readonly onHandlerError: (error: unknown) => void = (error) => {
      console.error('Ledger event handler error:', error);
    }
  ) {}

  on(handler: LedgerEventHandler) {
    this.handlers.push(handler);
  }

  /**
   * Deliver an event to every handler
   * Handler failures are reported and never reach the ledger operation
   */
  emit(event: LedgerEvent) {
    for (const handler of this.handlers) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch(this.onHandlerError);
        }
      } catch (error) {
        this.onHandlerError(error);
      }
    }
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers() {
    this.handlers = [];
  }
}
