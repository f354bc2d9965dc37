/**
 * Ledger Domain Errors
 *
 * Custom error classes for ledger business rule violations.
 * These errors are thrown by the Ledger and caught by the CLI at the menu boundary.
 */

export class LedgerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ValidationErrorCode =
  | 'underage'
  | 'duplicate'
  | 'bad-pin-format'
  | 'non-positive-amount'
  | 'invalid-amount'
  | 'invalid-age'
  | 'empty-name'
  | 'invalid-account-id'
  | 'invalid-input';

const VALIDATION_MESSAGES: Record<ValidationErrorCode, string> = {
  underage: 'Must be 18 or older to create account.',
  duplicate: 'Account already exists.',
  'bad-pin-format': 'PIN must be exactly 4 digits (numbers only).',
  'non-positive-amount': 'Amount must be positive.',
  'invalid-amount': 'Amount must be numeric.',
  'invalid-age': 'Age must be an integer.',
  'empty-name': 'Name cannot be empty.',
  'invalid-account-id': 'Account number cannot be empty.',
  'invalid-input': 'Invalid input.',
};

export class ValidationError extends LedgerError {
  constructor(
    readonly code: ValidationErrorCode,
    message: string = VALIDATION_MESSAGES[code]
  ) {
    super(message);
  }
}

export type AuthFailureReason = 'pin-not-set' | 'pin-mismatch';

export class AuthError extends LedgerError {
  constructor(readonly reason: AuthFailureReason) {
    super(
      reason === 'pin-not-set'
        ? 'PIN not set for this account. Set a PIN before performing this action.'
        : 'Invalid PIN.'
    );
  }
}

export class InsufficientFundsError extends LedgerError {
  constructor(
    readonly balance: number,
    readonly requested: number
  ) {
    super('Insufficient balance.');
  }
}

export class AccountNotFoundError extends LedgerError {
  constructor(readonly accountId: string) {
    super(`Account not found: ${accountId}`);
  }
}
