import { AmountSchema } from '@pinbank/types';
import { ValidationError } from './ledger-errors.js';

const CENTS_PER_UNIT = 100;

/**
 * Validate a caller-supplied amount and convert it to whole cents
 */
export function toCents(amount: number): number {
  const parsed = AmountSchema.safeParse(amount);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const code = issue?.code === 'too_small' ? 'non-positive-amount' : 'invalid-amount';
    throw new ValidationError(code, issue?.message);
  }

  const cents = Math.round(parsed.data * CENTS_PER_UNIT);
  if (cents <= 0) {
    throw new ValidationError('non-positive-amount');
  }
  if (!Number.isSafeInteger(cents)) {
    throw new ValidationError('invalid-amount', 'Amount is too large.');
  }

  return cents;
}

export function fromCents(cents: number): number {
  return cents / CENTS_PER_UNIT;
}
