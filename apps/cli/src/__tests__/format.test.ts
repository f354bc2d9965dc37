import { describe, it, expect } from 'vitest';
import { formatMoney, formatRecord, formatTimestamp } from '../format.js';

describe('format', () => {
  it('prints money with two decimals and the currency symbol', () => {
    expect(formatMoney(60, '₹')).toBe('₹60.00');
    expect(formatMoney(10.5, '$')).toBe('$10.50');
  });

  it('prints local timestamps', () => {
    expect(formatTimestamp(new Date(2026, 2, 4, 5, 6, 7))).toBe('2026-03-04 05:06:07');
  });

  it('prints a transaction record on one line', () => {
    const record = { kind: 'withdrawal' as const, amount: 40, timestamp: new Date(2026, 11, 31, 23, 59, 0) };
    expect(formatRecord(record, '$')).toBe('2026-12-31 23:59:00 - Withdrawal: $40.00');
  });
});
