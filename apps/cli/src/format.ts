import type { TransactionKind, TransactionRecord } from '@pinbank/core';

const KIND_LABELS: Record<TransactionKind, string> = {
  'account-creation': 'Account created',
  deposit: 'Deposit',
  withdrawal: 'Withdrawal',
};

export function formatMoney(amount: number, currencySymbol: string): string {
  return `${currencySymbol}${amount.toFixed(2)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:mm:ss`
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatRecord(record: TransactionRecord, currencySymbol: string): string {
  return `${formatTimestamp(record.timestamp)} - ${KIND_LABELS[record.kind]}: ${formatMoney(record.amount, currencySymbol)}`;
}
