import { z } from 'zod';

export const AmountSchema = z
  .number({ invalid_type_error: 'Amount must be numeric.' })
  .positive('Amount must be positive.')
  .finite('Amount must be numeric.');

export const TransactionKindSchema = z.enum(['account-creation', 'deposit', 'withdrawal']);

export type TransactionKind = z.infer<typeof TransactionKindSchema>;

export const TransactionRecordSchema = z.object({
  kind: TransactionKindSchema,
  amount: z.number().finite().nonnegative(),
  timestamp: z.date(),
});

export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;
