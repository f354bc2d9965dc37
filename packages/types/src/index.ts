export {
  PinSchema,
  AccountIdSchema,
  CreateAccountInputSchema,
  MINIMUM_ACCOUNT_AGE,
} from './account.schema.js';
export type { Pin, CreateAccountInput, CreateAccount } from './account.schema.js';

export {
  AmountSchema,
  TransactionKindSchema,
  TransactionRecordSchema,
} from './transaction.schema.js';
export type { TransactionKind, TransactionRecord } from './transaction.schema.js';
