import { PIN_LENGTH, PIN_PATTERN } from '@pinbank/auth';
import { z } from 'zod';

export const PinSchema = z
  .string()
  .regex(PIN_PATTERN, `PIN must be exactly ${PIN_LENGTH} digits (numbers only).`);

export type Pin = z.infer<typeof PinSchema>;

export const MINIMUM_ACCOUNT_AGE = 18;

// Lookups use the id verbatim, so it must arrive already trimmed
export const AccountIdSchema = z
  .string()
  .min(1, 'Account number cannot be empty.')
  .refine((id) => id === id.trim(), 'Account number cannot start or end with spaces.');

export const CreateAccountInputSchema = z.object({
  accountId: AccountIdSchema.optional(),
  ownerName: z.string().trim().min(1, 'Name cannot be empty.'),
  age: z
    .number({ invalid_type_error: 'Age must be an integer.' })
    .int('Age must be an integer.')
    .min(MINIMUM_ACCOUNT_AGE, `Must be ${MINIMUM_ACCOUNT_AGE} or older to create account.`),
  pin: PinSchema.optional(),
});

export type CreateAccountInput = z.input<typeof CreateAccountInputSchema>;
export type CreateAccount = z.infer<typeof CreateAccountInputSchema>;
