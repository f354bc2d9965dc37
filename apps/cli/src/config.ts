/**
 * CLI configuration, read from the environment
 */

import { z } from 'zod';

export const RUN_MODES = ['tests_then_interactive', 'interactive_only', 'tests_only'] as const;

export type RunMode = (typeof RUN_MODES)[number];

const EnvSchema = z.object({
  BANK_MODE: z.enum(RUN_MODES).default('tests_then_interactive'),
  BANK_FIRST_ACCOUNT_NUMBER: z.coerce.number().int().positive().default(1001),
  BANK_CURRENCY_SYMBOL: z.string().default('₹'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('warn'),
});

export interface CliConfig {
  mode: RunMode;
  firstAccountNumber: number;
  currencySymbol: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  // Blank variables count as unset
  const provided = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(provided);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    mode: parsed.data.BANK_MODE,
    firstAccountNumber: parsed.data.BANK_FIRST_ACCOUNT_NUMBER,
    currencySymbol: parsed.data.BANK_CURRENCY_SYMBOL,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
