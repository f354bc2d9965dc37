import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      mode: 'tests_then_interactive',
      firstAccountNumber: 1001,
      currencySymbol: '₹',
      logLevel: 'warn',
    });
  });

  it('reads overrides from the environment', () => {
    expect(
      loadConfig({
        BANK_MODE: 'tests_only',
        BANK_FIRST_ACCOUNT_NUMBER: '2000',
        BANK_CURRENCY_SYMBOL: '$',
        LOG_LEVEL: 'debug',
      })
    ).toEqual({
      mode: 'tests_only',
      firstAccountNumber: 2000,
      currencySymbol: '$',
      logLevel: 'debug',
    });
  });

  it('treats blank variables as unset', () => {
    expect(loadConfig({ BANK_MODE: '  ', LOG_LEVEL: '' }).mode).toBe('tests_then_interactive');
  });

  it('lists every invalid variable', () => {
    try {
      loadConfig({ BANK_MODE: 'forever', BANK_FIRST_ACCOUNT_NUMBER: '-4' });
      throw new Error('loadConfig should have failed');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.problems).toHaveLength(2);
        expect(error.problems[0]).toMatch(/^BANK_MODE: /);
        expect(error.problems[1]).toMatch(/^BANK_FIRST_ACCOUNT_NUMBER: /);
        expect(error.message.startsWith('Invalid configuration: BANK_MODE: ')).toBe(true);
      }
    }
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/^Invalid configuration: LOG_LEVEL: /);
  });
});
