/**
 * Tests for logger redaction functionality
 * Verifies that PINs and PIN hashes never reach the log output
 */

import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, redactPins, resolveLogLevel } from '../logger.js';

function captureLogger() {
  const logs: string[] = [];
  const stream = {
    write: (log: string) => {
      logs.push(log);
    },
  };
  const logger = createLogger({ level: 'info' }, stream);
  return { logs, logger };
}

describe('Logger Redaction', () => {
  describe('PIN Field Redaction', () => {
    it('should redact top-level pin fields', () => {
      const { logs, logger } = captureLogger();

      logger.info({ accountId: '1001', pin: '1234' }, 'pin updated');

      expect(logs[0]).toBeDefined();
      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.pin).toBe('[REDACTED]');
      expect(logEntry.accountId).toBe('1001');
      expect(logEntry.msg).toBe('pin updated');
    });

    it('should redact nested pin and pinHash fields', () => {
      const { logs, logger } = captureLogger();

      logger.info({
        input: { pin: '1234', confirmPin: '1234', age: 20 },
        account: { id: '1001', pinHash: 'scrypt$abc$def' },
      });

      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.input.pin).toBe('[REDACTED]');
      expect(logEntry.input.confirmPin).toBe('[REDACTED]');
      expect(logEntry.input.age).toBe(20);
      expect(logEntry.account.pinHash).toBe('[REDACTED]');
      expect(logEntry.account.id).toBe('1001');
    });
  });

  describe('Inline PIN Redaction', () => {
    it('should mask pin fragments in a bare message', () => {
      const { logs, logger } = captureLogger();

      logger.info('retry with pin=1234');

      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.msg).toBe('retry with pin=[REDACTED]');
    });

    it('should mask pin fragments in a message after a merge object', () => {
      const { logs, logger } = captureLogger();

      logger.warn({ accountId: '1002' }, 'login PIN=4321 rejected');

      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.msg).toBe('login pin=[REDACTED] rejected');
      expect(logEntry.accountId).toBe('1002');
    });

    it('should leave numbers that are not pins alone', () => {
      expect(redactPins('deposited 1234 into 1001')).toBe('deposited 1234 into 1001');
      expect(redactPins('pin=12345')).toBe('pin=12345');
    });
  });

  describe('Timestamp Format', () => {
    it('should format timestamps as ISO 8601', () => {
      const { logs, logger } = captureLogger();

      logger.info({ msg: 'test' });

      const logEntry = JSON.parse(logs[0]!);
      expect(typeof logEntry.time).toBe('string');
      expect(logEntry.time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });
  });

  describe('Levels', () => {
    it('should drop entries below the configured level', () => {
      const logs: string[] = [];
      const logger = createLogger({ level: 'warn' }, { write: (log: string) => logs.push(log) });

      logger.info('ignored');
      logger.warn('kept');

      expect(logs).toHaveLength(1);
      expect(JSON.parse(logs[0]!).msg).toBe('kept');
    });
  });

  describe('Level Resolution', () => {
    const originalLevel = process.env.LOG_LEVEL;

    afterEach(() => {
      if (originalLevel === undefined) {
        delete process.env.LOG_LEVEL;
      } else {
        process.env.LOG_LEVEL = originalLevel;
      }
    });

    it('should accept pino level names in any case', () => {
      expect(resolveLogLevel('debug')).toBe('debug');
      expect(resolveLogLevel(' WARN ')).toBe('warn');
      expect(resolveLogLevel('silent')).toBe('silent');
    });

    it('should fall back to info for blank or unknown levels', () => {
      expect(resolveLogLevel(undefined)).toBe('info');
      expect(resolveLogLevel(' ')).toBe('info');
      expect(resolveLogLevel('verbose')).toBe('info');
      expect(resolveLogLevel('toString')).toBe('info');
    });

    it('should build a logger when LOG_LEVEL holds an unknown level', () => {
      process.env.LOG_LEVEL = 'verbose';
      const logs: string[] = [];

      const logger = createLogger(undefined, { write: (log: string) => logs.push(log) });
      logger.info('started');

      expect(logger.level).toBe('info');
      expect(JSON.parse(logs[0]!).msg).toBe('started');
    });
  });
});
