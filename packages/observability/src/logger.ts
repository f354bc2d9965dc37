import pino from 'pino';

/**
 * Redact PIN material from logs
 * - Raw PINs and confirmations typed at the prompt
 * - Stored PIN hashes
 */
const REDACTION_PATHS = [
  'pin',
  'pinHash',
  'confirmPin',
  '*.pin',
  '*.pinHash',
  '*.confirmPin',
];

const INLINE_PIN_PATTERN = /\bpin=\d{4}\b/gi;

/**
 * Mask `pin=1234` fragments in free-form strings
 */
export function redactPins(value: string): string {
  return value.replace(INLINE_PIN_PATTERN, 'pin=[REDACTED]');
}

export type Logger = pino.Logger;

const DEFAULT_LEVEL = 'info';

/**
 * Level from LOG_LEVEL; blank or unknown names fall back to info
 */
export function resolveLogLevel(raw: string | undefined): string {
  const level = raw?.trim().toLowerCase() ?? '';
  if (level === 'silent' || Object.hasOwn(pino.levels.values, level)) {
    return level;
  }
  return DEFAULT_LEVEL;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of PINs and PIN hashes
 * - Structured JSON output
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const config: pino.LoggerOptions = {
    level: resolveLogLevel(process.env.LOG_LEVEL),
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    // Format timestamps as ISO 8601
    timestamp: pino.stdTimeFunctions.isoTime,
    hooks: {
      logMethod(args, method) {
        // Message strings sit first, or second after a merge object
        if (typeof args[0] === 'string') {
          args[0] = redactPins(args[0]);
        }
        if (typeof args[1] === 'string') {
          args[1] = redactPins(args[1]);
        }
        method.apply(this, args);
      },
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
