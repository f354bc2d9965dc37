/**
 * @pinbank/observability
 *
 * Structured logging for the banking simulator, built on Pino.
 */

export { createLogger, logger, redactPins, resolveLogLevel } from './logger.js';
export type { Logger } from './logger.js';
