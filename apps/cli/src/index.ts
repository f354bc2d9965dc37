#!/usr/bin/env node

/**
 * PinBank command-line entry point
 *
 * Usage:
 *   BANK_MODE=interactive_only npm start
 */

import pino from 'pino';
import { Ledger, LedgerEventEmitter } from '@pinbank/core';
import { createLogger } from '@pinbank/observability';
import { loadConfig } from './config.js';
import { Menu } from './menu.js';
import { formatReport, runSelfTests } from './self-test.js';
import { createTerminal } from './terminal.js';

async function main() {
  const config = loadConfig();
  // stdout belongs to the menu; logs go to stderr
  const logger = createLogger({ level: config.logLevel, name: 'pinbank' }, pino.destination(2));

  const events = new LedgerEventEmitter((error) => {
    logger.error({ err: error }, 'Ledger event handler failed');
  });
  events.on((event) => {
    logger.info({ event }, event.type);
  });

  const ledger = new Ledger({ events, firstAccountNumber: config.firstAccountNumber });
  const terminal = createTerminal(process.stdin, process.stdout);

  logger.debug({ mode: config.mode }, 'Starting');
  try {
    if (config.mode !== 'interactive_only') {
      for (const line of formatReport(runSelfTests())) {
        terminal.print(line);
      }
    }
    if (config.mode !== 'tests_only') {
      await new Menu({ ledger, terminal, currencySymbol: config.currencySymbol }).run();
    }
  } finally {
    terminal.close();
  }
}

main().catch((error: unknown) => {
  const fatalLogger = createLogger({ name: 'pinbank' }, pino.destination(2));
  fatalLogger.fatal({ err: error }, 'PinBank exited with an error');
  process.exitCode = 1;
});
