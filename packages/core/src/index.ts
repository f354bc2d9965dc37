/**
 * @pinbank/core - Domain logic for the banking simulator
 *
 * The Account Ledger: account lifecycle, PIN management, balance mutation
 * and transaction history. All operations are synchronous and in-memory.
 */

export * from './ledger/index.js';
