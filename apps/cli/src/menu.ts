/**
 * Interactive menu
 *
 * Maps menu choices onto ledger operations. Ledger errors are printed and
 * the loop continues; anything else propagates to the caller.
 */

import { isValidPinFormat } from '@pinbank/auth';
import { AccountNotFoundError, LedgerError, ValidationError } from '@pinbank/core';
import type { Ledger } from '@pinbank/core';
import { MINIMUM_ACCOUNT_AGE } from '@pinbank/types';
import { formatMoney, formatRecord } from './format.js';
import { formatReport, runSelfTests } from './self-test.js';
import type { Terminal } from './terminal.js';

export interface MenuOptions {
  ledger: Ledger;
  terminal: Terminal;
  currencySymbol: string;
}

const RULE = '-'.repeat(50);

const MENU = [
  RULE,
  'Welcome to Simple Banking System (PIN-secured Interactive Mode)',
  '1. Create New Account (optionally set PIN now)',
  '2. Set / Update PIN for an account',
  '3. Deposit Money (requires PIN)',
  '4. Withdraw Money (requires PIN)',
  '5. View Balance (requires PIN)',
  '6. View Transaction History (requires PIN)',
  '7. Run Automated Tests',
  '8. Exit',
  RULE,
];

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Raised when standard input closes mid-conversation
 */
class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export function parseAmount(raw: string): number {
  if (!DECIMAL_PATTERN.test(raw)) {
    throw new ValidationError('invalid-amount');
  }
  return Number(raw);
}

export class Menu {
  private readonly ledger: Ledger;
  private readonly terminal: Terminal;
  private readonly currencySymbol: string;

  constructor(options: MenuOptions) {
    this.ledger = options.ledger;
    this.terminal = options.terminal;
    this.currencySymbol = options.currencySymbol;
  }

  /**
   * Run until the user picks Exit or input closes
   */
  async run(): Promise<void> {
    try {
      let running = true;
      while (running) {
        running = await this.step();
      }
    } catch (error) {
      if (!(error instanceof InputClosedError)) {
        throw error;
      }
    }
    this.terminal.print('Goodbye!');
  }

  private async step(): Promise<boolean> {
    for (const line of MENU) {
      this.terminal.print(line);
    }
    const choice = await this.read('Enter your choice (1-8): ');

    try {
      switch (choice) {
        case '1':
          await this.createAccount();
          break;
        case '2':
          await this.setPin();
          break;
        case '3':
          await this.deposit();
          break;
        case '4':
          await this.withdraw();
          break;
        case '5':
          await this.viewBalance();
          break;
        case '6':
          await this.viewHistory();
          break;
        case '7':
          this.printLines(formatReport(runSelfTests()));
          break;
        case '8':
          return false;
        default:
          this.terminal.print('Invalid choice. Enter 1-8.');
      }
    } catch (error) {
      if (!(error instanceof LedgerError)) {
        throw error;
      }
      this.terminal.print(`Error: ${error.message}`);
    }
    return true;
  }

  private async createAccount(): Promise<void> {
    for (;;) {
      this.terminal.print("(Enter 'c' at name prompt to cancel account creation)");
      const name = await this.read('Enter full name: ');
      if (name.toLowerCase() === 'c') {
        this.terminal.print('Account creation cancelled by user.');
        return;
      }

      const ageInput = await this.read('Enter age: ');
      if (!INTEGER_PATTERN.test(ageInput)) {
        this.terminal.print('Invalid age input. Please enter a valid integer age.');
        continue;
      }
      const age = Number(ageInput);
      if (age < MINIMUM_ACCOUNT_AGE) {
        this.terminal.print(`Age is not over ${MINIMUM_ACCOUNT_AGE}. You cannot create account.`);
        continue;
      }

      const setNow = await this.read('Do you want to set a 4-digit PIN now? (y/n): ');
      const pin = setNow.toLowerCase() === 'y' ? await this.readNewPin('Enter 4-digit PIN: ') : undefined;

      try {
        const account = this.ledger.createAccount({ ownerName: name, age, pin });
        this.terminal.print(
          pin === undefined
            ? `✅ Account created: ${account.id} (No PIN set). Use option 2 to set PIN.`
            : `✅ Account created: ${account.id} (PIN set)`
        );
        return;
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        this.terminal.print(`Error: ${error.message}`);
      }
    }
  }

  private async setPin(): Promise<void> {
    const accountId = await this.read('Account number: ');
    if (!this.ledger.hasAccount(accountId)) {
      throw new AccountNotFoundError(accountId);
    }
    const pin = await this.readNewPin('Enter new 4-digit PIN: ');
    this.ledger.setPin(accountId, pin);
    this.terminal.print('✅ PIN set/updated successfully.');
  }

  private async deposit(): Promise<void> {
    const { accountId, pin } = await this.readCredentials();
    const amount = parseAmount(await this.read('Amount to deposit: '));
    const balance = this.ledger.deposit(accountId, pin, amount);
    this.terminal.print(
      `✅ Deposited ${this.money(amount)}. New balance: ${this.money(balance)}`
    );
  }

  private async withdraw(): Promise<void> {
    const { accountId, pin } = await this.readCredentials();
    const amount = parseAmount(await this.read('Amount to withdraw: '));
    const balance = this.ledger.withdraw(accountId, pin, amount);
    this.terminal.print(
      `✅ Withdrawn ${this.money(amount)}. New balance: ${this.money(balance)}`
    );
  }

  private async viewBalance(): Promise<void> {
    const { accountId, pin } = await this.readCredentials();
    const balance = this.ledger.viewBalance(accountId, pin);
    this.terminal.print(`💰 Current balance: ${this.money(balance)}`);
  }

  private async viewHistory(): Promise<void> {
    const { accountId, pin } = await this.readCredentials();
    const history = this.ledger.transactionHistory(accountId, pin);
    this.terminal.print(`📜 Transaction history for ${accountId}:`);
    this.printLines(history.map((record) => `  ${formatRecord(record, this.currencySymbol)}`));
  }

  private async readCredentials(): Promise<{ accountId: string; pin: string }> {
    const accountId = await this.read('Account number: ');
    const pin = await this.read('Enter 4-digit PIN: ');
    return { accountId, pin };
  }

  /**
   * Ask for a PIN twice until both entries match and the format is valid
   */
  private async readNewPin(prompt: string): Promise<string> {
    for (;;) {
      const pin = await this.read(prompt);
      const confirmation = await this.read('Confirm PIN: ');
      if (pin !== confirmation) {
        this.terminal.print('PINs do not match. Try again.');
        continue;
      }
      if (!isValidPinFormat(pin)) {
        this.terminal.print(`Error: ${new ValidationError('bad-pin-format').message}`);
        continue;
      }
      return pin;
    }
  }

  private async read(prompt: string): Promise<string> {
    const answer = await this.terminal.ask(prompt);
    if (answer === null) {
      throw new InputClosedError();
    }
    return answer;
  }

  private money(amount: number): string {
    return formatMoney(amount, this.currencySymbol);
  }

  private printLines(lines: readonly string[]): void {
    for (const line of lines) {
      this.terminal.print(line);
    }
  }
}
