import { randomInt } from 'crypto';
import { Account } from '../domain/deposit/account.js';
import { AmountTooLargeError } from '../domain/deposit/errors.js';
import { formatAmount } from '../domain/deposit/money.js';
import {
  DepositRule,
  StrategyTable,
  createStrategyTable,
} from '../domain/deposit/rules.js';
import { assertAlphabeticName } from '../domain/deposit/validation.js';

/**
 * Where the ledger reports what it did.
 */
export interface LedgerOutput {
  info(line: string): void;
  error(line: string): void;
}

export interface DepositorSummary {
  id: string;
  name: string;
  depositAmount: number;
}

export type IdGenerator = () => string;

const ID_MIN = 100000;
const ID_MAX = 999999;

/**
 * Random six-digit identifier behind a prefix, e.g. PZ482913.
 * Existing identifiers are not consulted.
 */
export function createIdGenerator(
  prefix = 'PZ',
  nextInt: (min: number, max: number) => number = (min, max) =>
    randomInt(min, max + 1)
): IdGenerator {
  return () => `${prefix}${nextInt(ID_MIN, ID_MAX)}`;
}

export interface LedgerOptions {
  output: LedgerOutput;
  generateId?: IdGenerator;
  strategies?: StrategyTable;
}

/**
 * In-memory collection of depositor accounts in insertion order.
 */
export class Ledger {
  private readonly accounts: Account[] = [];
  private readonly output: LedgerOutput;
  private readonly generateId: IdGenerator;
  readonly strategies: StrategyTable;

  constructor(options: LedgerOptions) {
    this.output = options.output;
    this.generateId = options.generateId ?? createIdGenerator();
    this.strategies = options.strategies ?? createStrategyTable();
  }

  get size(): number {
    return this.accounts.length;
  }

  addDepositor(name: string, rule: DepositRule): string {
    assertAlphabeticName(name);

    const id = this.generateId();
    this.accounts.push(Account.create(id, name, rule));

    this.output.info(`Depositor added successfully! User ID: ${id}`);
    return id;
  }

  /**
   * First account whose identifier matches exactly.
   */
  findAccount(id: string): Account | undefined {
    return this.accounts.find((account) => account.id === id);
  }

  /**
   * Returns false when no account has this identifier. A deposit refused
   * by the account's rule is reported and still counts as found.
   * NegativeAmountError propagates.
   */
  depositToAccount(id: string, amount: number): boolean {
    const account = this.findAccount(id);
    if (!account) {
      return false;
    }

    try {
      account.deposit(amount);
      this.output.info(
        `Deposit of ${formatAmount(amount)} made to account ID: ${id}`
      );
    } catch (error) {
      if (!(error instanceof AmountTooLargeError)) {
        throw error;
      }
      this.output.error(`Error: ${error.message}`);
    }
    return true;
  }

  totalDeposits(): number {
    return this.accounts.reduce(
      (total, account) => total + account.computeCurrentDeposit(),
      0
    );
  }

  listDepositors(): DepositorSummary[] {
    return this.accounts.map((account) => ({
      id: account.id,
      name: account.name,
      depositAmount: account.computeCurrentDeposit(),
    }));
  }
}
