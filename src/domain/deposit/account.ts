import { DepositRule, applyRule } from './rules.js';
import { validateNonNegative } from './validation.js';

/**
 * Account state snapshot.
 */
export interface AccountState {
  readonly id: string;
  readonly name: string;
  readonly balance: number;
  readonly rule: DepositRule;
}

/**
 * A depositor's account. The rule is shared with other accounts of the
 * same strategy and never reassigned.
 */
export class Account {
  private constructor(private state: AccountState) {}

  /**
   * Create a new Account with a zero balance.
   */
  static create(id: string, name: string, rule: DepositRule): Account {
    return new Account({ id, name, balance: 0, rule });
  }

  get id(): string {
    return this.state.id;
  }

  get name(): string {
    return this.state.name;
  }

  getState(): AccountState {
    return { ...this.state };
  }

  /**
   * Deposit amount as displayed: the rule applied to the stored balance.
   * The stored balance already carries the rule from each deposit, so a
   * bonus is counted once more here.
   */
  computeCurrentDeposit(): number {
    return applyRule(this.state.rule, this.state.balance);
  }

  /**
   * Credit `amount` passed through the rule.
   * Throws NegativeAmountError or AmountTooLargeError; the balance is
   * unchanged when it throws.
   */
  deposit(amount: number): void {
    validateNonNegative(amount);
    const credited = applyRule(this.state.rule, amount);
    this.state = {
      ...this.state,
      balance: this.state.balance + credited,
    };
  }
}
