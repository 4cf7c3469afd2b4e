import { AmountTooLargeError } from './errors.js';

/**
 * Deposit calculation rules.
 * A rule is an immutable value; accounts share it by reference.
 */
export type DepositRule = PlainRule | BonusCappedRule;

export interface PlainRule {
  readonly kind: 'plain';
}

export interface BonusCappedRule {
  readonly kind: 'bonusCapped';
  readonly bonus: number;
  readonly ceiling: number;
}

export const DEFAULT_BONUS = 100;
export const DEFAULT_CEILING = 1_000_000;

export function plainRule(): PlainRule {
  const rule: PlainRule = { kind: 'plain' };
  return Object.freeze(rule);
}

export function bonusCappedRule(
  bonus: number = DEFAULT_BONUS,
  ceiling: number = DEFAULT_CEILING
): BonusCappedRule {
  const rule: BonusCappedRule = { kind: 'bonusCapped', bonus, ceiling };
  return Object.freeze(rule);
}

/**
 * Amount to credit for a deposit of `amount` under `rule`.
 * Throws AmountTooLargeError when a bonus-capped rule's ceiling is exceeded.
 */
export function applyRule(rule: DepositRule, amount: number): number {
  switch (rule.kind) {
    case 'plain':
      return amount;
    case 'bonusCapped':
      if (amount > rule.ceiling) {
        throw new AmountTooLargeError(rule.ceiling);
      }
      return amount + rule.bonus;
  }
}

/**
 * Strategies offered when adding a depositor, keyed by menu name.
 */
export interface StrategyTable {
  readonly normal: PlainRule;
  readonly fixed: BonusCappedRule;
}

export type StrategyName = keyof StrategyTable;

export function createStrategyTable(options: {
  bonus?: number;
  ceiling?: number;
} = {}): StrategyTable {
  const table: StrategyTable = {
    normal: plainRule(),
    fixed: bonusCappedRule(options.bonus, options.ceiling),
  };
  return Object.freeze(table);
}
