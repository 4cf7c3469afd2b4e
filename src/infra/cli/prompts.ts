import { NegativeAmountError, NotNumericError } from '../../domain/deposit/errors.js';
import { DepositRule, StrategyTable } from '../../domain/deposit/rules.js';
import { isAlphabeticName, parseAmount } from '../../domain/deposit/validation.js';
import { Terminal } from './terminal.js';

// Each prompt retries until the input is acceptable.

export async function promptDepositorName(terminal: Terminal): Promise<string> {
  for (;;) {
    terminal.prompt('Enter depositor name (letters only): ');
    const name = await terminal.readToken();
    if (isAlphabeticName(name)) {
      return name;
    }
    terminal.error('Invalid name. Only letters are allowed. Please try again.');
  }
}

export async function promptStrategy(
  terminal: Terminal,
  strategies: StrategyTable
): Promise<DepositRule> {
  for (;;) {
    terminal.prompt('Choose deposit strategy (1: Normal, 2: Fixed): ');
    const choice = await terminal.readToken();
    if (choice === '1') {
      return strategies.normal;
    }
    if (choice === '2') {
      return strategies.fixed;
    }
    terminal.error('Invalid strategy choice. Please try again.');
  }
}

export async function promptDepositAmount(terminal: Terminal): Promise<number> {
  for (;;) {
    terminal.prompt('Enter deposit amount: ');
    const input = await terminal.readToken();
    try {
      return parseAmount(input);
    } catch (error) {
      if (error instanceof NotNumericError) {
        terminal.error('Invalid amount. Please enter a numeric value.');
      } else if (error instanceof NegativeAmountError) {
        terminal.error('Amount cannot be negative. Please try again.');
      } else {
        throw error;
      }
    }
  }
}

export async function promptDepositorId(terminal: Terminal): Promise<string> {
  terminal.prompt('Enter depositor ID to deposit to: ');
  return terminal.readToken();
}
