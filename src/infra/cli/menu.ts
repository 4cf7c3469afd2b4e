import { Ledger } from '../../application/ledger.js';
import { DomainError } from '../../domain/deposit/errors.js';
import { formatAmount } from '../../domain/deposit/money.js';
import {
  promptDepositAmount,
  promptDepositorId,
  promptDepositorName,
  promptStrategy,
} from './prompts.js';
import { InputClosedError, Terminal } from './terminal.js';

export const MENU = [
  '',
  'Select an option:',
  '1. Add Depositor',
  '2. List Depositors',
  '3. View Total Deposits',
  '4. Deposit Amount',
  '5. Exit',
].join('\n');

/**
 * How the menu loop ended: by the exit choice, or because input ran out.
 */
export type MenuExit = 'exit' | 'inputClosed';

type Choice = 'add' | 'list' | 'total' | 'deposit' | 'exit';

const CHOICES = new Map<string, Choice>([
  ['1', 'add'],
  ['2', 'list'],
  ['3', 'total'],
  ['4', 'deposit'],
  ['5', 'exit'],
]);

async function addDepositor(terminal: Terminal, ledger: Ledger): Promise<void> {
  const name = await promptDepositorName(terminal);
  const rule = await promptStrategy(terminal, ledger.strategies);
  ledger.addDepositor(name, rule);
}

function listDepositors(terminal: Terminal, ledger: Ledger): void {
  const depositors = ledger.listDepositors();
  if (depositors.length === 0) {
    terminal.info('No depositors were added.');
    return;
  }

  terminal.info('\nList of depositors:');
  for (const depositor of depositors) {
    terminal.info(
      `Depositor ID: ${depositor.id}, Name: ${depositor.name}, Deposit Amount: ${formatAmount(depositor.depositAmount)}`
    );
  }
}

function showTotal(terminal: Terminal, ledger: Ledger): void {
  const total = ledger.totalDeposits();
  if (total === 0) {
    terminal.info('No deposits have been made yet.');
  } else {
    terminal.info(`Total deposits: ${formatAmount(total)}`);
  }
}

async function deposit(terminal: Terminal, ledger: Ledger): Promise<void> {
  const id = await promptDepositorId(terminal);
  const amount = await promptDepositAmount(terminal);

  if (!ledger.depositToAccount(id, amount)) {
    terminal.error(`No depositor found with the ID: ${id}`);
  }
}

/**
 * Run the interactive menu until the user exits or input ends.
 * Domain errors are reported and the loop carries on.
 */
export async function runMenu(
  terminal: Terminal,
  ledger: Ledger
): Promise<MenuExit> {
  for (;;) {
    terminal.info(MENU);
    terminal.prompt('Enter your choice: ');

    try {
      const choice = CHOICES.get(await terminal.readToken());

      switch (choice) {
        case 'add':
          await addDepositor(terminal, ledger);
          break;
        case 'list':
          listDepositors(terminal, ledger);
          break;
        case 'total':
          showTotal(terminal, ledger);
          break;
        case 'deposit':
          await deposit(terminal, ledger);
          break;
        case 'exit':
          terminal.info('Exiting program.');
          return 'exit';
        default:
          terminal.error('Invalid choice. Please try again.');
      }
    } catch (error) {
      if (error instanceof InputClosedError) {
        terminal.error(`Error: ${error.message}`);
        return 'inputClosed';
      }
      if (error instanceof DomainError) {
        terminal.error(`Error: ${error.message}`);
        continue;
      }
      throw error;
    }
  }
}
