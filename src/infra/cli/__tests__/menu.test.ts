import { describe, it, expect, beforeEach } from 'vitest';
import { MENU, runMenu } from '../menu.js';
import { Ledger } from '../../../application/ledger.js';
import { ScriptedTerminal } from './scriptedTerminal.js';

function sequentialIds(): () => string {
  let next = 100001;
  return () => `PZ${next++}`;
}

describe('runMenu', () => {
  let ids: () => string;

  beforeEach(() => {
    ids = sequentialIds();
  });

  async function run(tokens: string[]) {
    const terminal = new ScriptedTerminal(tokens);
    const ledger = new Ledger({ output: terminal, generateId: ids });
    const reason = await runMenu(terminal, ledger);
    const printed = terminal.out.filter((line) => line !== MENU);
    return { terminal, ledger, reason, printed };
  }

  it('should print the menu and exit on 5', async () => {
    const { terminal, reason, printed } = await run(['5']);

    expect(reason).toBe('exit');
    expect(terminal.out[0]).toBe(
      '\nSelect an option:\n1. Add Depositor\n2. List Depositors\n3. View Total Deposits\n4. Deposit Amount\n5. Exit'
    );
    expect(terminal.prompts).toEqual(['Enter your choice: ']);
    expect(printed).toEqual(['Exiting program.']);
  });

  it('should add a bonus-capped depositor, deposit and list 250', async () => {
    const { terminal, reason, printed } = await run([
      '1', 'Alice', '2',
      '4', 'PZ100001', '50',
      '2',
      '5',
    ]);

    expect(reason).toBe('exit');
    expect(printed).toEqual([
      'Depositor added successfully! User ID: PZ100001',
      'Deposit of 50 made to account ID: PZ100001',
      '\nList of depositors:',
      'Depositor ID: PZ100001, Name: Alice, Deposit Amount: 250',
      'Exiting program.',
    ]);
    expect(terminal.err).toEqual([]);
    expect(terminal.prompts).toEqual([
      'Enter your choice: ',
      'Enter depositor name (letters only): ',
      'Choose deposit strategy (1: Normal, 2: Fixed): ',
      'Enter your choice: ',
      'Enter depositor ID to deposit to: ',
      'Enter deposit amount: ',
      'Enter your choice: ',
      'Enter your choice: ',
    ]);
  });

  it('should report an empty listing', async () => {
    const { printed } = await run(['2', '5']);

    expect(printed).toEqual(['No depositors were added.', 'Exiting program.']);
  });

  it('should report that nothing has been deposited', async () => {
    const { printed } = await run(['3', '5']);

    expect(printed).toEqual([
      'No deposits have been made yet.',
      'Exiting program.',
    ]);
  });

  it('should print the total of displayed deposits', async () => {
    const { printed } = await run([
      '1', 'Bob', '1',
      '4', 'PZ100001', '12.5',
      '3',
      '5',
    ]);

    expect(printed[2]).toBe('Total deposits: 12.5');
  });

  it('should report an unknown depositor', async () => {
    const { terminal, ledger, reason } = await run(['4', 'PZ999999', '10', '5']);

    expect(reason).toBe('exit');
    expect(terminal.err).toEqual(['No depositor found with the ID: PZ999999']);
    expect(ledger.size).toBe(0);
  });

  it('should reject an unknown choice and show the menu again', async () => {
    const { terminal, reason } = await run(['9', 'add', '5']);

    expect(reason).toBe('exit');
    expect(terminal.err).toEqual([
      'Invalid choice. Please try again.',
      'Invalid choice. Please try again.',
    ]);
    expect(terminal.out.filter((line) => line === MENU)).toHaveLength(3);
  });

  it('should report a deposit above the ceiling and keep going', async () => {
    const { terminal, reason, printed } = await run([
      '1', 'Cara', '2',
      '4', 'PZ100001', '2000000',
      '2',
      '5',
    ]);

    expect(reason).toBe('exit');
    expect(terminal.err).toEqual([
      'Error: The maximum deposit amount for the fixed account is 1,000,000. Please deposit less.',
    ]);
    expect(printed).toContain(
      'Depositor ID: PZ100001, Name: Cara, Deposit Amount: 100'
    );
  });

  it('should report errors raised while listing and keep going', async () => {
    // A balance above the ceiling cannot be displayed under the bonus rule
    const { terminal, reason, printed } = await run([
      '1', 'Cara', '2',
      '4', 'PZ100001', '1000000',
      '2',
      '3',
      '5',
    ]);

    expect(reason).toBe('exit');
    expect(printed).toEqual([
      'Depositor added successfully! User ID: PZ100001',
      'Deposit of 1e+06 made to account ID: PZ100001',
      'Exiting program.',
    ]);
    expect(terminal.err).toEqual([
      'Error: The maximum deposit amount for the fixed account is 1,000,000. Please deposit less.',
      'Error: The maximum deposit amount for the fixed account is 1,000,000. Please deposit less.',
    ]);
  });

  it('should stop when input runs out mid-prompt', async () => {
    const { terminal, ledger, reason } = await run(['1', 'Alice']);

    expect(reason).toBe('inputClosed');
    expect(terminal.err).toEqual(['Error: Input stream closed']);
    expect(ledger.size).toBe(0);
  });

  it('should keep retrying sub-prompts without returning to the menu', async () => {
    const { terminal, printed } = await run([
      '1', '123', 'Al!ce', 'Alice', '0', '1',
      '5',
    ]);

    expect(printed[0]).toBe('Depositor added successfully! User ID: PZ100001');
    expect(terminal.err).toEqual([
      'Invalid name. Only letters are allowed. Please try again.',
      'Invalid name. Only letters are allowed. Please try again.',
      'Invalid strategy choice. Please try again.',
    ]);
    expect(terminal.out.filter((line) => line === MENU)).toHaveLength(2);
  });
});
