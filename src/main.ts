#!/usr/bin/env node
import { AppConfig, ConfigError, loadConfig } from './config.js';
import { Ledger, createIdGenerator } from './application/ledger.js';
import { createStrategyTable } from './domain/deposit/rules.js';
import { runMenu } from './infra/cli/menu.js';
import { ConsoleTerminal } from './infra/cli/terminal.js';

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) {
        console.error(`Invalid configuration: ${issue}`);
      }
      return 1;
    }
    throw error;
  }

  const terminal = new ConsoleTerminal();
  const ledger = new Ledger({
    output: terminal,
    generateId: createIdGenerator(config.idPrefix),
    strategies: createStrategyTable({
      bonus: config.fixedDepositBonus,
      ceiling: config.fixedDepositCeiling,
    }),
  });

  try {
    const reason = await runMenu(terminal, ledger);
    return reason === 'exit' ? 0 : 1;
  } finally {
    terminal.close();
  }
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
