import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_BONUS, DEFAULT_CEILING } from './domain/deposit/rules.js';

const configSchema = z.object({
  DEPOSITOR_ID_PREFIX: z
    .string()
    .regex(/^[A-Za-z]+$/, 'must be one or more letters')
    .default('PZ'),
  FIXED_DEPOSIT_BONUS: z.coerce.number().finite().nonnegative().default(DEFAULT_BONUS),
  FIXED_DEPOSIT_CEILING: z.coerce
    .number()
    .finite()
    .nonnegative()
    .default(DEFAULT_CEILING),
});

export interface AppConfig {
  idPrefix: string;
  fixedDepositBonus: number;
  fixedDepositCeiling: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Read configuration from the given environment.
 * Blank values fall back to their defaults.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value.trim() !== ''
    )
  );

  const result = configSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  return {
    idPrefix: result.data.DEPOSITOR_ID_PREFIX,
    fixedDepositBonus: result.data.FIXED_DEPOSIT_BONUS,
    fixedDepositCeiling: result.data.FIXED_DEPOSIT_CEILING,
  };
}

/**
 * Load `.env` (if any) into process.env, then parse it.
 */
export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
