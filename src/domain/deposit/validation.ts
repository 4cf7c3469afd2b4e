import { z } from 'zod';
import {
  NegativeAmountError,
  NotAlphabeticError,
  NotNumericError,
} from './errors.js';

// ASCII letters only; the empty string is accepted.
export const depositorNameSchema = z
  .string()
  .regex(/^[A-Za-z]*$/, 'Only letters are allowed');

// Whole-string decimal: optional sign, fraction and exponent.
export const numericSchema = z
  .string()
  .regex(/^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/, 'Not a numeric value')
  .transform(Number);

export function validateNonNegative(amount: number): void {
  if (amount < 0) {
    throw new NegativeAmountError();
  }
}

export function isAlphabeticName(name: string): boolean {
  return depositorNameSchema.safeParse(name).success;
}

export function assertAlphabeticName(name: string): void {
  if (!isAlphabeticName(name)) {
    throw new NotAlphabeticError();
  }
}

/**
 * Parse a string that is a decimal number in its entirety.
 * Returns undefined when anything is left over.
 */
export function parseNumeric(input: string): number | undefined {
  const result = numericSchema.safeParse(input);
  return result.success ? result.data : undefined;
}

/**
 * Parse a deposit amount typed by the user.
 */
export function parseAmount(input: string): number {
  const amount = parseNumeric(input);
  if (amount === undefined) {
    throw new NotNumericError();
  }
  validateNonNegative(amount);
  return amount;
}
