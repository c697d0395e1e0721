import { z } from 'zod';
import { Decimal } from './money.js';
import { isValidDateOnly } from './date.js';
import { ValidationError } from '../infrastructure/errors.js';

const DECIMAL_TEXT = /^-?\d+(\.\d+)?$/;

export const decimalInput = z
  .union([z.number().finite(), z.string().trim().regex(DECIMAL_TEXT, 'must be a decimal number')])
  .transform((v) => new Decimal(v));

// Largest values the decimal(12,2) money and decimal(10,2) quantity columns hold.
export const MAX_MONEY = new Decimal('9999999999.99');
export const MAX_QUANTITY = new Decimal('99999999.99');

const rounded = decimalInput.transform((d) => d.toDecimalPlaces(2, Decimal.ROUND_HALF_UP));

/** Strictly positive once rounded to the 2-decimal storage scale. */
export const positiveAmount = rounded
  .refine((d) => d.greaterThan(0), 'must be greater than 0')
  .refine((d) => d.lessThanOrEqualTo(MAX_MONEY), `must not exceed ${MAX_MONEY.toFixed(2)}`);

export const nonNegativeAmount = rounded
  .refine((d) => d.greaterThanOrEqualTo(0), 'must not be negative')
  .refine((d) => d.lessThanOrEqualTo(MAX_MONEY), `must not exceed ${MAX_MONEY.toFixed(2)}`);

export const positiveQuantity = rounded
  .refine((d) => d.greaterThan(0), 'must be greater than 0')
  .refine((d) => d.lessThanOrEqualTo(MAX_QUANTITY), `must not exceed ${MAX_QUANTITY.toFixed(2)}`);

export const entityId = z.number().int().positive();

export const dateOnly = z.string().trim().refine(isValidDateOnly, 'must be a date (YYYY-MM-DD)');

export const requiredText = (max: number) => z.string().trim().min(1, 'is required').max(max);

export const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .nullish()
    .transform((v) => (v ? v : null));

/**
 * Parses operation input; the first issue becomes a ValidationError
 * (`items.0.quantity: must be greater than 0`).
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const path = issue?.path.join('.') ?? '';
  const message = issue?.message ?? 'invalid input';
  throw new ValidationError(path ? `${path}: ${message}` : message, {
    details: { issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) },
  });
}
