import { Decimal } from 'decimal.js';

export { Decimal };

const ZERO = new Decimal(0);

export function toMoneyDecimal(value: Decimal.Value): Decimal {
  // DB columns are decimal(12,2); keep every stored and compared amount at that scale.
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

/** Reads a numeric column: pg returns numerics as strings, sqlite as numbers. */
export function moneyFromColumn(value: string | number | null | undefined): Decimal {
  if (value === null || value === undefined) return ZERO;
  return toMoneyDecimal(String(value));
}

export function formatMoney(value: Decimal): string {
  return value.toFixed(2);
}

export function sumMoney(values: Iterable<Decimal.Value>): Decimal {
  let total = ZERO;
  for (const v of values) total = total.add(new Decimal(v));
  return total.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function lineAmount(quantity: Decimal.Value, unitPrice: Decimal.Value): Decimal {
  return toMoneyDecimal(new Decimal(quantity).mul(new Decimal(unitPrice)));
}
