import { InvalidStateError, ValidationError } from '../../infrastructure/errors.js';
import { Decimal, lineAmount, sumMoney, toMoneyDecimal } from '../../utils/money.js';
import { MAX_MONEY } from '../../utils/validation.js';

export type LineInput = {
  description: string;
  quantity: Decimal;
  unitPrice: Decimal;
};

export type ComputedLine = {
  position: number;
  description: string;
  quantity: Decimal;
  unitPrice: Decimal;
  amount: Decimal;
};

export type BillTotals = {
  subtotal: Decimal;
  tax: Decimal;
  total: Decimal;
};

function assertStorable(path: string, amount: Decimal): void {
  if (amount.greaterThan(MAX_MONEY)) {
    throw new ValidationError(`${path}: must not exceed ${MAX_MONEY.toFixed(2)}`, {
      details: { path, amount: amount.toFixed(2) },
    });
  }
}

export function computeLines(lines: readonly LineInput[]): ComputedLine[] {
  return lines.map((l, idx) => {
    const quantity = toMoneyDecimal(l.quantity);
    const unitPrice = toMoneyDecimal(l.unitPrice);
    const amount = lineAmount(quantity, unitPrice);
    assertStorable(`items.${idx}.amount`, amount);
    return { position: idx + 1, description: l.description, quantity, unitPrice, amount };
  });
}

/** Tax is taken as given; only subtotal and total are derived. */
export function computeBillTotals(lines: readonly ComputedLine[], tax: Decimal.Value = 0): BillTotals {
  const subtotal = sumMoney(lines.map((l) => l.amount));
  const taxAmount = toMoneyDecimal(tax);
  const total = subtotal.add(taxAmount).toDecimalPlaces(2);
  assertStorable('subtotal', subtotal);
  assertStorable('total', total);
  return { subtotal, tax: taxAmount, total };
}

/** Guardrail for rows read back from storage: total = subtotal + tax = Σ items + tax. */
export function assertTotalsConsistent(
  totals: { subtotal: Decimal; tax: Decimal; total: Decimal },
  itemAmounts: readonly Decimal[]
): void {
  const itemsSum = sumMoney(itemAmounts);
  if (!itemsSum.equals(totals.subtotal)) {
    throw new InvalidStateError(
      `bill totals mismatch: items sum ${itemsSum.toFixed(2)} != subtotal ${totals.subtotal.toFixed(2)}`,
      { details: { itemsSum: itemsSum.toFixed(2), subtotal: totals.subtotal.toFixed(2) } }
    );
  }
  if (!totals.subtotal.add(totals.tax).equals(totals.total)) {
    throw new InvalidStateError(
      `bill totals mismatch: subtotal ${totals.subtotal.toFixed(2)} + tax ${totals.tax.toFixed(2)} != total ${totals.total.toFixed(2)}`,
      {
        details: {
          subtotal: totals.subtotal.toFixed(2),
          tax: totals.tax.toFixed(2),
          total: totals.total.toFixed(2),
        },
      }
    );
  }
}

export type ProxyCapacity = {
  parentTotal: Decimal;
  allocated: Decimal;
  remaining: Decimal;
};

/** `allocated` counts non-cancelled proxies only; callers filter before passing totals in. */
export function computeProxyCapacity(parentTotal: Decimal.Value, activeProxyTotals: readonly Decimal.Value[]): ProxyCapacity {
  const parent = toMoneyDecimal(parentTotal);
  const allocated = sumMoney(activeProxyTotals);
  return { parentTotal: parent, allocated, remaining: parent.sub(allocated).toDecimalPlaces(2) };
}

export function fitsWithinCapacity(capacity: ProxyCapacity, requested: Decimal.Value): boolean {
  return capacity.allocated.add(toMoneyDecimal(requested)).lessThanOrEqualTo(capacity.parentTotal);
}
