import test from 'node:test';
import assert from 'node:assert/strict';
import { InvalidStateError, ValidationError } from '../src/infrastructure/errors.js';
import { Decimal, formatMoney } from '../src/utils/money.js';
import {
  assertTotalsConsistent,
  computeBillTotals,
  computeLines,
  computeProxyCapacity,
  fitsWithinCapacity,
} from '../src/modules/bills/billMath.js';

const twoByHundred = [{ description: 'Goods', quantity: new Decimal(2), unitPrice: new Decimal(100) }];

test('bill math: numbers lines from 1 and computes amounts', () => {
  const lines = computeLines([
    ...twoByHundred,
    { description: 'Freight', quantity: new Decimal('1.5'), unitPrice: new Decimal('10') },
  ]);
  assert.deepEqual(
    lines.map((l) => [l.position, formatMoney(l.amount)]),
    [
      [1, '200.00'],
      [2, '15.00'],
    ]
  );
});

test('bill math: tax defaults to zero and is added as given', () => {
  const lines = computeLines(twoByHundred);
  const plain = computeBillTotals(lines);
  assert.equal(formatMoney(plain.subtotal), '200.00');
  assert.equal(formatMoney(plain.tax), '0.00');
  assert.equal(formatMoney(plain.total), '200.00');

  const taxed = computeBillTotals(lines, '18.50');
  assert.equal(formatMoney(taxed.total), '218.50');
});

test('bill math: detects stored totals that disagree with items', () => {
  const totals = { subtotal: new Decimal('200'), tax: new Decimal('0'), total: new Decimal('200') };
  assert.doesNotThrow(() => assertTotalsConsistent(totals, [new Decimal('150'), new Decimal('50')]));
  assert.throws(
    () => assertTotalsConsistent(totals, [new Decimal('150')]),
    (err: unknown) =>
      err instanceof InvalidStateError &&
      err.message === 'bill totals mismatch: items sum 150.00 != subtotal 200.00' &&
      err.details?.['itemsSum'] === '150.00'
  );
  assert.throws(
    () => assertTotalsConsistent({ ...totals, total: new Decimal('201') }, [new Decimal('200')]),
    (err: unknown) =>
      err instanceof InvalidStateError && err.message === 'bill totals mismatch: subtotal 200.00 + tax 0.00 != total 201.00'
  );
});

test('bill math: amounts past the storage precision are rejected', () => {
  assert.throws(
    () => computeLines([{ description: 'Bulk', quantity: new Decimal(1_000_000), unitPrice: new Decimal(100_000) }]),
    (err: unknown) => err instanceof ValidationError && err.message === 'items.0.amount: must not exceed 9999999999.99'
  );
  const nearLimit = computeLines([{ description: 'Bulk', quantity: new Decimal(1), unitPrice: new Decimal('9999999999.99') }]);
  assert.equal(formatMoney(computeBillTotals(nearLimit).total), '9999999999.99');
  assert.throws(
    () => computeBillTotals(nearLimit, '0.01'),
    (err: unknown) => err instanceof ValidationError && err.message === 'total: must not exceed 9999999999.99'
  );
});

test('bill math: proxy capacity is exact at the boundary', () => {
  const capacity = computeProxyCapacity('200', ['150']);
  assert.equal(formatMoney(capacity.remaining), '50.00');
  assert.equal(fitsWithinCapacity(capacity, '50'), true);
  assert.equal(fitsWithinCapacity(capacity, '60'), false);

  const cents = computeProxyCapacity('0.30', ['0.10', '0.20']);
  assert.equal(formatMoney(cents.remaining), '0.00');
  assert.equal(fitsWithinCapacity(cents, '0.01'), false);
});
