import test from 'node:test';
import assert from 'node:assert/strict';
import { Decimal, formatMoney, lineAmount, moneyFromColumn, sumMoney, toMoneyDecimal } from '../src/utils/money.js';

test('money: rounds half up to two decimals', () => {
  assert.equal(formatMoney(toMoneyDecimal('1.005')), '1.01');
  assert.equal(formatMoney(toMoneyDecimal('1.004')), '1.00');
  assert.equal(formatMoney(new Decimal(2)), '2.00');
});

test('money: sums without binary float drift', () => {
  assert.equal(formatMoney(sumMoney(['0.10', '0.20'])), '0.30');
  assert.equal(formatMoney(sumMoney([])), '0.00');
});

test('money: line amount is quantity times unit price at storage scale', () => {
  assert.equal(formatMoney(lineAmount('2', '100')), '200.00');
  assert.equal(formatMoney(lineAmount('3', '33.333')), '100.00');
});

test('money: reads numeric columns from either driver', () => {
  assert.equal(formatMoney(moneyFromColumn('150.10')), '150.10');
  assert.equal(formatMoney(moneyFromColumn(150.1)), '150.10');
  assert.equal(formatMoney(moneyFromColumn(null)), '0.00');
});
