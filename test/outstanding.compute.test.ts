import test from 'node:test';
import assert from 'node:assert/strict';
import { formatMoney, toMoneyDecimal } from '../src/utils/money.js';
import { computeOutstanding, isOverCreditLimit, type LedgerSnapshot } from '../src/modules/reports/outstanding.compute.js';

const SUPPLIER = 1;
const CUSTOMER = 2;

const snapshot: LedgerSnapshot = {
  bills: [
    { id: 10, vendorId: SUPPLIER, status: 'CONFIRMED', billDate: '2026-01-10', total: '200.00' },
    { id: 11, vendorId: SUPPLIER, status: 'DRAFT', billDate: '2026-01-11', total: '999.00' },
    { id: 12, vendorId: SUPPLIER, status: 'CANCELLED', billDate: '2026-01-12', total: '500.00' },
    { id: 13, vendorId: SUPPLIER, status: 'CONFIRMED', billDate: '2026-02-01', total: '40.00' },
  ],
  proxies: [
    { parentBillId: 10, vendorId: CUSTOMER, status: 'CONFIRMED', total: '60.00' },
    { parentBillId: 10, vendorId: CUSTOMER, status: 'CANCELLED', total: '100.00' },
  ],
  entries: [
    { vendorId: SUPPLIER, direction: 'INCOMING', paymentDate: '2026-01-15', amount: '100.00' },
    { vendorId: SUPPLIER, direction: 'OUTGOING', paymentDate: '2026-01-20', amount: '10.00' },
    { vendorId: CUSTOMER, direction: 'INCOMING', paymentDate: '2026-02-05', amount: '60.00' },
  ],
};

function formatted(vendorId: number, s: LedgerSnapshot, asOf?: string) {
  const b = computeOutstanding(vendorId, s, asOf);
  return {
    totalBilled: formatMoney(b.totalBilled),
    totalReceived: formatMoney(b.totalReceived),
    totalPaidOut: formatMoney(b.totalPaidOut),
    outstanding: formatMoney(b.outstanding),
  };
}

test('outstanding: splits move billing from the parent vendor to the proxy vendor', () => {
  // 200 - 60 (active split) + 40 = 180 billed; -100 received; +10 paid out
  assert.deepEqual(formatted(SUPPLIER, snapshot), {
    totalBilled: '180.00',
    totalReceived: '100.00',
    totalPaidOut: '10.00',
    outstanding: '90.00',
  });
  assert.deepEqual(formatted(CUSTOMER, snapshot), {
    totalBilled: '60.00',
    totalReceived: '60.00',
    totalPaidOut: '0.00',
    outstanding: '0.00',
  });
});

test('outstanding: asOf cuts bills by bill date and entries by payment date', () => {
  assert.equal(formatted(SUPPLIER, snapshot, '2026-01-15').outstanding, '40.00');
  assert.equal(formatted(CUSTOMER, snapshot, '2026-01-31').outstanding, '60.00');
  assert.equal(formatted(SUPPLIER, snapshot, '2025-12-31').outstanding, '0.00');
});

test('outstanding: result does not depend on input order', () => {
  const reversed: LedgerSnapshot = {
    bills: [...snapshot.bills].reverse(),
    proxies: [...snapshot.proxies].reverse(),
    entries: [...snapshot.entries].reverse(),
  };
  assert.deepEqual(formatted(SUPPLIER, reversed), formatted(SUPPLIER, snapshot));
  assert.deepEqual(formatted(CUSTOMER, reversed), formatted(CUSTOMER, snapshot));
});

test('outstanding: overpayment leaves a negative balance', () => {
  const s: LedgerSnapshot = {
    bills: [{ id: 1, vendorId: SUPPLIER, status: 'CONFIRMED', billDate: '2026-01-01', total: '50.00' }],
    proxies: [],
    entries: [{ vendorId: SUPPLIER, direction: 'INCOMING', paymentDate: '2026-01-02', amount: '80.00' }],
  };
  assert.equal(formatted(SUPPLIER, s).outstanding, '-30.00');
});

test('outstanding: credit limit of zero never flags', () => {
  assert.equal(isOverCreditLimit(toMoneyDecimal('500'), '0'), false);
  assert.equal(isOverCreditLimit(toMoneyDecimal('500'), '400'), true);
  assert.equal(isOverCreditLimit(toMoneyDecimal('400'), '400'), false);
});
