import type { BillStatus, CreditDirection } from '../../types/ledger.js';
import { Decimal, sumMoney, toMoneyDecimal } from '../../utils/money.js';

export type SnapshotBill = {
  id: number;
  vendorId: number;
  status: BillStatus;
  billDate: string;
  total: Decimal.Value;
};

export type SnapshotProxy = {
  parentBillId: number;
  vendorId: number;
  status: BillStatus;
  total: Decimal.Value;
};

export type SnapshotEntry = {
  vendorId: number;
  direction: CreditDirection;
  paymentDate: string;
  amount: Decimal.Value;
};

export type LedgerSnapshot = {
  bills: readonly SnapshotBill[];
  proxies: readonly SnapshotProxy[];
  entries: readonly SnapshotEntry[];
};

export type OutstandingBalance = {
  totalBilled: Decimal;
  totalReceived: Decimal;
  totalPaidOut: Decimal;
  outstanding: Decimal;
};

/**
 * What a vendor owes (positive) or is owed (negative) as of a date.
 *
 * Billed: the unsplit remainder of each CONFIRMED bill of the vendor, plus every
 * non-cancelled proxy attributed to the vendor whose parent is CONFIRMED. Proxies
 * follow their parent's bill date. INCOMING entries reduce the balance and
 * OUTGOING entries raise it. Only sums are taken, so input order does not matter.
 */
export function computeOutstanding(vendorId: number, snapshot: LedgerSnapshot, asOf?: string | null): OutstandingBalance {
  const parents = new Map<number, SnapshotBill>();
  for (const bill of snapshot.bills) {
    if (bill.status !== 'CONFIRMED') continue;
    if (asOf && bill.billDate > asOf) continue;
    parents.set(bill.id, bill);
  }

  const billed: Decimal[] = [];
  const splitByParent = new Map<number, Decimal[]>();
  for (const proxy of snapshot.proxies) {
    if (proxy.status === 'CANCELLED' || !parents.has(proxy.parentBillId)) continue;
    const total = toMoneyDecimal(proxy.total);
    const splits = splitByParent.get(proxy.parentBillId) ?? [];
    splits.push(total);
    splitByParent.set(proxy.parentBillId, splits);
    if (proxy.vendorId === vendorId) billed.push(total);
  }
  for (const parent of parents.values()) {
    if (parent.vendorId !== vendorId) continue;
    billed.push(toMoneyDecimal(parent.total).sub(sumMoney(splitByParent.get(parent.id) ?? [])));
  }

  const received: Decimal[] = [];
  const paidOut: Decimal[] = [];
  for (const entry of snapshot.entries) {
    if (entry.vendorId !== vendorId) continue;
    if (asOf && entry.paymentDate > asOf) continue;
    (entry.direction === 'INCOMING' ? received : paidOut).push(toMoneyDecimal(entry.amount));
  }

  const totalBilled = sumMoney(billed);
  const totalReceived = sumMoney(received);
  const totalPaidOut = sumMoney(paidOut);
  return {
    totalBilled,
    totalReceived,
    totalPaidOut,
    outstanding: totalBilled.sub(totalReceived).add(totalPaidOut).toDecimalPlaces(2),
  };
}

/** A zero limit means no limit was set. */
export function isOverCreditLimit(outstanding: Decimal, creditLimit: Decimal.Value): boolean {
  const limit = toMoneyDecimal(creditLimit);
  return limit.greaterThan(0) && outstanding.greaterThan(limit);
}
