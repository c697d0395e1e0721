import type { Knex } from 'knex';
import type { LedgerContext } from '../../infrastructure/context.js';
import { NotFoundError } from '../../infrastructure/errors.js';
import type { BillRow, CreditEntryRow, DeliveryOrderRow, ProxyBillRow, TenantRow, VendorRow } from '../../types/rows.js';
import type { DeliveryStatus } from '../../types/ledger.js';
import { toDateOnly } from '../../utils/date.js';
import { formatMoney, moneyFromColumn, sumMoney } from '../../utils/money.js';
import { dateOnly, parseInput } from '../../utils/validation.js';
import { computeOutstanding, isOverCreditLimit, type LedgerSnapshot, type OutstandingBalance } from './outstanding.compute.js';

export type VendorOutstanding = {
  vendorId: number;
  asOf: string | null;
  totalBilled: string;
  totalReceived: string;
  totalPaidOut: string;
  outstanding: string;
};

export type OutstandingReportRow = VendorOutstanding & {
  vendorName: string;
  creditLimit: string;
  overCreditLimit: boolean;
};

export type DeliverySummary = Record<DeliveryStatus, number> & { total: number };

export type TenantDashboard = {
  vendorCount: number;
  billCount: number;
  totalBilled: string;
  totalReceived: string;
  totalPaidOut: string;
  outstanding: string;
};

/**
 * Reads the rows the balance depends on. Bills and proxies are loaded for the
 * whole tenant because a vendor's balance depends on proxies of other vendors'
 * bills and on splits of its own bills to other vendors.
 */
async function loadSnapshot(knex: Knex, tenantId: number, vendorId?: number): Promise<LedgerSnapshot> {
  const bills = await knex<BillRow>('bills')
    .where({ tenant_id: tenantId, status: 'CONFIRMED' })
    .select('id', 'vendor_id', 'status', 'bill_date', 'amount_total');
  const proxies = await knex<ProxyBillRow>('proxy_bills')
    .where({ tenant_id: tenantId })
    .whereNot('status', 'CANCELLED')
    .select('parent_bill_id', 'vendor_id', 'status', 'amount_total');
  const entryQuery = knex<CreditEntryRow>('credit_entries').where({ tenant_id: tenantId });
  if (vendorId !== undefined) entryQuery.andWhere('vendor_id', vendorId);
  const entries = await entryQuery.select('vendor_id', 'direction', 'payment_date', 'amount');

  return {
    bills: bills.map((b) => ({
      id: b.id,
      vendorId: b.vendor_id,
      status: b.status,
      billDate: toDateOnly(b.bill_date),
      total: moneyFromColumn(b.amount_total),
    })),
    proxies: proxies.map((p) => ({
      parentBillId: p.parent_bill_id,
      vendorId: p.vendor_id,
      status: p.status,
      total: moneyFromColumn(p.amount_total),
    })),
    entries: entries.map((e) => ({
      vendorId: e.vendor_id,
      direction: e.direction,
      paymentDate: toDateOnly(e.payment_date),
      amount: moneyFromColumn(e.amount),
    })),
  };
}

function formatBalance(vendorId: number, asOf: string | null, balance: OutstandingBalance): VendorOutstanding {
  return {
    vendorId,
    asOf,
    totalBilled: formatMoney(balance.totalBilled),
    totalReceived: formatMoney(balance.totalReceived),
    totalPaidOut: formatMoney(balance.totalPaidOut),
    outstanding: formatMoney(balance.outstanding),
  };
}

export async function outstandingForVendor(
  ctx: LedgerContext,
  tenantId: number,
  vendorId: number,
  asOf?: string
): Promise<VendorOutstanding> {
  const cutoff = asOf === undefined ? null : parseInput(dateOnly, asOf);
  const vendor = await ctx.db.knex<VendorRow>('vendors').where({ id: vendorId, tenant_id: tenantId }).first('id');
  if (!vendor) throw new NotFoundError('vendor not found', { details: { vendorId } });

  const snapshot = await loadSnapshot(ctx.db.knex, tenantId, vendorId);
  return formatBalance(vendorId, cutoff, computeOutstanding(vendorId, snapshot, cutoff));
}

/** One row per vendor that was billed or still has a balance, ordered by vendor name. */
export async function outstandingReport(
  ctx: LedgerContext,
  tenantId: number,
  asOf?: string
): Promise<OutstandingReportRow[]> {
  const cutoff = asOf === undefined ? null : parseInput(dateOnly, asOf);
  const vendors = await ctx.db
    .knex<VendorRow>('vendors')
    .where({ tenant_id: tenantId })
    .orderBy('name', 'asc')
    .orderBy('id', 'asc');
  const snapshot = await loadSnapshot(ctx.db.knex, tenantId);

  const rows: OutstandingReportRow[] = [];
  for (const vendor of vendors) {
    const balance = computeOutstanding(vendor.id, snapshot, cutoff);
    if (balance.outstanding.isZero() && !balance.totalBilled.greaterThan(0)) continue;
    rows.push({
      ...formatBalance(vendor.id, cutoff, balance),
      vendorName: vendor.name,
      creditLimit: formatMoney(moneyFromColumn(vendor.credit_limit)),
      overCreditLimit: isOverCreditLimit(balance.outstanding, moneyFromColumn(vendor.credit_limit)),
    });
  }
  ctx.logger.child({ tenantId }).debug({ vendors: vendors.length, rows: rows.length }, 'outstanding report built');
  return rows;
}

export async function deliverySummary(ctx: LedgerContext, tenantId: number): Promise<DeliverySummary> {
  const rows = await ctx.db.knex<DeliveryOrderRow>('delivery_orders').where({ tenant_id: tenantId }).select('status');
  const summary: DeliverySummary = { PENDING: 0, IN_TRANSIT: 0, DELIVERED: 0, CANCELLED: 0, total: 0 };
  for (const row of rows) {
    summary[row.status] += 1;
    summary.total += 1;
  }
  return summary;
}

/**
 * Tenant-wide totals. Proxies only move a share of a confirmed bill between
 * vendors, so the tenant's outstanding is confirmed bills less INCOMING plus OUTGOING.
 */
export async function tenantDashboard(ctx: LedgerContext, tenantId: number): Promise<TenantDashboard> {
  const knex = ctx.db.knex;
  const tenant = await knex<TenantRow>('tenants').where({ id: tenantId }).first('id');
  if (!tenant) throw new NotFoundError('tenant not found', { details: { tenantId } });

  const vendorIds = await knex<VendorRow>('vendors').where({ tenant_id: tenantId }).select('id');
  const bills = await knex<BillRow>('bills').where({ tenant_id: tenantId }).select('status', 'amount_total');
  const entries = await knex<CreditEntryRow>('credit_entries').where({ tenant_id: tenantId }).select('direction', 'amount');

  const billed = sumMoney(bills.filter((b) => b.status === 'CONFIRMED').map((b) => moneyFromColumn(b.amount_total)));
  const received = sumMoney(entries.filter((e) => e.direction === 'INCOMING').map((e) => moneyFromColumn(e.amount)));
  const paidOut = sumMoney(entries.filter((e) => e.direction === 'OUTGOING').map((e) => moneyFromColumn(e.amount)));
  return {
    vendorCount: vendorIds.length,
    billCount: bills.length,
    totalBilled: formatMoney(billed),
    totalReceived: formatMoney(received),
    totalPaidOut: formatMoney(paidOut),
    outstanding: formatMoney(billed.sub(received).add(paidOut)),
  };
}
