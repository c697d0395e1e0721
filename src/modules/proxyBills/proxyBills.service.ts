import { z } from 'zod';
import type { Knex } from 'knex';
import type { LedgerContext } from '../../infrastructure/context.js';
import { forUpdate, withTransaction } from '../../infrastructure/db.js';
import { CapacityExceededError, ConflictError, InvalidStateError, NotFoundError } from '../../infrastructure/errors.js';
import { writeAuditLog } from '../../infrastructure/auditLog.js';
import { appendOutboxEvent } from '../../infrastructure/events.js';
import { withLockBestEffort } from '../../infrastructure/locks.js';
import type { BillRow, CreditEntryRow, ProxyBillItemRow, ProxyBillRow } from '../../types/rows.js';
import type { ProxyBill } from '../../types/ledger.js';
import { isoNow, toTimestamp } from '../../utils/date.js';
import { formatMoney, moneyFromColumn, sumMoney, type Decimal } from '../../utils/money.js';
import { entityId, parseInput, requiredText } from '../../utils/validation.js';
import { assertVendorInTenant } from '../directory/directory.service.js';
import { LineItemsInput, loadBillRow, toLineItem, toLineItemRows } from '../bills/bills.service.js';
import { computeBillTotals, computeLines, computeProxyCapacity, fitsWithinCapacity, type ProxyCapacity } from '../bills/billMath.js';

const ProxySplitInput = z.object({
  vendorId: entityId,
  proxyNumber: requiredText(100),
  items: LineItemsInput,
});

const CreateProxyInput = ProxySplitInput.extend({ parentBillId: entityId });

const ProxySplitsInput = z.array(ProxySplitInput).min(1, 'at least one split is required');

export type ProxySplit = z.input<typeof ProxySplitInput>;
export type CreateProxyInput = z.input<typeof CreateProxyInput>;

export type RemainingCapacity = {
  parentBillId: number;
  parentTotal: string;
  allocated: string;
  remaining: string;
};

type ParsedSplit = z.output<typeof ProxySplitInput>;

export function toProxyBill(row: ProxyBillRow, items: readonly ProxyBillItemRow[]): ProxyBill {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    parentBillId: row.parent_bill_id,
    vendorId: row.vendor_id,
    proxyNumber: row.proxy_number,
    status: row.status,
    amountTotal: formatMoney(moneyFromColumn(row.amount_total)),
    createdAt: toTimestamp(row.created_at),
    items: [...items].sort((a, b) => a.position - b.position).map(toLineItem),
  };
}

function proxyLockKey(tenantId: number, parentBillId: number): string {
  return `lock:proxy-split:${tenantId}:${parentBillId}`;
}

async function loadCapacity(trx: Knex, parent: BillRow): Promise<ProxyCapacity> {
  const active = await trx<ProxyBillRow>('proxy_bills')
    .where({ tenant_id: parent.tenant_id, parent_bill_id: parent.id })
    .whereNot('status', 'CANCELLED')
    .select('amount_total');
  return computeProxyCapacity(
    moneyFromColumn(parent.amount_total),
    active.map((p) => moneyFromColumn(p.amount_total))
  );
}

async function loadProxyItems(knex: Knex, proxyIds: readonly number[]): Promise<ProxyBillItemRow[]> {
  if (proxyIds.length === 0) return [];
  return await knex<ProxyBillItemRow>('proxy_bill_items').whereIn('proxy_bill_id', proxyIds).orderBy('position', 'asc');
}

async function loadProxyRow(ctx: LedgerContext, knex: Knex, tenantId: number, proxyBillId: number, lock = false) {
  const q = knex<ProxyBillRow>('proxy_bills').where({ id: proxyBillId, tenant_id: tenantId });
  const row = await (lock ? forUpdate(ctx.db, q) : q).first();
  if (!row) throw new NotFoundError('proxy bill not found', { details: { proxyBillId } });
  return row;
}

/**
 * Checks the whole batch against the parent's remaining capacity and writes it.
 * The parent row is locked first, so on postgres concurrent splits of the same
 * bill queue behind each other and the second one sees the first one's proxies.
 */
async function insertSplits(
  ctx: LedgerContext,
  trx: Knex.Transaction,
  tenantId: number,
  parentBillId: number,
  splits: readonly ParsedSplit[],
  userId: number | null
): Promise<ProxyBill[]> {
  const parent = await loadBillRow(ctx.db, trx, tenantId, parentBillId, true);
  if (parent.status !== 'CONFIRMED') {
    throw new InvalidStateError(`cannot split a ${parent.status} bill`, {
      details: { billId: parentBillId, status: parent.status },
    });
  }
  for (const split of splits) {
    await assertVendorInTenant(trx, split.vendorId, tenantId);
  }

  const computed = splits.map((split) => {
    const lines = computeLines(split.items);
    return { split, lines, total: computeBillTotals(lines).total };
  });
  const requested: Decimal = sumMoney(computed.map((c) => c.total));
  const capacity = await loadCapacity(trx, parent);
  if (!fitsWithinCapacity(capacity, requested)) {
    throw new CapacityExceededError('proxy bill total exceeds remaining capacity of the parent bill', {
      details: {
        parentBillId,
        parentTotal: formatMoney(capacity.parentTotal),
        allocated: formatMoney(capacity.allocated),
        remaining: formatMoney(capacity.remaining),
        requested: formatMoney(requested),
      },
    });
  }

  const created: ProxyBill[] = [];
  for (const { split, lines, total } of computed) {
    const [row] = await trx<ProxyBillRow>('proxy_bills')
      .insert({
        tenant_id: tenantId,
        parent_bill_id: parentBillId,
        vendor_id: split.vendorId,
        proxy_number: split.proxyNumber,
        status: 'CONFIRMED',
        amount_total: formatMoney(total),
        created_at: isoNow(),
      })
      .returning('*');
    if (!row) throw new Error('proxy bill insert returned no row');
    const items = await trx<ProxyBillItemRow>('proxy_bill_items')
      .insert(toLineItemRows(lines).map((l) => ({ ...l, proxy_bill_id: row.id })))
      .returning('*');

    await writeAuditLog(trx, ctx.logger, {
      tenantId,
      userId,
      action: 'proxy_bill.created',
      entityType: 'ProxyBill',
      entityId: row.id,
      metadata: { parentBillId, amountTotal: formatMoney(total) },
    });
    await appendOutboxEvent(trx, {
      tenantId,
      eventType: 'proxy_bill.created',
      aggregateType: 'ProxyBill',
      aggregateId: row.id,
      payload: { proxyBillId: row.id, parentBillId, vendorId: row.vendor_id, amountTotal: formatMoney(total) },
    });
    created.push(toProxyBill(row, items));
  }
  return created;
}

export async function createProxyBill(
  ctx: LedgerContext,
  tenantId: number,
  input: CreateProxyInput,
  userId: number | null = null
): Promise<ProxyBill> {
  const { parentBillId, ...split } = parseInput(CreateProxyInput, input);
  const [proxy] = await withLockBestEffort(ctx.redis, proxyLockKey(tenantId, parentBillId), ctx.lockTtlMs, () =>
    withTransaction(ctx.db, (trx) => insertSplits(ctx, trx, tenantId, parentBillId, [split], userId))
  );
  if (!proxy) throw new Error('proxy split produced no proxy bill');
  ctx.logger.info({ tenantId, parentBillId, proxyBillId: proxy.id, amountTotal: proxy.amountTotal }, 'proxy bill created');
  return proxy;
}

/** All-or-nothing: one split over the ceiling rejects the whole batch. */
export async function createProxySplits(
  ctx: LedgerContext,
  tenantId: number,
  parentBillId: number,
  splits: readonly ProxySplit[],
  userId: number | null = null
): Promise<ProxyBill[]> {
  const parentId = parseInput(entityId, parentBillId);
  const parsed = parseInput(ProxySplitsInput, splits);
  const created = await withLockBestEffort(ctx.redis, proxyLockKey(tenantId, parentId), ctx.lockTtlMs, () =>
    withTransaction(ctx.db, (trx) => insertSplits(ctx, trx, tenantId, parentId, parsed, userId))
  );
  ctx.logger.info({ tenantId, parentBillId: parentId, count: created.length }, 'proxy bills created');
  return created;
}

/** Releases the proxy's share of the parent's capacity. */
export async function cancelProxyBill(
  ctx: LedgerContext,
  tenantId: number,
  proxyBillId: number,
  userId: number | null = null
): Promise<ProxyBill> {
  const proxy = await withTransaction(ctx.db, async (trx) => {
    const row = await loadProxyRow(ctx, trx, tenantId, proxyBillId, true);
    if (row.status === 'CANCELLED') {
      throw new InvalidStateError('proxy bill is already cancelled', { details: { proxyBillId } });
    }
    const entry = await trx<CreditEntryRow>('credit_entries')
      .where({ tenant_id: tenantId, proxy_bill_id: proxyBillId })
      .first('id');
    if (entry) {
      throw new ConflictError('proxy bill has credit entries', { details: { proxyBillId, creditEntryId: entry.id } });
    }

    await trx<ProxyBillRow>('proxy_bills').where({ id: proxyBillId, tenant_id: tenantId }).update({ status: 'CANCELLED' });
    await writeAuditLog(trx, ctx.logger, {
      tenantId,
      userId,
      action: 'proxy_bill.cancelled',
      entityType: 'ProxyBill',
      entityId: proxyBillId,
    });
    await appendOutboxEvent(trx, {
      tenantId,
      eventType: 'proxy_bill.cancelled',
      aggregateType: 'ProxyBill',
      aggregateId: proxyBillId,
      payload: { proxyBillId, parentBillId: row.parent_bill_id },
    });
    return toProxyBill({ ...row, status: 'CANCELLED' }, await loadProxyItems(trx, [proxyBillId]));
  });

  ctx.logger.info({ tenantId, proxyBillId }, 'proxy bill cancelled');
  return proxy;
}

export async function getProxyBill(ctx: LedgerContext, tenantId: number, proxyBillId: number): Promise<ProxyBill> {
  const row = await loadProxyRow(ctx, ctx.db.knex, tenantId, proxyBillId);
  return toProxyBill(row, await loadProxyItems(ctx.db.knex, [proxyBillId]));
}

/** Proxies of one parent, cancelled ones included, in creation order. */
export async function listProxyBills(ctx: LedgerContext, tenantId: number, parentBillId: number): Promise<ProxyBill[]> {
  await loadBillRow(ctx.db, ctx.db.knex, tenantId, parentBillId);
  const rows = await ctx.db
    .knex<ProxyBillRow>('proxy_bills')
    .where({ tenant_id: tenantId, parent_bill_id: parentBillId })
    .orderBy('id', 'asc');
  const items = await loadProxyItems(
    ctx.db.knex,
    rows.map((r) => r.id)
  );
  return rows.map((r) =>
    toProxyBill(
      r,
      items.filter((i) => i.proxy_bill_id === r.id)
    )
  );
}

export async function remainingCapacity(
  ctx: LedgerContext,
  tenantId: number,
  parentBillId: number
): Promise<RemainingCapacity> {
  const parent = await loadBillRow(ctx.db, ctx.db.knex, tenantId, parentBillId);
  const capacity = await loadCapacity(ctx.db.knex, parent);
  return {
    parentBillId,
    parentTotal: formatMoney(capacity.parentTotal),
    allocated: formatMoney(capacity.allocated),
    remaining: formatMoney(capacity.remaining),
  };
}
