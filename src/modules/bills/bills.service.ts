import { z } from 'zod';
import type { Knex } from 'knex';
import type { LedgerContext } from '../../infrastructure/context.js';
import { forUpdate, withTransaction, type Db } from '../../infrastructure/db.js';
import { ConflictError, InvalidStateError, NotFoundError, TransientError } from '../../infrastructure/errors.js';
import { writeAuditLog } from '../../infrastructure/auditLog.js';
import { appendOutboxEvent } from '../../infrastructure/events.js';
import type { BillItemRow, BillRow, CreditEntryRow, DeliveryOrderRow, LineItemRow, ProxyBillRow } from '../../types/rows.js';
import {
  BILL_STATUSES,
  BILL_TYPES,
  type Bill,
  type BillStatus,
  type LineItem,
  type PaymentStatus,
} from '../../types/ledger.js';
import { isoNow, toDateOnly, toTimestamp } from '../../utils/date.js';
import { Decimal, formatMoney, moneyFromColumn, sumMoney } from '../../utils/money.js';
import {
  dateOnly,
  entityId,
  nonNegativeAmount,
  optionalText,
  parseInput,
  positiveAmount,
  positiveQuantity,
  requiredText,
} from '../../utils/validation.js';
import { assertVendorInTenant } from '../directory/directory.service.js';
import { assertTotalsConsistent, computeBillTotals, computeLines, type ComputedLine } from './billMath.js';

export const LineItemInput = z.object({
  description: requiredText(500),
  quantity: positiveQuantity,
  unitPrice: positiveAmount,
});

export const LineItemsInput = z.array(LineItemInput).min(1, 'at least one item is required');

const OcrInput = z
  .object({
    ocrText: optionalText(100_000),
    imagePath: optionalText(500),
    deliveryDate: dateOnly.nullish(),
    billedToName: optionalText(200),
    shippedToName: optionalText(200),
    deliveryRecipient: optionalText(200),
    post: optionalText(100),
  })
  .partial();

const CreateDraftInput = z.object({
  vendorId: entityId,
  billNumber: requiredText(100),
  billDate: dateOnly,
  billType: z.enum(BILL_TYPES),
  items: LineItemsInput,
  // Opaque: supplied by the caller, never derived from a rate.
  amountTax: nonNegativeAmount.optional(),
  ocr: OcrInput.optional(),
});

const UpdateDraftInput = z.object({
  items: LineItemsInput,
  vendorId: entityId.optional(),
  billNumber: requiredText(100).optional(),
  billDate: dateOnly.optional(),
  billType: z.enum(BILL_TYPES).optional(),
  amountTax: nonNegativeAmount.optional(),
  ocr: OcrInput.optional(),
});

const BillListFilter = z.object({
  from: dateOnly.optional(),
  to: dateOnly.optional(),
  vendorId: entityId.optional(),
  status: z.enum(BILL_STATUSES).optional(),
  search: optionalText(100),
});

export type CreateDraftBillInput = z.input<typeof CreateDraftInput>;
export type UpdateDraftBillInput = z.input<typeof UpdateDraftInput>;
export type BillListFilter = z.input<typeof BillListFilter>;

export function toLineItem(row: LineItemRow): LineItem {
  return {
    id: row.id,
    position: row.position,
    description: row.description,
    quantity: formatMoney(moneyFromColumn(row.quantity)),
    unitPrice: formatMoney(moneyFromColumn(row.unit_price)),
    amount: formatMoney(moneyFromColumn(row.amount)),
  };
}

export function toLineItemRows(lines: readonly ComputedLine[]) {
  return lines.map((l) => ({
    position: l.position,
    description: l.description,
    quantity: formatMoney(l.quantity),
    unit_price: formatMoney(l.unitPrice),
    amount: formatMoney(l.amount),
  }));
}

export function paymentStatusOf(total: Decimal, paid: Decimal): PaymentStatus {
  if (paid.greaterThanOrEqualTo(total)) return 'PAID';
  return paid.greaterThan(0) ? 'PARTIAL' : 'UNPAID';
}

export function toBill(row: BillRow, items: readonly BillItemRow[], paid: Decimal = new Decimal(0)): Bill {
  const total = moneyFromColumn(row.amount_total);
  return {
    id: row.id,
    tenantId: row.tenant_id,
    vendorId: row.vendor_id,
    billNumber: row.bill_number,
    billDate: toDateOnly(row.bill_date),
    billType: row.bill_type,
    status: row.status,
    amountSubtotal: formatMoney(moneyFromColumn(row.amount_subtotal)),
    amountTax: formatMoney(moneyFromColumn(row.amount_tax)),
    amountTotal: formatMoney(moneyFromColumn(row.amount_total)),
    isAuthorized: Boolean(row.is_authorized),
    authorizedBy: row.authorized_by,
    authorizedAt: toTimestamp(row.authorized_at),
    version: row.version,
    totalPaid: formatMoney(paid),
    remaining: formatMoney(total.sub(paid)),
    paymentStatus: paymentStatusOf(total, paid),
    ocr: {
      ocrText: row.ocr_text,
      imagePath: row.image_path,
      deliveryDate: row.delivery_date === null ? null : toDateOnly(row.delivery_date),
      billedToName: row.billed_to_name,
      shippedToName: row.shipped_to_name,
      deliveryRecipient: row.delivery_recipient,
      post: row.post,
    },
    createdAt: toTimestamp(row.created_at),
    items: [...items].sort((a, b) => a.position - b.position).map(toLineItem),
  };
}

/**
 * Loads a bill scoped to its tenant; a bill of another tenant is reported as missing.
 * With `lock` the row is locked for the rest of the transaction on postgres.
 */
export async function loadBillRow(
  db: Db,
  trx: Knex,
  tenantId: number,
  billId: number,
  lock = false
): Promise<BillRow> {
  const q = trx<BillRow>('bills').where({ id: billId, tenant_id: tenantId });
  const row = await (lock ? forUpdate(db, q) : q).first();
  if (!row) throw new NotFoundError('bill not found', { details: { billId } });
  return row;
}

async function loadBillItems(knex: Knex, billIds: readonly number[]): Promise<BillItemRow[]> {
  if (billIds.length === 0) return [];
  return await knex<BillItemRow>('bill_items').whereIn('bill_id', billIds).orderBy('position', 'asc');
}

/** Sum of INCOMING entries per bill id; bills without payments are absent from the map. */
export async function loadPaidByBill(
  knex: Knex,
  tenantId: number,
  billIds: readonly number[]
): Promise<Map<number, Decimal>> {
  const paid = new Map<number, Decimal>();
  if (billIds.length === 0) return paid;
  const rows = await knex<CreditEntryRow>('credit_entries')
    .where({ tenant_id: tenantId, direction: 'INCOMING' })
    .whereIn('bill_id', billIds)
    .select('bill_id', 'amount');
  for (const row of rows) {
    if (row.bill_id === null) continue;
    paid.set(row.bill_id, sumMoney([paid.get(row.bill_id) ?? 0, moneyFromColumn(row.amount)]));
  }
  return paid;
}

async function readBill(knex: Knex, db: Db, tenantId: number, billId: number): Promise<Bill> {
  const row = await loadBillRow(db, knex, tenantId, billId);
  const paid = await loadPaidByBill(knex, tenantId, [billId]);
  return toBill(row, await loadBillItems(knex, [billId]), paid.get(billId));
}

/**
 * Compare-and-swap on `version`: the write only lands if nobody changed the
 * bill since it was read in this transaction.
 */
async function updateBillVersioned(trx: Knex.Transaction, row: BillRow, changes: Partial<BillRow>): Promise<void> {
  const updated = await trx<BillRow>('bills')
    .where({ id: row.id, tenant_id: row.tenant_id, version: row.version })
    .update({ ...changes, version: row.version + 1 });
  if (updated !== 1) {
    throw new TransientError('bill was modified concurrently', { details: { billId: row.id } });
  }
}

function requireStatus(row: BillRow, allowed: readonly BillStatus[], action: string): void {
  if (!allowed.includes(row.status)) {
    throw new InvalidStateError(`cannot ${action} a ${row.status} bill`, {
      details: { billId: row.id, status: row.status },
    });
  }
}

function ocrColumns(ocr: z.output<typeof OcrInput> | undefined): Partial<BillRow> {
  if (!ocr) return {};
  const cols: Partial<BillRow> = {};
  if (ocr.ocrText !== undefined) cols.ocr_text = ocr.ocrText;
  if (ocr.imagePath !== undefined) cols.image_path = ocr.imagePath;
  if (ocr.deliveryDate !== undefined) cols.delivery_date = ocr.deliveryDate ?? null;
  if (ocr.billedToName !== undefined) cols.billed_to_name = ocr.billedToName;
  if (ocr.shippedToName !== undefined) cols.shipped_to_name = ocr.shippedToName;
  if (ocr.deliveryRecipient !== undefined) cols.delivery_recipient = ocr.deliveryRecipient;
  if (ocr.post !== undefined) cols.post = ocr.post;
  return cols;
}

export async function createDraftBill(
  ctx: LedgerContext,
  tenantId: number,
  input: CreateDraftBillInput,
  userId: number | null = null
): Promise<Bill> {
  const data = parseInput(CreateDraftInput, input);
  const lines = computeLines(data.items);
  const totals = computeBillTotals(lines, data.amountTax ?? 0);

  const bill = await withTransaction(ctx.db, async (trx) => {
    await assertVendorInTenant(trx, data.vendorId, tenantId);

    const [row] = await trx<BillRow>('bills')
      .insert({
        tenant_id: tenantId,
        vendor_id: data.vendorId,
        bill_number: data.billNumber,
        bill_date: data.billDate,
        bill_type: data.billType,
        status: 'DRAFT',
        amount_subtotal: formatMoney(totals.subtotal),
        amount_tax: formatMoney(totals.tax),
        amount_total: formatMoney(totals.total),
        is_authorized: false,
        authorized_by: null,
        authorized_at: null,
        version: 1,
        ...ocrColumns(data.ocr),
        created_at: isoNow(),
      })
      .returning('*');
    if (!row) throw new Error('bill insert returned no row');

    const items = await trx<BillItemRow>('bill_items')
      .insert(toLineItemRows(lines).map((l) => ({ ...l, bill_id: row.id })))
      .returning('*');

    await writeAuditLog(trx, ctx.logger, {
      tenantId,
      userId,
      action: 'bill.created',
      entityType: 'Bill',
      entityId: row.id,
      metadata: { billNumber: row.bill_number, amountTotal: formatMoney(totals.total) },
    });
    await appendOutboxEvent(trx, {
      tenantId,
      eventType: 'bill.created',
      aggregateType: 'Bill',
      aggregateId: row.id,
      payload: { billId: row.id, vendorId: row.vendor_id, status: row.status, amountTotal: formatMoney(totals.total) },
    });
    return toBill(row, items);
  });

  ctx.logger.info({ tenantId, billId: bill.id, amountTotal: bill.amountTotal }, 'draft bill created');
  return bill;
}

/** Replaces the items of a DRAFT bill and recomputes its totals. */
export async function updateDraftBill(
  ctx: LedgerContext,
  tenantId: number,
  billId: number,
  input: UpdateDraftBillInput,
  userId: number | null = null
): Promise<Bill> {
  const data = parseInput(UpdateDraftInput, input);
  const lines = computeLines(data.items);

  return await withTransaction(ctx.db, async (trx) => {
    const row = await loadBillRow(ctx.db, trx, tenantId, billId, true);
    requireStatus(row, ['DRAFT'], 'edit');

    if (data.vendorId !== undefined && data.vendorId !== row.vendor_id) {
      await assertVendorInTenant(trx, data.vendorId, tenantId);
    }
    const tax = data.amountTax ?? moneyFromColumn(row.amount_tax);
    const totals = computeBillTotals(lines, tax);

    await updateBillVersioned(trx, row, {
      vendor_id: data.vendorId ?? row.vendor_id,
      bill_number: data.billNumber ?? row.bill_number,
      bill_date: data.billDate ?? row.bill_date,
      bill_type: data.billType ?? row.bill_type,
      amount_subtotal: formatMoney(totals.subtotal),
      amount_tax: formatMoney(totals.tax),
      amount_total: formatMoney(totals.total),
      ...ocrColumns(data.ocr),
    });
    await trx<BillItemRow>('bill_items').where({ bill_id: billId }).del();
    await trx<BillItemRow>('bill_items').insert(toLineItemRows(lines).map((l) => ({ ...l, bill_id: billId })));

    await writeAuditLog(trx, ctx.logger, {
      tenantId,
      userId,
      action: 'bill.updated',
      entityType: 'Bill',
      entityId: billId,
      metadata: { amountTotal: formatMoney(totals.total) },
    });
    await appendOutboxEvent(trx, {
      tenantId,
      eventType: 'bill.updated',
      aggregateType: 'Bill',
      aggregateId: billId,
      payload: { billId, status: row.status, amountTotal: formatMoney(totals.total) },
    });
    return await readBill(trx, ctx.db, tenantId, billId);
  });
}

/**
 * DRAFT → CONFIRMED and authorized. One-way: a second call fails with
 * InvalidStateError and leaves authorized_by/authorized_at untouched, since
 * proxy splits and payments are measured against the frozen total.
 */
export async function authorizeBill(
  ctx: LedgerContext,
  tenantId: number,
  billId: number,
  userId: number
): Promise<Bill> {
  const authorizedBy = parseInput(entityId, userId);

  const bill = await withTransaction(ctx.db, async (trx) => {
    const row = await loadBillRow(ctx.db, trx, tenantId, billId, true);
    requireStatus(row, ['DRAFT'], 'authorize');

    const items = await loadBillItems(trx, [billId]);
    assertTotalsConsistent(
      {
        subtotal: moneyFromColumn(row.amount_subtotal),
        tax: moneyFromColumn(row.amount_tax),
        total: moneyFromColumn(row.amount_total),
      },
      items.map((i) => moneyFromColumn(i.amount))
    );

    await updateBillVersioned(trx, row, {
      status: 'CONFIRMED',
      is_authorized: true,
      authorized_by: authorizedBy,
      authorized_at: isoNow(),
    });
    await writeAuditLog(trx, ctx.logger, {
      tenantId,
      userId: authorizedBy,
      action: 'bill.authorized',
      entityType: 'Bill',
      entityId: billId,
    });
    await appendOutboxEvent(trx, {
      tenantId,
      eventType: 'bill.authorized',
      aggregateType: 'Bill',
      aggregateId: billId,
      payload: { billId, status: 'CONFIRMED', authorizedBy, amountTotal: formatMoney(moneyFromColumn(row.amount_total)) },
    });
    return await readBill(trx, ctx.db, tenantId, billId);
  });

  ctx.logger.info({ tenantId, billId, authorizedBy }, 'bill authorized');
  return bill;
}

/**
 * DRAFT|CONFIRMED → CANCELLED. Refused while an active proxy bill or any credit
 * entry still points at the bill.
 */
async function assertNoCreditEntries(trx: Knex, tenantId: number, billId: number): Promise<void> {
  const entry = await trx<CreditEntryRow>('credit_entries')
    .where({ tenant_id: tenantId, bill_id: billId })
    .first('id');
  if (entry) {
    throw new ConflictError('bill has credit entries', { details: { billId, creditEntryId: entry.id } });
  }
}

export async function cancelBill(
  ctx: LedgerContext,
  tenantId: number,
  billId: number,
  userId: number | null = null
): Promise<Bill> {
  const bill = await withTransaction(ctx.db, async (trx) => {
    const row = await loadBillRow(ctx.db, trx, tenantId, billId, true);
    requireStatus(row, ['DRAFT', 'CONFIRMED'], 'cancel');

    const activeProxy = await trx<ProxyBillRow>('proxy_bills')
      .where({ tenant_id: tenantId, parent_bill_id: billId })
      .whereNot('status', 'CANCELLED')
      .first('id');
    if (activeProxy) {
      throw new ConflictError('bill has active proxy bills', { details: { billId, proxyBillId: activeProxy.id } });
    }
    await assertNoCreditEntries(trx, tenantId, billId);

    await updateBillVersioned(trx, row, { status: 'CANCELLED' });
    await writeAuditLog(trx, ctx.logger, {
      tenantId,
      userId,
      action: 'bill.cancelled',
      entityType: 'Bill',
      entityId: billId,
      metadata: { previousStatus: row.status },
    });
    await appendOutboxEvent(trx, {
      tenantId,
      eventType: 'bill.cancelled',
      aggregateType: 'Bill',
      aggregateId: billId,
      payload: { billId, status: 'CANCELLED', previousStatus: row.status },
    });
    return await readBill(trx, ctx.db, tenantId, billId);
  });

  ctx.logger.info({ tenantId, billId }, 'bill cancelled');
  return bill;
}

/**
 * Hard delete, DRAFT only. Items go with the bill. Refused while a credit entry
 * or delivery order points at the bill, since deleting would unlink it.
 */
export async function deleteDraftBill(
  ctx: LedgerContext,
  tenantId: number,
  billId: number,
  userId: number | null = null
): Promise<void> {
  await withTransaction(ctx.db, async (trx) => {
    const row = await loadBillRow(ctx.db, trx, tenantId, billId, true);
    requireStatus(row, ['DRAFT'], 'delete');
    await assertNoCreditEntries(trx, tenantId, billId);
    const order = await trx<DeliveryOrderRow>('delivery_orders')
      .where({ tenant_id: tenantId, bill_id: billId })
      .first('id');
    if (order) {
      throw new ConflictError('bill has delivery orders', { details: { billId, deliveryOrderId: order.id } });
    }
    await trx<BillRow>('bills').where({ id: billId, tenant_id: tenantId }).del();
    await writeAuditLog(trx, ctx.logger, {
      tenantId,
      userId,
      action: 'bill.deleted',
      entityType: 'Bill',
      entityId: billId,
      metadata: { billNumber: row.bill_number },
    });
    await appendOutboxEvent(trx, {
      tenantId,
      eventType: 'bill.deleted',
      aggregateType: 'Bill',
      aggregateId: billId,
      payload: { billId },
    });
  });
}

export async function getBill(ctx: LedgerContext, tenantId: number, billId: number): Promise<Bill> {
  return await readBill(ctx.db.knex, ctx.db, tenantId, billId);
}

/**
 * Bills of a tenant ordered by bill date then id; `from`/`to` are inclusive bill
 * dates and `search` matches part of the bill number, ignoring case.
 */
export async function listBills(ctx: LedgerContext, tenantId: number, filter: BillListFilter = {}): Promise<Bill[]> {
  const f = parseInput(BillListFilter, filter);
  const q = ctx.db.knex<BillRow>('bills').where({ tenant_id: tenantId });
  if (f.from) q.andWhere('bill_date', '>=', f.from);
  if (f.to) q.andWhere('bill_date', '<=', f.to);
  if (f.vendorId) q.andWhere('vendor_id', f.vendorId);
  if (f.status) q.andWhere('status', f.status);
  if (f.search) {
    const pattern = `%${f.search.toLowerCase().replace(/[!%_]/g, '!$&')}%`;
    q.andWhereRaw("lower(bill_number) like ? escape '!'", [pattern]);
  }
  const rows = await q.orderBy('bill_date', 'asc').orderBy('id', 'asc');

  const ids = rows.map((r) => r.id);
  const items = await loadBillItems(ctx.db.knex, ids);
  const paid = await loadPaidByBill(ctx.db.knex, tenantId, ids);
  const byBill = new Map<number, BillItemRow[]>();
  for (const item of items) {
    const list = byBill.get(item.bill_id) ?? [];
    list.push(item);
    byBill.set(item.bill_id, list);
  }
  return rows.map((r) => toBill(r, byBill.get(r.id) ?? [], paid.get(r.id)));
}
