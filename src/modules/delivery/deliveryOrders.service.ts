import { z } from 'zod';
import type { LedgerContext } from '../../infrastructure/context.js';
import { forUpdate, withTransaction } from '../../infrastructure/db.js';
import { InvalidStateError, NotFoundError } from '../../infrastructure/errors.js';
import { writeAuditLog } from '../../infrastructure/auditLog.js';
import { appendOutboxEvent } from '../../infrastructure/events.js';
import type { BillRow, DeliveryOrderRow, ProxyBillRow } from '../../types/rows.js';
import { DELIVERY_STATUSES, type DeliveryOrder, type DeliveryStatus } from '../../types/ledger.js';
import { isoNow, toDateOnly, toTimestamp } from '../../utils/date.js';
import { dateOnly, entityId, optionalText, parseInput, requiredText } from '../../utils/validation.js';

const CreateDeliveryOrderInput = z
  .object({
    billId: entityId.nullish(),
    proxyBillId: entityId.nullish(),
    deliveryUserId: entityId,
    deliveryAddress: requiredText(2_000),
    deliveryDate: dateOnly,
    remarks: optionalText(2_000),
  })
  .refine((d) => !(d.billId && d.proxyBillId), {
    message: 'billId and proxyBillId are mutually exclusive',
    path: ['proxyBillId'],
  });

export type CreateDeliveryOrderInput = z.input<typeof CreateDeliveryOrderInput>;

const TRANSITIONS: Record<DeliveryStatus, readonly DeliveryStatus[]> = {
  PENDING: ['IN_TRANSIT', 'CANCELLED'],
  IN_TRANSIT: ['DELIVERED', 'CANCELLED'],
  DELIVERED: [],
  CANCELLED: [],
};

export function canTransition(from: DeliveryStatus, to: DeliveryStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function toDeliveryOrder(row: DeliveryOrderRow): DeliveryOrder {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    billId: row.bill_id,
    proxyBillId: row.proxy_bill_id,
    deliveryUserId: row.delivery_user_id,
    deliveryAddress: row.delivery_address,
    deliveryDate: toDateOnly(row.delivery_date),
    status: row.status,
    remarks: row.remarks,
    createdAt: toTimestamp(row.created_at),
  };
}

export async function createDeliveryOrder(
  ctx: LedgerContext,
  tenantId: number,
  input: CreateDeliveryOrderInput,
  userId: number | null = null
): Promise<DeliveryOrder> {
  const data = parseInput(CreateDeliveryOrderInput, input);
  return await withTransaction(ctx.db, async (trx) => {
    if (data.billId) {
      const bill = await trx<BillRow>('bills').where({ id: data.billId, tenant_id: tenantId }).first('id');
      if (!bill) throw new NotFoundError('bill not found', { details: { billId: data.billId } });
    }
    if (data.proxyBillId) {
      const proxy = await trx<ProxyBillRow>('proxy_bills')
        .where({ id: data.proxyBillId, tenant_id: tenantId })
        .first('id');
      if (!proxy) throw new NotFoundError('proxy bill not found', { details: { proxyBillId: data.proxyBillId } });
    }

    const [row] = await trx<DeliveryOrderRow>('delivery_orders')
      .insert({
        tenant_id: tenantId,
        bill_id: data.billId ?? null,
        proxy_bill_id: data.proxyBillId ?? null,
        delivery_user_id: data.deliveryUserId,
        delivery_address: data.deliveryAddress,
        delivery_date: data.deliveryDate,
        status: 'PENDING',
        remarks: data.remarks,
        created_at: isoNow(),
      })
      .returning('*');
    if (!row) throw new Error('delivery order insert returned no row');

    await writeAuditLog(trx, ctx.logger, {
      tenantId,
      userId,
      action: 'delivery_order.created',
      entityType: 'DeliveryOrder',
      entityId: row.id,
    });
    await appendOutboxEvent(trx, {
      tenantId,
      eventType: 'delivery_order.created',
      aggregateType: 'DeliveryOrder',
      aggregateId: row.id,
      payload: { deliveryOrderId: row.id, billId: row.bill_id, proxyBillId: row.proxy_bill_id },
    });
    return toDeliveryOrder(row);
  });
}

export async function updateDeliveryStatus(
  ctx: LedgerContext,
  tenantId: number,
  deliveryOrderId: number,
  status: DeliveryStatus,
  userId: number | null = null
): Promise<DeliveryOrder> {
  const next = parseInput(z.enum(DELIVERY_STATUSES), status);
  return await withTransaction(ctx.db, async (trx) => {
    const q = trx<DeliveryOrderRow>('delivery_orders').where({ id: deliveryOrderId, tenant_id: tenantId });
    const row = await forUpdate(ctx.db, q).first();
    if (!row) throw new NotFoundError('delivery order not found', { details: { deliveryOrderId } });
    if (!canTransition(row.status, next)) {
      throw new InvalidStateError(`cannot move delivery order from ${row.status} to ${next}`, {
        details: { deliveryOrderId, from: row.status, to: next },
      });
    }

    await trx<DeliveryOrderRow>('delivery_orders')
      .where({ id: deliveryOrderId, tenant_id: tenantId })
      .update({ status: next });
    await writeAuditLog(trx, ctx.logger, {
      tenantId,
      userId,
      action: 'delivery_order.status_changed',
      entityType: 'DeliveryOrder',
      entityId: deliveryOrderId,
      metadata: { from: row.status, to: next },
    });
    await appendOutboxEvent(trx, {
      tenantId,
      eventType: 'delivery_order.status_changed',
      aggregateType: 'DeliveryOrder',
      aggregateId: deliveryOrderId,
      payload: { deliveryOrderId, from: row.status, to: next },
    });
    return toDeliveryOrder({ ...row, status: next });
  });
}

export async function listDeliveryOrders(
  ctx: LedgerContext,
  tenantId: number,
  filter: { status?: DeliveryStatus } = {}
): Promise<DeliveryOrder[]> {
  const q = ctx.db.knex<DeliveryOrderRow>('delivery_orders').where({ tenant_id: tenantId });
  if (filter.status) q.andWhere('status', filter.status);
  const rows = await q.orderBy('delivery_date', 'asc').orderBy('id', 'asc');
  return rows.map(toDeliveryOrder);
}
