import { z } from 'zod';
import type { Knex } from 'knex';
import type { LedgerContext } from '../../infrastructure/context.js';
import { forUpdate, withTransaction, type Db } from '../../infrastructure/db.js';
import { InvalidStateError, NotFoundError, ValidationError } from '../../infrastructure/errors.js';
import { writeAuditLog } from '../../infrastructure/auditLog.js';
import { appendOutboxEvent } from '../../infrastructure/events.js';
import { runIdempotentCommand } from '../../infrastructure/commandIdempotency.js';
import type { BillRow, CreditEntryRow } from '../../types/rows.js';
import { CREDIT_DIRECTIONS, PAYMENT_METHODS, type CreditEntry } from '../../types/ledger.js';
import { isoNow, toDateOnly, toTimestamp } from '../../utils/date.js';
import { Decimal, formatMoney, moneyFromColumn, sumMoney } from '../../utils/money.js';
import { dateOnly, entityId, optionalText, parseInput, positiveAmount } from '../../utils/validation.js';
import { assertVendorInTenant } from '../directory/directory.service.js';
import { loadBillRow, loadPaidByBill } from '../bills/bills.service.js';

const RecordPaymentInput = z
  .object({
    vendorId: entityId,
    amount: positiveAmount,
    direction: z.enum(CREDIT_DIRECTIONS),
    method: z.enum(PAYMENT_METHODS),
    date: dateOnly,
    billId: entityId.nullish(),
    proxyBillId: entityId.nullish(),
    referenceNumber: optionalText(100),
    notes: optionalText(2_000),
    idempotencyKey: optionalText(100),
  })
  .refine((d) => !(d.billId && d.proxyBillId), {
    message: 'billId and proxyBillId are mutually exclusive',
    path: ['proxyBillId'],
  });

const MarkPaidInput = z
  .object({
    mode: z.enum(['FULL', 'PARTIAL']),
    amount: positiveAmount.optional(),
    method: z.enum(PAYMENT_METHODS),
    date: dateOnly.optional(),
    referenceNumber: optionalText(100),
    notes: optionalText(2_000),
    idempotencyKey: optionalText(100),
  })
  .refine((d) => d.mode === 'FULL' || d.amount !== undefined, {
    message: 'is required for a partial payment',
    path: ['amount'],
  });

const CreditEntryFilter = z.object({
  vendorId: entityId.optional(),
  from: dateOnly.optional(),
  to: dateOnly.optional(),
  direction: z.enum(CREDIT_DIRECTIONS).optional(),
});

const DateRange = z.object({ from: dateOnly, to: dateOnly }).refine((r) => r.from <= r.to, {
  message: 'must not be before from',
  path: ['to'],
});

export type RecordPaymentInput = z.input<typeof RecordPaymentInput>;
export type MarkPaidInput = z.input<typeof MarkPaidInput>;
export type CreditEntryFilter = z.input<typeof CreditEntryFilter>;

export type CollectionSummary = {
  from: string;
  to: string;
  entryCount: number;
  totalIncoming: string;
  totalOutgoing: string;
  net: string;
};

export function toCreditEntry(row: CreditEntryRow): CreditEntry {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    vendorId: row.vendor_id,
    billId: row.bill_id,
    proxyBillId: row.proxy_bill_id,
    amount: formatMoney(moneyFromColumn(row.amount)),
    direction: row.direction,
    paymentMethod: row.payment_method,
    paymentDate: toDateOnly(row.payment_date),
    referenceNumber: row.reference_number,
    notes: row.notes,
    idempotencyKey: row.idempotency_key,
    createdBy: row.created_by,
    createdAt: toTimestamp(row.created_at),
  };
}

type Reference = { kind: 'bill' | 'proxy bill'; id: number; vendorId: number; status: BillRow['status'] };

type ReferenceRow = Pick<BillRow, 'id' | 'tenant_id' | 'vendor_id' | 'status'>;

/**
 * The referenced row stays locked until commit, so a concurrent cancel either
 * sees the new entry or is seen here as CANCELLED.
 */
export function referenceRowQuery(db: Db, trx: Knex, table: 'bills' | 'proxy_bills', tenantId: number, id: number) {
  return forUpdate(db, trx<ReferenceRow>(table).where({ id, tenant_id: tenantId }));
}

async function loadReference(
  db: Db,
  trx: Knex,
  tenantId: number,
  billId: number | null | undefined,
  proxyBillId: number | null | undefined
): Promise<Reference | null> {
  if (billId) {
    const bill = await referenceRowQuery(db, trx, 'bills', tenantId, billId).first('id', 'vendor_id', 'status');
    if (!bill) throw new NotFoundError('bill not found', { details: { billId } });
    return { kind: 'bill', id: bill.id, vendorId: bill.vendor_id, status: bill.status };
  }
  if (proxyBillId) {
    const proxy = await referenceRowQuery(db, trx, 'proxy_bills', tenantId, proxyBillId).first('id', 'vendor_id', 'status');
    if (!proxy) throw new NotFoundError('proxy bill not found', { details: { proxyBillId } });
    return { kind: 'proxy bill', id: proxy.id, vendorId: proxy.vendor_id, status: proxy.status };
  }
  return null;
}

type NewCreditEntry = {
  vendorId: number;
  amount: Decimal;
  direction: CreditEntryRow['direction'];
  method: CreditEntryRow['payment_method'];
  date: string;
  billId?: number | null | undefined;
  proxyBillId?: number | null | undefined;
  referenceNumber: string | null;
  notes: string | null;
  idempotencyKey: string | null;
};

async function insertCreditEntry(
  ctx: LedgerContext,
  trx: Knex.Transaction,
  tenantId: number,
  data: NewCreditEntry,
  userId: number | null
): Promise<CreditEntry> {
  const [row] = await trx<CreditEntryRow>('credit_entries')
    .insert({
      tenant_id: tenantId,
      vendor_id: data.vendorId,
      bill_id: data.billId ?? null,
      proxy_bill_id: data.proxyBillId ?? null,
      amount: formatMoney(data.amount),
      direction: data.direction,
      payment_method: data.method,
      payment_date: data.date,
      reference_number: data.referenceNumber,
      notes: data.notes,
      idempotency_key: data.idempotencyKey,
      created_by: userId,
      created_at: isoNow(),
    })
    .returning('*');
  if (!row) throw new Error('credit entry insert returned no row');

  await writeAuditLog(trx, ctx.logger, {
    tenantId,
    userId,
    action: 'credit_entry.recorded',
    entityType: 'CreditEntry',
    entityId: row.id,
    metadata: { direction: row.direction, amount: formatMoney(data.amount) },
  });
  await appendOutboxEvent(trx, {
    tenantId,
    eventType: 'credit_entry.recorded',
    aggregateType: 'CreditEntry',
    aggregateId: row.id,
    payload: {
      creditEntryId: row.id,
      vendorId: row.vendor_id,
      billId: row.bill_id,
      proxyBillId: row.proxy_bill_id,
      direction: row.direction,
      amount: formatMoney(data.amount),
    },
  });
  return toCreditEntry(row);
}

async function findByIdempotencyKey(trx: Knex, tenantId: number, key: string): Promise<CreditEntry | undefined> {
  const existing = await trx<CreditEntryRow>('credit_entries').where({ tenant_id: tenantId, idempotency_key: key }).first();
  return existing ? toCreditEntry(existing) : undefined;
}

/**
 * Appends one immutable credit entry. Entries are never updated or deleted;
 * a correction is a new entry in the opposite direction.
 *
 * A repeated idempotency key within the tenant returns the entry recorded the
 * first time, whatever the new payload says.
 */
export async function recordPayment(
  ctx: LedgerContext,
  tenantId: number,
  input: RecordPaymentInput,
  userId: number | null = null
): Promise<CreditEntry> {
  const data = parseInput(RecordPaymentInput, input);

  const { replay, response } = await withTransaction(ctx.db, (trx) =>
    runIdempotentCommand(
      data.idempotencyKey,
      (key) => findByIdempotencyKey(trx, tenantId, key),
      async () => {
        await assertVendorInTenant(trx, data.vendorId, tenantId);
        const ref = await loadReference(ctx.db, trx, tenantId, data.billId, data.proxyBillId);
        if (ref && ref.status === 'CANCELLED') {
          throw new InvalidStateError(`cannot record a payment against a cancelled ${ref.kind}`, {
            details: { reference: ref.kind, id: ref.id },
          });
        }
        if (ref && ref.vendorId !== data.vendorId) {
          throw new ValidationError(`vendorId does not match the ${ref.kind}'s vendor`, {
            details: { vendorId: data.vendorId, referenceVendorId: ref.vendorId },
          });
        }

        return await insertCreditEntry(ctx, trx, tenantId, data, userId);
      }
    )
  );

  if (replay) {
    ctx.logger.info({ tenantId, creditEntryId: response.id }, 'credit entry replayed for idempotency key');
  } else {
    ctx.logger.info(
      { tenantId, creditEntryId: response.id, direction: response.direction, amount: response.amount },
      'credit entry recorded'
    );
  }
  return response;
}

/**
 * Records an INCOMING entry against a CONFIRMED bill for its vendor. FULL pays
 * whatever remains; PARTIAL pays `amount`, which may not exceed the remainder.
 * The payment date defaults to the bill date.
 */
export async function markBillPaid(
  ctx: LedgerContext,
  tenantId: number,
  billId: number,
  input: MarkPaidInput,
  userId: number | null = null
): Promise<CreditEntry> {
  const data = parseInput(MarkPaidInput, input);

  const { replay, response } = await withTransaction(ctx.db, (trx) =>
    runIdempotentCommand(
      data.idempotencyKey,
      (key) => findByIdempotencyKey(trx, tenantId, key),
      async () => {
        const bill = await loadBillRow(ctx.db, trx, tenantId, billId, true);
        if (bill.status !== 'CONFIRMED') {
          throw new InvalidStateError(`cannot mark a ${bill.status} bill paid`, {
            details: { billId, status: bill.status },
          });
        }
        const paid = (await loadPaidByBill(trx, tenantId, [billId])).get(billId) ?? new Decimal(0);
        const remaining = moneyFromColumn(bill.amount_total).sub(paid);
        if (!remaining.greaterThan(0)) {
          throw new InvalidStateError('bill is already paid', {
            details: { billId, totalPaid: formatMoney(paid) },
          });
        }
        const amount = data.mode === 'FULL' || data.amount === undefined ? remaining : data.amount;
        if (amount.greaterThan(remaining)) {
          throw new ValidationError(`amount: exceeds remaining balance of ${formatMoney(remaining)}`, {
            details: { billId, amount: formatMoney(amount), remaining: formatMoney(remaining) },
          });
        }

        return await insertCreditEntry(
          ctx,
          trx,
          tenantId,
          {
            vendorId: bill.vendor_id,
            amount,
            direction: 'INCOMING',
            method: data.method,
            date: data.date ?? toDateOnly(bill.bill_date),
            billId,
            referenceNumber: data.referenceNumber,
            notes: data.notes,
            idempotencyKey: data.idempotencyKey,
          },
          userId
        );
      }
    )
  );

  if (!replay) {
    ctx.logger.info({ tenantId, billId, creditEntryId: response.id, amount: response.amount }, 'bill marked paid');
  }
  return response;
}

/** Entries ordered by payment date then id; `from`/`to` are inclusive payment dates. */
export async function listCreditEntries(
  ctx: LedgerContext,
  tenantId: number,
  filter: CreditEntryFilter = {}
): Promise<CreditEntry[]> {
  const f = parseInput(CreditEntryFilter, filter);
  const q = ctx.db.knex<CreditEntryRow>('credit_entries').where({ tenant_id: tenantId });
  if (f.vendorId) q.andWhere('vendor_id', f.vendorId);
  if (f.from) q.andWhere('payment_date', '>=', f.from);
  if (f.to) q.andWhere('payment_date', '<=', f.to);
  if (f.direction) q.andWhere('direction', f.direction);
  const rows = await q.orderBy('payment_date', 'asc').orderBy('id', 'asc');
  return rows.map(toCreditEntry);
}

export async function collectionSummary(
  ctx: LedgerContext,
  tenantId: number,
  from: string,
  to: string
): Promise<CollectionSummary> {
  const range = parseInput(DateRange, { from, to });
  const rows = await ctx.db
    .knex<CreditEntryRow>('credit_entries')
    .where({ tenant_id: tenantId })
    .andWhere('payment_date', '>=', range.from)
    .andWhere('payment_date', '<=', range.to)
    .select('amount', 'direction');

  const incoming = sumMoney(rows.filter((r) => r.direction === 'INCOMING').map((r) => moneyFromColumn(r.amount)));
  const outgoing = sumMoney(rows.filter((r) => r.direction === 'OUTGOING').map((r) => moneyFromColumn(r.amount)));
  return {
    from: range.from,
    to: range.to,
    entryCount: rows.length,
    totalIncoming: formatMoney(incoming),
    totalOutgoing: formatMoney(outgoing),
    net: formatMoney(incoming.sub(outgoing)),
  };
}
