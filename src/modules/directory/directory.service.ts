import { z } from 'zod';
import type { Knex } from 'knex';
import type { LedgerContext } from '../../infrastructure/context.js';
import { isForeignKeyViolation, isUniqueViolation, withTransaction } from '../../infrastructure/db.js';
import { ConflictError, NotFoundError, ValidationError } from '../../infrastructure/errors.js';
import { writeAuditLog } from '../../infrastructure/auditLog.js';
import type { TenantRow, VendorRow } from '../../types/rows.js';
import { VENDOR_TYPES, type Tenant, type Vendor, type VendorType } from '../../types/ledger.js';
import { isoNow, toTimestamp } from '../../utils/date.js';
import { formatMoney, moneyFromColumn } from '../../utils/money.js';
import { nonNegativeAmount, optionalText, parseInput, requiredText } from '../../utils/validation.js';

const TenantInput = z.object({
  name: requiredText(200),
  code: requiredText(50),
});

const VendorFields = {
  name: requiredText(200),
  type: z.enum(VENDOR_TYPES),
  creditLimit: nonNegativeAmount.optional(),
  contactPhone: optionalText(20),
  email: optionalText(100),
  address: optionalText(2_000),
  gstNumber: optionalText(50),
};

const VendorInput = z.object(VendorFields);
const VendorPatch = z.object(VendorFields).partial();

export type CreateTenantInput = z.input<typeof TenantInput>;
export type CreateVendorInput = z.input<typeof VendorInput>;
export type UpdateVendorInput = z.input<typeof VendorPatch>;

export function toTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    name: row.name,
    code: row.code,
    active: Boolean(row.active),
    createdAt: toTimestamp(row.created_at),
  };
}

export function toVendor(row: VendorRow): Vendor {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    name: row.name,
    type: row.type,
    creditLimit: formatMoney(moneyFromColumn(row.credit_limit)),
    contactPhone: row.contact_phone,
    email: row.email,
    address: row.address,
    gstNumber: row.gst_number,
    createdAt: toTimestamp(row.created_at),
  };
}

export async function vendorBelongsToTenant(knex: Knex, vendorId: number, tenantId: number): Promise<boolean> {
  const row = await knex<VendorRow>('vendors').where({ id: vendorId, tenant_id: tenantId }).first('id');
  return row !== undefined;
}

/** Cross-tenant or unknown vendor references are malformed input for ledger writes. */
export async function assertVendorInTenant(knex: Knex, vendorId: number, tenantId: number): Promise<void> {
  if (!(await vendorBelongsToTenant(knex, vendorId, tenantId))) {
    throw new ValidationError('vendorId not found in this tenant', { details: { vendorId } });
  }
}

async function requireActiveTenant(knex: Knex, tenantId: number): Promise<TenantRow> {
  const row = await knex<TenantRow>('tenants').where({ id: tenantId }).first();
  if (!row || !row.active) throw new NotFoundError('tenant not found', { details: { tenantId } });
  return row;
}

export async function createTenant(ctx: LedgerContext, input: CreateTenantInput): Promise<Tenant> {
  const data = parseInput(TenantInput, input);
  try {
    return await withTransaction(ctx.db, async (trx) => {
      const taken = await trx<TenantRow>('tenants').where({ code: data.code }).first('id');
      if (taken) throw new ConflictError('tenant code already in use', { details: { code: data.code } });
      const [row] = await trx<TenantRow>('tenants')
        .insert({ name: data.name, code: data.code, active: true, created_at: isoNow() })
        .returning('*');
      if (!row) throw new Error('tenant insert returned no row');
      ctx.logger.info({ tenantId: row.id, code: row.code }, 'tenant created');
      return toTenant(row);
    });
  } catch (err) {
    if (isUniqueViolation(err)) throw new ConflictError('tenant code already in use', { cause: err });
    throw err;
  }
}

export async function getTenant(ctx: LedgerContext, tenantId: number): Promise<Tenant> {
  const row = await ctx.db.knex<TenantRow>('tenants').where({ id: tenantId }).first();
  if (!row) throw new NotFoundError('tenant not found', { details: { tenantId } });
  return toTenant(row);
}

export async function createVendor(
  ctx: LedgerContext,
  tenantId: number,
  input: CreateVendorInput,
  userId: number | null = null
): Promise<Vendor> {
  const data = parseInput(VendorInput, input);
  return await withTransaction(ctx.db, async (trx) => {
    await requireActiveTenant(trx, tenantId);
    const [row] = await trx<VendorRow>('vendors')
      .insert({
        tenant_id: tenantId,
        name: data.name,
        type: data.type,
        credit_limit: data.creditLimit ? formatMoney(data.creditLimit) : '0.00',
        contact_phone: data.contactPhone,
        email: data.email,
        address: data.address,
        gst_number: data.gstNumber,
        created_at: isoNow(),
      })
      .returning('*');
    if (!row) throw new Error('vendor insert returned no row');
    await writeAuditLog(trx, ctx.logger, {
      tenantId,
      userId,
      action: 'vendor.created',
      entityType: 'Vendor',
      entityId: row.id,
    });
    return toVendor(row);
  });
}

export async function updateVendor(
  ctx: LedgerContext,
  tenantId: number,
  vendorId: number,
  patch: UpdateVendorInput,
  userId: number | null = null
): Promise<Vendor> {
  const data = parseInput(VendorPatch, patch);
  return await withTransaction(ctx.db, async (trx) => {
    const existing = await trx<VendorRow>('vendors').where({ id: vendorId, tenant_id: tenantId }).first();
    if (!existing) throw new NotFoundError('vendor not found', { details: { vendorId } });

    const changes: Partial<VendorRow> = {};
    if (data.name !== undefined) changes.name = data.name;
    if (data.type !== undefined) changes.type = data.type;
    if (data.creditLimit !== undefined) changes.credit_limit = formatMoney(data.creditLimit);
    // Omitted fields stay undefined; a blank string clears the field.
    if (data.contactPhone !== undefined) changes.contact_phone = data.contactPhone;
    if (data.email !== undefined) changes.email = data.email;
    if (data.address !== undefined) changes.address = data.address;
    if (data.gstNumber !== undefined) changes.gst_number = data.gstNumber;

    if (Object.keys(changes).length > 0) {
      await trx<VendorRow>('vendors').where({ id: vendorId, tenant_id: tenantId }).update(changes);
      await writeAuditLog(trx, ctx.logger, {
        tenantId,
        userId,
        action: 'vendor.updated',
        entityType: 'Vendor',
        entityId: vendorId,
        metadata: { fields: Object.keys(changes) },
      });
    }
    const row = await trx<VendorRow>('vendors').where({ id: vendorId, tenant_id: tenantId }).first();
    if (!row) throw new NotFoundError('vendor not found', { details: { vendorId } });
    return toVendor(row);
  });
}

type VendorRefRow = { id: number; tenant_id: number; vendor_id: number };

/** Vendors with any financial history are kept; the schema enforces the same rule. */
export async function deleteVendor(
  ctx: LedgerContext,
  tenantId: number,
  vendorId: number,
  userId: number | null = null
): Promise<void> {
  await withTransaction(ctx.db, async (trx) => {
    const existing = await trx<VendorRow>('vendors').where({ id: vendorId, tenant_id: tenantId }).first('id');
    if (!existing) throw new NotFoundError('vendor not found', { details: { vendorId } });

    for (const table of ['bills', 'proxy_bills', 'credit_entries'] as const) {
      const ref = await trx<VendorRefRow>(table).where({ tenant_id: tenantId, vendor_id: vendorId }).first('id');
      if (ref) {
        throw new ConflictError(`vendor is referenced by ${table}`, { details: { vendorId, table } });
      }
    }

    try {
      await trx<VendorRow>('vendors').where({ id: vendorId, tenant_id: tenantId }).del();
    } catch (err) {
      if (isForeignKeyViolation(err)) {
        throw new ConflictError('vendor is referenced by other records', { cause: err, details: { vendorId } });
      }
      throw err;
    }
    await writeAuditLog(trx, ctx.logger, {
      tenantId,
      userId,
      action: 'vendor.deleted',
      entityType: 'Vendor',
      entityId: vendorId,
    });
  });
}

export async function getVendor(ctx: LedgerContext, tenantId: number, vendorId: number): Promise<Vendor> {
  const row = await ctx.db.knex<VendorRow>('vendors').where({ id: vendorId, tenant_id: tenantId }).first();
  if (!row) throw new NotFoundError('vendor not found', { details: { vendorId } });
  return toVendor(row);
}

export async function listVendors(
  ctx: LedgerContext,
  tenantId: number,
  filter: { type?: VendorType } = {}
): Promise<Vendor[]> {
  const q = ctx.db.knex<VendorRow>('vendors').where({ tenant_id: tenantId });
  // BOTH vendors act as suppliers and customers.
  if (filter.type === 'SUPPLIER' || filter.type === 'CUSTOMER') q.whereIn('type', [filter.type, 'BOTH']);
  else if (filter.type === 'BOTH') q.andWhere('type', 'BOTH');
  const rows = await q.orderBy('name', 'asc').orderBy('id', 'asc');
  return rows.map(toVendor);
}
