import type { LedgerContext } from './infrastructure/context.js';
import { closeDb, createDb, type Db } from './infrastructure/db.js';
import { loadConfig, type AppConfig } from './infrastructure/config.js';
import { createLogger, type Logger } from './infrastructure/logger.js';
import { closeRedis, getRedis } from './infrastructure/redis.js';
import type { LockClient } from './infrastructure/locks.js';
import { migrateToLatest } from './infrastructure/schema.js';
import { listAuditLog } from './infrastructure/auditLog.js';
import { listOutboxEvents, markEventPublished } from './infrastructure/events.js';
import * as directory from './modules/directory/directory.service.js';
import * as bills from './modules/bills/bills.service.js';
import * as proxyBills from './modules/proxyBills/proxyBills.service.js';
import * as credits from './modules/credits/credits.service.js';
import * as outstanding from './modules/reports/outstanding.service.js';
import * as delivery from './modules/delivery/deliveryOrders.service.js';
import type { DeliveryStatus, VendorType } from './types/ledger.js';

export * from './infrastructure/errors.js';
export * from './types/ledger.js';
export type { Db, DbConfig } from './infrastructure/db.js';
export type { AppConfig } from './infrastructure/config.js';
export type { LockClient } from './infrastructure/locks.js';
export type { OutboxEvent } from './infrastructure/events.js';
export type { AuditLogEntry } from './infrastructure/auditLog.js';
export type { CreateTenantInput, CreateVendorInput, UpdateVendorInput } from './modules/directory/directory.service.js';
export type { CreateDraftBillInput, UpdateDraftBillInput, BillListFilter } from './modules/bills/bills.service.js';
export type { CreateProxyInput, ProxySplit, RemainingCapacity } from './modules/proxyBills/proxyBills.service.js';
export type { RecordPaymentInput, MarkPaidInput, CreditEntryFilter, CollectionSummary } from './modules/credits/credits.service.js';
export type { VendorOutstanding, OutstandingReportRow, DeliverySummary, TenantDashboard } from './modules/reports/outstanding.service.js';
export type { CreateDeliveryOrderInput } from './modules/delivery/deliveryOrders.service.js';
export { computeOutstanding } from './modules/reports/outstanding.compute.js';
export { createDb, closeDb } from './infrastructure/db.js';
export { migrateToLatest, rollbackAll } from './infrastructure/schema.js';
export { loadConfig } from './infrastructure/config.js';

export type BillingCoreOptions = {
  db: Db;
  logger: Logger;
  redis?: LockClient | null;
  lockTtlMs?: number;
};

/**
 * The ledger's public surface. Every call takes the tenant id explicitly;
 * the core holds no per-tenant state.
 */
export function createBillingCore(options: BillingCoreOptions) {
  const ctx: LedgerContext = {
    db: options.db,
    logger: options.logger,
    redis: options.redis ?? null,
    lockTtlMs: options.lockTtlMs ?? 10_000,
  };
  const knex = ctx.db.knex;

  return {
    db: ctx.db,
    logger: ctx.logger,

    directory: {
      createTenant: (input: directory.CreateTenantInput) => directory.createTenant(ctx, input),
      getTenant: (tenantId: number) => directory.getTenant(ctx, tenantId),
      createVendor: (tenantId: number, input: directory.CreateVendorInput, userId?: number | null) =>
        directory.createVendor(ctx, tenantId, input, userId ?? null),
      updateVendor: (tenantId: number, vendorId: number, patch: directory.UpdateVendorInput, userId?: number | null) =>
        directory.updateVendor(ctx, tenantId, vendorId, patch, userId ?? null),
      deleteVendor: (tenantId: number, vendorId: number, userId?: number | null) =>
        directory.deleteVendor(ctx, tenantId, vendorId, userId ?? null),
      getVendor: (tenantId: number, vendorId: number) => directory.getVendor(ctx, tenantId, vendorId),
      listVendors: (tenantId: number, filter?: { type?: VendorType }) => directory.listVendors(ctx, tenantId, filter),
      vendorBelongsToTenant: (vendorId: number, tenantId: number) =>
        directory.vendorBelongsToTenant(knex, vendorId, tenantId),
    },

    bills: {
      createDraft: (tenantId: number, input: bills.CreateDraftBillInput, userId?: number | null) =>
        bills.createDraftBill(ctx, tenantId, input, userId ?? null),
      updateDraft: (tenantId: number, billId: number, input: bills.UpdateDraftBillInput, userId?: number | null) =>
        bills.updateDraftBill(ctx, tenantId, billId, input, userId ?? null),
      authorize: (tenantId: number, billId: number, userId: number) => bills.authorizeBill(ctx, tenantId, billId, userId),
      cancel: (tenantId: number, billId: number, userId?: number | null) =>
        bills.cancelBill(ctx, tenantId, billId, userId ?? null),
      deleteDraft: (tenantId: number, billId: number, userId?: number | null) =>
        bills.deleteDraftBill(ctx, tenantId, billId, userId ?? null),
      getBill: (tenantId: number, billId: number) => bills.getBill(ctx, tenantId, billId),
      listBills: (tenantId: number, filter?: bills.BillListFilter) => bills.listBills(ctx, tenantId, filter),
    },

    proxyBills: {
      createProxy: (tenantId: number, input: proxyBills.CreateProxyInput, userId?: number | null) =>
        proxyBills.createProxyBill(ctx, tenantId, input, userId ?? null),
      createProxySplits: (
        tenantId: number,
        parentBillId: number,
        splits: readonly proxyBills.ProxySplit[],
        userId?: number | null
      ) => proxyBills.createProxySplits(ctx, tenantId, parentBillId, splits, userId ?? null),
      cancelProxy: (tenantId: number, proxyBillId: number, userId?: number | null) =>
        proxyBills.cancelProxyBill(ctx, tenantId, proxyBillId, userId ?? null),
      getProxyBill: (tenantId: number, proxyBillId: number) => proxyBills.getProxyBill(ctx, tenantId, proxyBillId),
      listProxyBills: (tenantId: number, parentBillId: number) =>
        proxyBills.listProxyBills(ctx, tenantId, parentBillId),
      remainingCapacity: (tenantId: number, parentBillId: number) =>
        proxyBills.remainingCapacity(ctx, tenantId, parentBillId),
    },

    credits: {
      recordPayment: (tenantId: number, input: credits.RecordPaymentInput, userId?: number | null) =>
        credits.recordPayment(ctx, tenantId, input, userId ?? null),
      listCreditEntries: (tenantId: number, filter?: credits.CreditEntryFilter) =>
        credits.listCreditEntries(ctx, tenantId, filter),
      markPaid: (tenantId: number, billId: number, input: credits.MarkPaidInput, userId?: number | null) =>
        credits.markBillPaid(ctx, tenantId, billId, input, userId ?? null),
      collectionSummary: (tenantId: number, from: string, to: string) =>
        credits.collectionSummary(ctx, tenantId, from, to),
    },

    reports: {
      outstandingForVendor: (tenantId: number, vendorId: number, asOf?: string) =>
        outstanding.outstandingForVendor(ctx, tenantId, vendorId, asOf),
      outstandingReport: (tenantId: number, asOf?: string) => outstanding.outstandingReport(ctx, tenantId, asOf),
      deliverySummary: (tenantId: number) => outstanding.deliverySummary(ctx, tenantId),
      dashboard: (tenantId: number) => outstanding.tenantDashboard(ctx, tenantId),
    },

    delivery: {
      createDeliveryOrder: (tenantId: number, input: delivery.CreateDeliveryOrderInput, userId?: number | null) =>
        delivery.createDeliveryOrder(ctx, tenantId, input, userId ?? null),
      updateDeliveryStatus: (tenantId: number, deliveryOrderId: number, status: DeliveryStatus, userId?: number | null) =>
        delivery.updateDeliveryStatus(ctx, tenantId, deliveryOrderId, status, userId ?? null),
      listDeliveryOrders: (tenantId: number, filter?: { status?: DeliveryStatus }) =>
        delivery.listDeliveryOrders(ctx, tenantId, filter),
    },

    outbox: {
      listOutboxEvents: (tenantId: number, options?: { unpublishedOnly?: boolean; limit?: number }) =>
        listOutboxEvents(knex, tenantId, options),
      markEventPublished: (tenantId: number, eventId: string) => markEventPublished(knex, tenantId, eventId),
    },

    audit: {
      listAuditLog: (tenantId: number, filter?: { entityType?: string; entityId?: string | number }) =>
        listAuditLog(knex, tenantId, filter),
    },
  };
}

export type BillingCore = ReturnType<typeof createBillingCore>;

/**
 * Wires the core from environment variables (see `loadConfig`). Runs pending
 * migrations unless `migrate: false`. `close()` releases the pool and Redis.
 */
export async function createBillingCoreFromEnv(
  options: { env?: NodeJS.ProcessEnv; migrate?: boolean } = {}
): Promise<BillingCore & { config: AppConfig; close: () => Promise<void> }> {
  const config = loadConfig(options.env);
  const logger = createLogger(config.logLevel);
  const db = createDb({
    client: config.database.client,
    connection: config.database.url,
    poolMax: config.database.poolMax,
    isolationLevel: config.database.isolationLevel,
    txTimeoutMs: config.database.txTimeoutMs,
  });
  if (options.migrate !== false) {
    const applied = await migrateToLatest(db);
    if (applied.length > 0) logger.info({ migrations: applied }, 'migrations applied');
  }
  const redis = config.redisUrl ? getRedis(config.redisUrl) : null;
  const core = createBillingCore({ db, logger, redis, lockTtlMs: config.lockTtlMs });

  return {
    ...core,
    config,
    close: async () => {
      if (redis) await closeRedis();
      await closeDb(db);
    },
  };
}
