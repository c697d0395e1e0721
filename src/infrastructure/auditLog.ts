import type { Knex } from 'knex';
import type { Logger } from './logger.js';
import type { AuditLogRow } from '../types/rows.js';
import { isoNow } from '../utils/date.js';

export type AuditLogWrite = {
  tenantId: number;
  userId?: number | null;
  action: string;
  entityType: string;
  entityId?: string | number | null;
  metadata?: unknown;
};

/**
 * Best-effort audit insert inside the caller's transaction.
 * Runs in a savepoint so a failed insert cannot abort the surrounding
 * postgres transaction; the failure is logged and the business write proceeds.
 */
export async function writeAuditLog(trx: Knex.Transaction, logger: Logger, input: AuditLogWrite): Promise<void> {
  const entityId = input.entityId === undefined || input.entityId === null ? null : String(input.entityId);
  try {
    await trx.transaction(async (sp) => {
      await sp<AuditLogRow>('audit_logs').insert({
        tenant_id: input.tenantId,
        user_id: input.userId ?? null,
        action: input.action,
        entity_type: input.entityType,
        entity_id: entityId,
        metadata: input.metadata === undefined ? null : JSON.stringify(input.metadata),
        created_at: isoNow(),
      });
    });
  } catch (err) {
    logger.warn({ err, tenantId: input.tenantId, action: input.action, entityId }, 'audit log write failed');
  }
}

export type AuditLogEntry = {
  id: number;
  userId: number | null;
  action: string;
  entityType: string;
  entityId: string | null;
  metadata: unknown;
};

export async function listAuditLog(
  knex: Knex,
  tenantId: number,
  filter: { entityType?: string; entityId?: string | number } = {}
): Promise<AuditLogEntry[]> {
  const q = knex<AuditLogRow>('audit_logs').where({ tenant_id: tenantId });
  if (filter.entityType) q.andWhere('entity_type', filter.entityType);
  if (filter.entityId !== undefined) q.andWhere('entity_id', String(filter.entityId));
  const rows = await q.orderBy('id', 'asc');
  return rows.map((r) => ({
    id: r.id,
    userId: r.user_id,
    action: r.action,
    entityType: r.entity_type,
    entityId: r.entity_id,
    metadata: r.metadata === null ? null : JSON.parse(r.metadata),
  }));
}
