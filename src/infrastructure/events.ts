import { randomUUID } from 'node:crypto';
import type { Knex } from 'knex';
import type { DomainEventEnvelopeV1, LedgerEventType } from '../events/domainEvent.js';
import type { OutboxEventRow } from '../types/rows.js';
import { isoNow, toTimestamp } from '../utils/date.js';

export type OutboxEventInput<TPayload> = {
  tenantId: number;
  eventType: LedgerEventType;
  aggregateType: string;
  aggregateId: string | number;
  payload: TPayload;
};

/**
 * Appends an event to the outbox in the caller's transaction, so it commits
 * (or rolls back) together with the state change it describes.
 */
export async function appendOutboxEvent<TPayload>(
  trx: Knex.Transaction,
  input: OutboxEventInput<TPayload>
): Promise<DomainEventEnvelopeV1<TPayload>> {
  const envelope: DomainEventEnvelopeV1<TPayload> = {
    eventId: randomUUID(),
    eventType: input.eventType,
    schemaVersion: 'v1',
    occurredAt: isoNow(),
    tenantId: input.tenantId,
    aggregateType: input.aggregateType,
    aggregateId: String(input.aggregateId),
    payload: input.payload,
  };
  await trx<OutboxEventRow>('outbox_events').insert({
    event_id: envelope.eventId,
    tenant_id: envelope.tenantId,
    event_type: envelope.eventType,
    aggregate_type: envelope.aggregateType,
    aggregate_id: envelope.aggregateId,
    payload: JSON.stringify(envelope.payload),
    occurred_at: envelope.occurredAt,
    published_at: null,
  });
  return envelope;
}

export type OutboxEvent = {
  eventId: string;
  tenantId: number;
  eventType: string;
  aggregateType: string;
  aggregateId: string;
  payload: unknown;
  occurredAt: Date;
  publishedAt: Date | null;
};

function toOutboxEvent(row: OutboxEventRow): OutboxEvent {
  return {
    eventId: row.event_id,
    tenantId: row.tenant_id,
    eventType: row.event_type,
    aggregateType: row.aggregate_type,
    aggregateId: row.aggregate_id,
    payload: JSON.parse(row.payload),
    occurredAt: toTimestamp(row.occurred_at),
    publishedAt: toTimestamp(row.published_at),
  };
}

/** Events for the relay, oldest first. */
export async function listOutboxEvents(
  knex: Knex,
  tenantId: number,
  options: { unpublishedOnly?: boolean; limit?: number } = {}
): Promise<OutboxEvent[]> {
  const q = knex<OutboxEventRow>('outbox_events').where({ tenant_id: tenantId });
  if (options.unpublishedOnly) q.whereNull('published_at');
  const rows = await q.orderBy('occurred_at', 'asc').orderBy('event_id', 'asc').limit(options.limit ?? 500);
  return rows.map(toOutboxEvent);
}

/** Returns false when the event was unknown to the tenant or already marked. */
export async function markEventPublished(knex: Knex, tenantId: number, eventId: string): Promise<boolean> {
  const updated = await knex<OutboxEventRow>('outbox_events')
    .where({ tenant_id: tenantId, event_id: eventId })
    .whereNull('published_at')
    .update({ published_at: isoNow() });
  return updated > 0;
}
