export type LedgerEventType =
  | 'bill.created'
  | 'bill.updated'
  | 'bill.authorized'
  | 'bill.cancelled'
  | 'bill.deleted'
  | 'proxy_bill.created'
  | 'proxy_bill.cancelled'
  | 'credit_entry.recorded'
  | 'delivery_order.created'
  | 'delivery_order.status_changed';

export type DomainEventEnvelopeV1<TPayload = unknown> = {
  /**
   * Unique id for this event occurrence (idempotency key for consumers).
   */
  eventId: string;

  /**
   * Stable, dot-delimited event name, e.g. "bill.authorized".
   */
  eventType: LedgerEventType;

  /**
   * Contract version for payload interpretation.
   * Bump only when making breaking changes to payload shape/meaning.
   */
  schemaVersion: 'v1';

  /** ISO timestamp of the state change. */
  occurredAt: string;

  tenantId: number;

  /** e.g. "Bill", "ProxyBill", "CreditEntry". */
  aggregateType: string;
  aggregateId: string;

  /** Keep small: ids and the status facts a delivery or reporting consumer correlates on. */
  payload: TPayload;
};
