// Column shapes as the drivers hand them back. pg returns numerics as strings and
// DATE/TIMESTAMP as Date; sqlite returns numbers, text, and 0/1 for booleans.

type Numeric = string | number;
type DateColumn = string | Date;
type TimestampColumn = string | Date | number;
type BoolColumn = boolean | number;

export type TenantRow = {
  id: number;
  name: string;
  code: string;
  active: BoolColumn;
  created_at: TimestampColumn;
};

export type VendorRow = {
  id: number;
  tenant_id: number;
  name: string;
  type: 'SUPPLIER' | 'CUSTOMER' | 'BOTH';
  credit_limit: Numeric;
  contact_phone: string | null;
  email: string | null;
  address: string | null;
  gst_number: string | null;
  created_at: TimestampColumn;
};

export type BillRow = {
  id: number;
  tenant_id: number;
  vendor_id: number;
  bill_number: string;
  bill_date: DateColumn;
  bill_type: 'NORMAL' | 'HANDBILL';
  status: 'DRAFT' | 'CONFIRMED' | 'CANCELLED';
  amount_subtotal: Numeric;
  amount_tax: Numeric;
  amount_total: Numeric;
  is_authorized: BoolColumn;
  authorized_by: number | null;
  authorized_at: TimestampColumn | null;
  version: number;
  ocr_text: string | null;
  image_path: string | null;
  delivery_date: DateColumn | null;
  billed_to_name: string | null;
  shipped_to_name: string | null;
  delivery_recipient: string | null;
  post: string | null;
  created_at: TimestampColumn;
};

export type LineItemRow = {
  id: number;
  position: number;
  description: string;
  quantity: Numeric;
  unit_price: Numeric;
  amount: Numeric;
};

export type BillItemRow = LineItemRow & { bill_id: number };

export type ProxyBillRow = {
  id: number;
  tenant_id: number;
  parent_bill_id: number;
  vendor_id: number;
  proxy_number: string;
  status: 'DRAFT' | 'CONFIRMED' | 'CANCELLED';
  amount_total: Numeric;
  created_at: TimestampColumn;
};

export type ProxyBillItemRow = LineItemRow & { proxy_bill_id: number };

export type CreditEntryRow = {
  id: number;
  tenant_id: number;
  vendor_id: number;
  bill_id: number | null;
  proxy_bill_id: number | null;
  amount: Numeric;
  direction: 'INCOMING' | 'OUTGOING';
  payment_method: 'CASH' | 'UPI' | 'BANK' | 'CHEQUE' | 'CARD';
  payment_date: DateColumn;
  reference_number: string | null;
  notes: string | null;
  idempotency_key: string | null;
  created_by: number | null;
  created_at: TimestampColumn;
};

export type DeliveryOrderRow = {
  id: number;
  tenant_id: number;
  bill_id: number | null;
  proxy_bill_id: number | null;
  delivery_user_id: number;
  delivery_address: string;
  delivery_date: DateColumn;
  status: 'PENDING' | 'IN_TRANSIT' | 'DELIVERED' | 'CANCELLED';
  remarks: string | null;
  created_at: TimestampColumn;
};

export type AuditLogRow = {
  id: number;
  tenant_id: number;
  user_id: number | null;
  action: string;
  entity_type: string;
  entity_id: string | null;
  metadata: string | null;
  created_at: TimestampColumn;
};

export type OutboxEventRow = {
  event_id: string;
  tenant_id: number;
  event_type: string;
  aggregate_type: string;
  aggregate_id: string;
  payload: string;
  occurred_at: TimestampColumn;
  published_at: TimestampColumn | null;
};
