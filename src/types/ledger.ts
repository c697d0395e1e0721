export const VENDOR_TYPES = ['SUPPLIER', 'CUSTOMER', 'BOTH'] as const;
export type VendorType = (typeof VENDOR_TYPES)[number];

export const BILL_TYPES = ['NORMAL', 'HANDBILL'] as const;
export type BillType = (typeof BILL_TYPES)[number];

export const BILL_STATUSES = ['DRAFT', 'CONFIRMED', 'CANCELLED'] as const;
export type BillStatus = (typeof BILL_STATUSES)[number];

export const PAYMENT_STATUSES = ['UNPAID', 'PARTIAL', 'PAID'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const CREDIT_DIRECTIONS = ['INCOMING', 'OUTGOING'] as const;
export type CreditDirection = (typeof CREDIT_DIRECTIONS)[number];

export const PAYMENT_METHODS = ['CASH', 'UPI', 'BANK', 'CHEQUE', 'CARD'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const DELIVERY_STATUSES = ['PENDING', 'IN_TRANSIT', 'DELIVERED', 'CANCELLED'] as const;
export type DeliveryStatus = (typeof DELIVERY_STATUSES)[number];

// Money is exposed as fixed 2-decimal strings ("200.00"); dates as YYYY-MM-DD.

export type Tenant = {
  id: number;
  name: string;
  code: string;
  active: boolean;
  createdAt: Date;
};

export type Vendor = {
  id: number;
  tenantId: number;
  name: string;
  type: VendorType;
  creditLimit: string;
  contactPhone: string | null;
  email: string | null;
  address: string | null;
  gstNumber: string | null;
  createdAt: Date;
};

export type LineItem = {
  id: number;
  position: number;
  description: string;
  quantity: string;
  unitPrice: string;
  amount: string;
};

/** Fields an OCR collaborator may pre-fill; the ledger stores them untouched. */
export type BillOcrFields = {
  ocrText: string | null;
  imagePath: string | null;
  deliveryDate: string | null;
  billedToName: string | null;
  shippedToName: string | null;
  deliveryRecipient: string | null;
  post: string | null;
};

export type Bill = {
  id: number;
  tenantId: number;
  vendorId: number;
  billNumber: string;
  billDate: string;
  billType: BillType;
  status: BillStatus;
  amountSubtotal: string;
  amountTax: string;
  amountTotal: string;
  isAuthorized: boolean;
  authorizedBy: number | null;
  authorizedAt: Date | null;
  version: number;
  /** INCOMING entries recorded against this bill. */
  totalPaid: string;
  remaining: string;
  paymentStatus: PaymentStatus;
  ocr: BillOcrFields;
  createdAt: Date;
  items: LineItem[];
};

export type ProxyBill = {
  id: number;
  tenantId: number;
  parentBillId: number;
  vendorId: number;
  proxyNumber: string;
  status: BillStatus;
  amountTotal: string;
  createdAt: Date;
  items: LineItem[];
};

export type CreditEntry = {
  id: number;
  tenantId: number;
  vendorId: number;
  billId: number | null;
  proxyBillId: number | null;
  amount: string;
  direction: CreditDirection;
  paymentMethod: PaymentMethod;
  paymentDate: string;
  referenceNumber: string | null;
  notes: string | null;
  idempotencyKey: string | null;
  createdBy: number | null;
  createdAt: Date;
};

export type DeliveryOrder = {
  id: number;
  tenantId: number;
  billId: number | null;
  proxyBillId: number | null;
  deliveryUserId: number;
  deliveryAddress: string;
  deliveryDate: string;
  status: DeliveryStatus;
  remarks: string | null;
  createdAt: Date;
};
