export const PURCHASE_ORDER_STATUSES = [
  'REQUESTED',
  'APPROVED',
  'PARTIALLY_RECEIVED',
  'CLOSED',
  'CANCELLED',
] as const;
export type PurchaseOrderStatus = (typeof PURCHASE_ORDER_STATUSES)[number];

export interface PurchaseOrderLine {
  variantId: string;
  orderedQuantity: number;
  receivedQuantity: number;
  unitCost: number;
}

export interface PurchaseOrder {
  id: string;
  number: string;
  supplierId: string;
  branchId: string;
  status: PurchaseOrderStatus;
  expectedDate: string;
  lines: PurchaseOrderLine[];
  createdAt: string;
  updatedAt: string;
  closedAt: string | null;
}

export interface GoodsReceiptLine {
  variantId: string;
  quantity: number;
}

export interface GoodsReceipt {
  id: string;
  purchaseOrderId: string;
  receivedAt: string;
  delayDays: number;
  lines: GoodsReceiptLine[];
  actorId: string;
}

export interface VendorRating {
  supplierId: string;
  deliveries: number;
  onTimeDeliveries: number;
  totalDelayDays: number;
  orderedUnits: number;
  deliveredUnits: number;
  score: number;
  updatedAt: string;
}

export type PurchaseOrderLineInput = {
  variantId: string;
  quantity: number;
  unitCost: number;
};
