export const MOVEMENT_KINDS = ['reserve', 'release', 'deduct', 'replenish', 'adjustment'] as const;
export type MovementKind = (typeof MOVEMENT_KINDS)[number];

/** Authoritative quantity of one variant at one branch. 0 ≤ reserved ≤ onHand. */
export interface StockRecord {
  variantId: string;
  branchId: string;
  onHand: number;
  reserved: number;
  version: number;
  updatedAt: string;
}

export type ReservationStatus = 'HELD' | 'RELEASED' | 'DEDUCTED';

export interface Reservation {
  ref: string;
  variantId: string;
  branchId: string;
  quantity: number;
  status: ReservationStatus;
  documentId: string | null;
  expiresAt: string | null;
  createdAt: string;
  settledAt: string | null;
}

/** Index entry for a HELD reservation that carries an expiry. */
export interface ReservationExpiry {
  ref: string;
  expiresAt: string;
}

/**
 * Append-only ledger entry. `delta` is the change applied to the field the
 * kind affects: reserved for reserve/release, on-hand (and reserved) for
 * deduct, on-hand for replenish/adjustment.
 */
export interface StockMovement {
  id: string;
  variantId: string;
  branchId: string;
  delta: number;
  kind: MovementKind;
  reference: string;
  reason: string | null;
  timestamp: string;
  sequence: number;
}

export interface StockThreshold {
  variantId: string;
  branchId: string;
  threshold: number;
}

export type ReserveOptions = {
  documentId?: string;
  ttlMinutes?: number;
};

export function stockKey(variantId: string, branchId: string) {
  return `${variantId}@${branchId}`;
}

export function availableQuantity(record: Pick<StockRecord, 'onHand' | 'reserved'>) {
  return record.onHand - record.reserved;
}
