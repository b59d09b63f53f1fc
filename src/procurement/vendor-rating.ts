import type { VendorRating } from './procurement.types';

export type Delivery = {
  delayDays: number;
  units: number;
};

export function emptyRating(supplierId: string, at: string): VendorRating {
  return {
    supplierId,
    deliveries: 0,
    onTimeDeliveries: 0,
    totalDelayDays: 0,
    orderedUnits: 0,
    deliveredUnits: 0,
    score: 0,
    updatedAt: at,
  };
}

/**
 * 0–5, half on-time rate and half fill ratio (capped at 1), rounded to two
 * decimals. A supplier with no deliveries yet scores 0.
 */
export function scoreVendor(
  rating: Pick<VendorRating, 'deliveries' | 'onTimeDeliveries' | 'orderedUnits' | 'deliveredUnits'>,
): number {
  if (rating.deliveries === 0) return 0;
  const onTimeRate = rating.onTimeDeliveries / rating.deliveries;
  const fillRatio = rating.orderedUnits > 0 ? Math.min(1, rating.deliveredUnits / rating.orderedUnits) : 0;
  return Math.round(5 * (0.5 * onTimeRate + 0.5 * fillRatio) * 100) / 100;
}

export function withOrderedUnits(rating: VendorRating, units: number, at: string): VendorRating {
  const next = { ...rating, orderedUnits: Math.max(0, rating.orderedUnits + units), updatedAt: at };
  return { ...next, score: scoreVendor(next) };
}

/** Late means received on a later calendar day than expected. */
export function withDelivery(rating: VendorRating, delivery: Delivery, at: string): VendorRating {
  const next = {
    ...rating,
    deliveries: rating.deliveries + 1,
    onTimeDeliveries: rating.onTimeDeliveries + (delivery.delayDays <= 0 ? 1 : 0),
    totalDelayDays: rating.totalDelayDays + Math.max(0, delivery.delayDays),
    deliveredUnits: rating.deliveredUnits + delivery.units,
    updatedAt: at,
  };
  return { ...next, score: scoreVendor(next) };
}
