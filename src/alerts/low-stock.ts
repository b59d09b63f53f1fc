import type { StockRecord } from '../stock/stock.types';
import { availableQuantity } from '../stock/stock.types';
import type { LowStockBasis } from './alerts.types';

/**
 * Whether a stock level counts as low. A threshold of 0 or less never
 * triggers; `available` measures against unreserved stock, `on_hand` against
 * what is physically on the shelf.
 */
export function evaluateLowStock(
  record: Pick<StockRecord, 'onHand' | 'reserved'>,
  threshold: number,
  basis: LowStockBasis,
): boolean {
  if (threshold <= 0) return false;
  const level = basis === 'available' ? availableQuantity(record) : record.onHand;
  return level < threshold;
}
