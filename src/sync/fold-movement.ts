import type { StockMovement, StockRecord } from '../stock/stock.types';

type Quantities = Pick<StockRecord, 'onHand' | 'reserved'>;

/** Applies one movement's delta to the fields its kind affects. Movements are deltas, so replicas merge by addition. */
export function foldMovement(record: Quantities, movement: Pick<StockMovement, 'kind' | 'delta'>): Quantities {
  switch (movement.kind) {
    case 'reserve':
    case 'release':
      return { onHand: record.onHand, reserved: record.reserved + movement.delta };
    case 'deduct':
      return { onHand: record.onHand + movement.delta, reserved: record.reserved + movement.delta };
    case 'replenish':
    case 'adjustment':
      return { onHand: record.onHand + movement.delta, reserved: record.reserved };
  }
}
