import { InvalidStateTransitionError } from '../common/errors';
import type { PurchaseOrderStatus } from './procurement.types';

const NEXT_STATUSES: Record<PurchaseOrderStatus, readonly PurchaseOrderStatus[]> = {
  REQUESTED: ['APPROVED', 'CANCELLED'],
  APPROVED: ['PARTIALLY_RECEIVED', 'CLOSED', 'CANCELLED'],
  PARTIALLY_RECEIVED: ['PARTIALLY_RECEIVED', 'CLOSED'],
  CLOSED: [],
  CANCELLED: [],
};

export function assertPurchaseOrderTransition(from: PurchaseOrderStatus, to: PurchaseOrderStatus) {
  if (!NEXT_STATUSES[from].includes(to)) {
    throw new InvalidStateTransitionError('Purchase order', from, to);
  }
}
