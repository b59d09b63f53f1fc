export type LowStockBasis = 'on_hand' | 'available';

export interface AlertState {
  variantId: string;
  branchId: string;
  low: boolean;
  changedAt: string;
}

export type StockAlertType = 'stock.low' | 'stock.recovered';

export interface StockAlertEvent {
  type: StockAlertType;
  variantId: string;
  branchId: string;
  onHand: number;
  reserved: number;
  threshold: number;
  at: string;
}

/** Delivery side of alerts (email, SMS, push) lives outside this service. */
export interface NotificationPublisher {
  publish(event: StockAlertEvent): Promise<void>;
}

export const NOTIFICATION_PUBLISHER = Symbol('NOTIFICATION_PUBLISHER');
