export const PAYMENT_METHODS = ['CASH', 'CARD', 'BANK', 'WALLET'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export interface Payment {
  id: string;
  invoiceId: string;
  amount: number;
  method: PaymentMethod;
  actorId: string;
  sequence: number;
  at: string;
}

export interface LoyaltyTransaction {
  id: string;
  customerId: string;
  invoiceId: string;
  points: number;
  at: string;
}
