import type { DocumentTotals } from '../common/utils/money';

export const DOCUMENT_STAGES = [
  'DRAFT',
  'APPROVED',
  'CONVERTED',
  'INVOICED',
  'PARTIALLY_PAID',
  'SETTLED',
  'CANCELLED',
] as const;
export type DocumentStage = (typeof DOCUMENT_STAGES)[number];

export interface DocumentLine {
  lineNo: number;
  variantId: string;
  sku: string;
  quantity: number;
  unitPrice: number;
  taxRateBps: number;
}

/**
 * One logical sales document: a quotation while DRAFT/APPROVED, a sales order
 * once CONVERTED, an invoice from INVOICED on.
 */
export interface SalesDocument {
  id: string;
  number: string;
  invoiceNumber: string | null;
  customerId: string;
  branchId: string;
  lines: DocumentLine[];
  totals: DocumentTotals;
  stage: DocumentStage;
  reservationRefs: string[];
  amountPaid: number;
  balance: number;
  createdAt: string;
  updatedAt: string;
  invoicedAt: string | null;
  settledAt: string | null;
}

export interface StageTransition {
  documentId: string;
  from: DocumentStage | null;
  to: DocumentStage;
  actorId: string;
  note: string | null;
  at: string;
}

export type QuotationLineInput = {
  variantId: string;
  quantity: number;
  unitPrice?: number;
};
