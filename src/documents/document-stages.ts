import { InvalidStateTransitionError } from '../common/errors';
import type { DocumentStage } from './documents.types';

const NEXT_STAGES: Record<DocumentStage, readonly DocumentStage[]> = {
  DRAFT: ['APPROVED', 'CANCELLED'],
  APPROVED: ['CONVERTED', 'CANCELLED'],
  CONVERTED: ['INVOICED', 'CANCELLED'],
  INVOICED: ['PARTIALLY_PAID', 'SETTLED'],
  PARTIALLY_PAID: ['PARTIALLY_PAID', 'SETTLED'],
  SETTLED: [],
  CANCELLED: [],
};

export function canTransition(from: DocumentStage, to: DocumentStage): boolean {
  return NEXT_STAGES[from].includes(to);
}

export function assertTransition(from: DocumentStage, to: DocumentStage) {
  if (!canTransition(from, to)) {
    throw new InvalidStateTransitionError('Document', from, to);
  }
}
