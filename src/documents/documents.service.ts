import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { AuditService } from '../audit/audit.service';
import { AuditEvent } from '../audit/audit.types';
import { CatalogService } from '../catalog/catalog.service';
import { OperationContext } from '../commands/operation-context';
import { NotFoundError, ValidationError, requirePositiveQuantity } from '../common/errors';
import { nextDocumentNumber } from '../common/utils/document-number';
import { calculateDocumentTotals } from '../common/utils/money';
import { StockLedgerService } from '../stock/stock-ledger.service';
import { Reservation } from '../stock/stock.types';
import { StoreService } from '../store/store.service';
import { StoreTransaction } from '../store/store-transaction';
import { assertTransition } from './document-stages';
import {
  DocumentLine,
  DocumentStage,
  QuotationLineInput,
  SalesDocument,
  StageTransition,
} from './documents.types';

export const RESERVATION_EXPIRED_NOTE = 'reservation expired';

export type ExpirySweepResult = {
  cancelledDocuments: string[];
  releasedRefs: string[];
};

export function reservationRef(documentId: string, lineNo: number) {
  return `${documentId}:${lineNo}`;
}

@Injectable()
export class DocumentsService {
  constructor(
    private readonly store: StoreService,
    private readonly ledger: StockLedgerService,
    private readonly catalog: CatalogService,
    private readonly audit: AuditService,
  ) {}

  async createQuotation(
    ctx: OperationContext,
    customerId: string,
    branchId: string,
    lines: QuotationLineInput[],
  ): Promise<SalesDocument> {
    lines.forEach((line, i) => {
      requirePositiveQuantity(`lines[${i}].quantity`, line.quantity);
      if (line.unitPrice !== undefined && (!Number.isSafeInteger(line.unitPrice) || line.unitPrice < 0)) {
        throw new ValidationError(`lines[${i}].unitPrice must be a non-negative integer`, [
          { field: `lines[${i}].unitPrice`, message: 'must be a non-negative integer' },
        ]);
      }
    });

    const document = await this.store.transaction(async (tx) => {
      // Price and tax are frozen on the line as of creation
      const documentLines: DocumentLine[] = [];
      for (const [i, line] of lines.entries()) {
        const variant = await this.catalog.requireVariantIn(tx, line.variantId);
        documentLines.push({
          lineNo: i + 1,
          variantId: variant.id,
          sku: variant.sku,
          quantity: line.quantity,
          unitPrice: line.unitPrice ?? variant.unitPrice,
          taxRateBps: variant.taxRateBps,
        });
      }

      const id = uuidv4();
      const created: SalesDocument = {
        id,
        number: await nextDocumentNumber(tx, 'QUO', tx.startedAt.getUTCFullYear()),
        invoiceNumber: null,
        customerId,
        branchId,
        lines: documentLines,
        totals: calculateDocumentTotals(documentLines),
        stage: 'DRAFT',
        reservationRefs: [],
        amountPaid: 0,
        balance: 0,
        createdAt: tx.now,
        updatedAt: tx.now,
        invoicedAt: null,
        settledAt: null,
      };
      await tx.get('document', id);
      tx.put('document', id, created);
      await this.recordTransitionIn(tx, ctx, created, null, null);
      return created;
    });

    ctx.logger.info('quotation_created', { documentId: document.id, number: document.number });
    return document;
  }

  async approve(ctx: OperationContext, id: string): Promise<SalesDocument> {
    return this.store.transaction(async (tx) => {
      const document = await this.requireDocumentIn(tx, id);
      assertTransition(document.stage, 'APPROVED');
      if (document.lines.length === 0) {
        throw new ValidationError('A quotation needs at least one line to be approved', [
          { field: 'lines', message: 'must not be empty' },
        ]);
      }
      await this.catalog.requireCustomerIn(tx, document.customerId);
      return this.transitionIn(tx, ctx, document, 'APPROVED');
    });
  }

  /** APPROVED → CONVERTED. Reserves every line in one transaction, so one short line leaves nothing held. */
  async convert(ctx: OperationContext, id: string): Promise<SalesDocument> {
    const document = await this.store.transaction(async (tx) => {
      const current = await this.requireDocumentIn(tx, id);
      assertTransition(current.stage, 'CONVERTED');

      const refs: string[] = [];
      for (const line of current.lines) {
        const ref = reservationRef(current.id, line.lineNo);
        await this.ledger.reserveIn(tx, ctx, line.variantId, current.branchId, line.quantity, ref, {
          documentId: current.id,
        });
        refs.push(ref);
      }
      return this.transitionIn(tx, ctx, current, 'CONVERTED', { reservationRefs: refs });
    });

    ctx.logger.info('sales_order_created', { documentId: id, reservations: document.reservationRefs.length });
    return document;
  }

  /** CONVERTED → INVOICED. Totals are fixed here; each reservation becomes a deduction. */
  async invoice(ctx: OperationContext, id: string): Promise<SalesDocument> {
    const document = await this.store.transaction(async (tx) => {
      const current = await this.requireDocumentIn(tx, id);
      assertTransition(current.stage, 'INVOICED');

      for (const ref of current.reservationRefs) {
        await this.ledger.deductIn(tx, ctx, ref);
      }

      const totals = calculateDocumentTotals(current.lines);
      const invoiced = await this.transitionIn(tx, ctx, current, 'INVOICED', {
        totals,
        invoiceNumber: await nextDocumentNumber(tx, 'INV', tx.startedAt.getUTCFullYear()),
        amountPaid: 0,
        balance: totals.grandTotal,
        invoicedAt: tx.now,
      });

      // Nothing to collect on a zero-value invoice
      if (totals.grandTotal === 0) {
        return this.transitionIn(tx, ctx, invoiced, 'SETTLED', { settledAt: tx.now });
      }
      return invoiced;
    });

    ctx.logger.info('invoice_issued', {
      documentId: id,
      invoiceNumber: document.invoiceNumber,
      grandTotal: document.totals.grandTotal,
    });
    return document;
  }

  async cancel(ctx: OperationContext, id: string, reason?: string): Promise<SalesDocument> {
    const document = await this.store.transaction((tx) => this.cancelIn(tx, ctx, id, reason ?? null));
    ctx.logger.info('document_cancelled', { documentId: id, reason: reason ?? null });
    return document;
  }

  /**
   * Cancels sales orders whose holds have expired and releases expired holds
   * no open order owns. Each document is handled in its own transaction; one
   * failure is logged and does not stop the sweep.
   */
  async expireReservations(ctx: OperationContext, now: Date = new Date()): Promise<ExpirySweepResult> {
    const expired = await this.ledger.listExpiredReservations(now);
    const result: ExpirySweepResult = { cancelledDocuments: [], releasedRefs: [] };

    const byDocument = new Map<string, Reservation[]>();
    const orphans: Reservation[] = [];
    for (const reservation of expired) {
      if (reservation.documentId) {
        const group = byDocument.get(reservation.documentId) ?? [];
        group.push(reservation);
        byDocument.set(reservation.documentId, group);
      } else {
        orphans.push(reservation);
      }
    }

    for (const [documentId, reservations] of byDocument) {
      try {
        const cancelled = await this.store.transaction(async (tx) => {
          const document = await tx.get('document', documentId);
          if (document?.stage === 'CONVERTED') {
            await this.cancelIn(tx, ctx, documentId, RESERVATION_EXPIRED_NOTE);
            return true;
          }
          for (const reservation of reservations) {
            await this.releaseIfHeldIn(tx, ctx, reservation.ref);
          }
          return false;
        });
        if (cancelled) {
          result.cancelledDocuments.push(documentId);
        }
        result.releasedRefs.push(...reservations.map((r) => r.ref));
      } catch (err) {
        ctx.logger.error('reservation_expiry_failed', {
          documentId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    for (const reservation of orphans) {
      try {
        await this.store.transaction((tx) => this.releaseIfHeldIn(tx, ctx, reservation.ref));
        result.releasedRefs.push(reservation.ref);
      } catch (err) {
        ctx.logger.error('reservation_expiry_failed', {
          ref: reservation.ref,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    if (result.releasedRefs.length > 0) {
      ctx.logger.info('reservations_expired', {
        documents: result.cancelledDocuments.length,
        reservations: result.releasedRefs.length,
      });
    }
    return result;
  }

  async get(id: string): Promise<SalesDocument> {
    return this.store.read((tx) => this.requireDocumentIn(tx, id));
  }

  async history(id: string): Promise<StageTransition[]> {
    const entries = await this.store.read(async (tx) => {
      await this.requireDocumentIn(tx, id);
      return tx.readLog('transition', id);
    });
    return entries.map((e) => e.entry);
  }

  async auditTrail(id: string): Promise<AuditEvent[]> {
    await this.get(id);
    return this.audit.history(id);
  }

  async requireDocumentIn(tx: StoreTransaction, id: string): Promise<SalesDocument> {
    const document = await tx.get('document', id);
    if (!document) throw new NotFoundError(`Document ${id} not found`);
    return document;
  }

  /**
   * Compare-and-set on the document record: the write is checked against the
   * version read in this transaction, so two racing transitions cannot both
   * commit.
   */
  async transitionIn(
    tx: StoreTransaction,
    ctx: OperationContext,
    document: SalesDocument,
    to: DocumentStage,
    changes: Partial<Omit<SalesDocument, 'id' | 'stage'>> = {},
    note: string | null = null,
  ): Promise<SalesDocument> {
    assertTransition(document.stage, to);
    const updated: SalesDocument = { ...document, ...changes, stage: to, updatedAt: tx.now };
    tx.put('document', document.id, updated);
    await this.recordTransitionIn(tx, ctx, updated, document.stage, note);
    return updated;
  }

  private async cancelIn(
    tx: StoreTransaction,
    ctx: OperationContext,
    id: string,
    reason: string | null,
  ): Promise<SalesDocument> {
    const document = await this.requireDocumentIn(tx, id);
    assertTransition(document.stage, 'CANCELLED');

    if (document.stage === 'CONVERTED') {
      for (const ref of document.reservationRefs) {
        await this.releaseIfHeldIn(tx, ctx, ref);
      }
    }
    return this.transitionIn(tx, ctx, document, 'CANCELLED', {}, reason);
  }

  private async releaseIfHeldIn(tx: StoreTransaction, ctx: OperationContext, ref: string) {
    const reservation = await tx.get('reservation', ref);
    if (reservation?.status === 'HELD') {
      await this.ledger.releaseIn(tx, ctx, ref);
    }
  }

  private async recordTransitionIn(
    tx: StoreTransaction,
    ctx: OperationContext,
    document: SalesDocument,
    from: DocumentStage | null,
    note: string | null,
  ) {
    await tx.append('transition', document.id, () => ({
      documentId: document.id,
      from,
      to: document.stage,
      actorId: ctx.principal.id,
      note,
      at: tx.now,
    }));
    await this.audit.recordIn(tx, ctx, {
      entityType: 'DOCUMENT',
      entityId: document.id,
      action: from === null ? 'created' : `stage:${document.stage}`,
      detail: { from, to: document.stage, note },
    });
  }
}
