import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { AuditService } from '../audit/audit.service';
import { CatalogService } from '../catalog/catalog.service';
import { OperationContext } from '../commands/operation-context';
import {
  FieldError,
  InvalidStateTransitionError,
  NotFoundError,
  ValidationError,
  requirePositiveQuantity,
} from '../common/errors';
import { nextDocumentNumber } from '../common/utils/document-number';
import { parseCalendarDay } from '../common/validators/is-calendar-date.validator';
import { StockLedgerService } from '../stock/stock-ledger.service';
import { StoreService } from '../store/store.service';
import { StoreTransaction } from '../store/store-transaction';
import { assertPurchaseOrderTransition } from './purchase-order-states';
import {
  GoodsReceipt,
  GoodsReceiptLine,
  PurchaseOrder,
  PurchaseOrderLineInput,
  PurchaseOrderStatus,
  VendorRating,
} from './procurement.types';
import { emptyRating, withDelivery, withOrderedUnits } from './vendor-rating';

export type ReceiveResult = {
  purchaseOrder: PurchaseOrder;
  receipt: GoodsReceipt;
};

function calendarDay(field: string, value: string): number {
  const day = parseCalendarDay(value.slice(0, 10));
  if (day === null) {
    throw new ValidationError(`${field} must be a valid calendar date`, [
      { field, message: 'must be a valid calendar date in YYYY-MM-DD format' },
    ]);
  }
  return day;
}

@Injectable()
export class ProcurementService {
  constructor(
    private readonly store: StoreService,
    private readonly ledger: StockLedgerService,
    private readonly catalog: CatalogService,
    private readonly audit: AuditService,
  ) {}

  async create(
    ctx: OperationContext,
    supplierId: string,
    branchId: string,
    expectedDate: string,
    lines: PurchaseOrderLineInput[],
  ): Promise<PurchaseOrder> {
    calendarDay('expectedDate', expectedDate);
    if (lines.length === 0) {
      throw new ValidationError('A purchase order needs at least one line', [
        { field: 'lines', message: 'must not be empty' },
      ]);
    }
    const seen = new Set<string>();
    lines.forEach((line, i) => {
      requirePositiveQuantity(`lines[${i}].quantity`, line.quantity);
      if (!Number.isSafeInteger(line.unitCost) || line.unitCost < 0) {
        throw new ValidationError(`lines[${i}].unitCost must be a non-negative integer`, [
          { field: `lines[${i}].unitCost`, message: 'must be a non-negative integer' },
        ]);
      }
      if (seen.has(line.variantId)) {
        throw new ValidationError(`Variant ${line.variantId} appears on more than one line`, [
          { field: `lines[${i}].variantId`, message: 'duplicate variant' },
        ]);
      }
      seen.add(line.variantId);
    });

    const order = await this.store.transaction(async (tx) => {
      await this.catalog.requireSupplierIn(tx, supplierId);
      for (const line of lines) {
        await this.catalog.requireVariantIn(tx, line.variantId);
      }

      const id = uuidv4();
      const created: PurchaseOrder = {
        id,
        number: await nextDocumentNumber(tx, 'PO', tx.startedAt.getUTCFullYear()),
        supplierId,
        branchId,
        status: 'REQUESTED',
        expectedDate: expectedDate.slice(0, 10),
        lines: lines.map((line) => ({
          variantId: line.variantId,
          orderedQuantity: line.quantity,
          receivedQuantity: 0,
          unitCost: line.unitCost,
        })),
        createdAt: tx.now,
        updatedAt: tx.now,
        closedAt: null,
      };
      await tx.get('purchaseOrder', id);
      tx.put('purchaseOrder', id, created);
      await this.recordIn(tx, ctx, created, 'created', { number: created.number });
      return created;
    });

    ctx.logger.info('purchase_order_created', { purchaseOrderId: order.id, number: order.number });
    return order;
  }

  async approve(ctx: OperationContext, id: string): Promise<PurchaseOrder> {
    return this.store.transaction(async (tx) => {
      const order = await this.requireOrderIn(tx, id);
      const approved = await this.moveIn(tx, ctx, order, 'APPROVED');
      await this.updateRatingIn(tx, order.supplierId, (rating) =>
        withOrderedUnits(rating, orderedUnits(order), tx.now),
      );
      return approved;
    });
  }

  /**
   * Posts one replenishment per line. The whole receipt is rejected when any
   * line exceeds what is still outstanding, names a variant the order does
   * not carry or has a non-positive quantity.
   */
  async receiveGRN(
    ctx: OperationContext,
    id: string,
    lines: GoodsReceiptLine[],
    receivedAt?: string,
  ): Promise<ReceiveResult> {
    if (lines.length === 0) {
      throw new ValidationError('A goods receipt needs at least one line', [
        { field: 'lines', message: 'must not be empty' },
      ]);
    }
    lines.forEach((line, i) => requirePositiveQuantity(`lines[${i}].quantity`, line.quantity));

    const result = await this.store.transaction(async (tx) => {
      const order = await this.requireOrderIn(tx, id);
      if (order.status !== 'APPROVED' && order.status !== 'PARTIALLY_RECEIVED') {
        throw new InvalidStateTransitionError('Purchase order', order.status, 'PARTIALLY_RECEIVED');
      }

      const incoming = new Map<string, number>();
      for (const line of lines) {
        incoming.set(line.variantId, (incoming.get(line.variantId) ?? 0) + line.quantity);
      }

      const errors: FieldError[] = [];
      for (const [variantId, quantity] of incoming) {
        const line = order.lines.find((l) => l.variantId === variantId);
        if (!line) {
          errors.push({ field: 'lines', message: `variant ${variantId} is not on this order` });
          continue;
        }
        const outstanding = line.orderedQuantity - line.receivedQuantity;
        if (quantity > outstanding) {
          errors.push({
            field: 'lines',
            message: `variant ${variantId}: receiving ${quantity} exceeds outstanding ${outstanding}`,
          });
        }
      }
      if (errors.length > 0) {
        throw new ValidationError('Goods receipt rejected', errors);
      }

      const receiptId = uuidv4();
      const receivedOn = receivedAt ?? tx.now;
      const delayDays = calendarDay('receivedAt', receivedOn) - calendarDay('expectedDate', order.expectedDate);

      for (const [variantId, quantity] of incoming) {
        await this.ledger.replenishIn(tx, ctx, variantId, order.branchId, quantity, receiptId);
      }

      const updatedLines = order.lines.map((line) => ({
        ...line,
        receivedQuantity: line.receivedQuantity + (incoming.get(line.variantId) ?? 0),
      }));
      const complete = updatedLines.every((line) => line.receivedQuantity >= line.orderedQuantity);
      const purchaseOrder = await this.moveIn(
        tx,
        ctx,
        order,
        complete ? 'CLOSED' : 'PARTIALLY_RECEIVED',
        { lines: updatedLines, closedAt: complete ? tx.now : null },
      );

      const receipt = await tx.append('receipt', id, () => ({
        id: receiptId,
        purchaseOrderId: id,
        receivedAt: receivedOn,
        delayDays: Math.max(0, delayDays),
        lines: [...incoming].map(([variantId, quantity]) => ({ variantId, quantity })),
        actorId: ctx.principal.id,
      }));

      const units = [...incoming.values()].reduce((sum, q) => sum + q, 0);
      await this.updateRatingIn(tx, order.supplierId, (rating) =>
        withDelivery(rating, { delayDays, units }, tx.now),
      );
      return { purchaseOrder, receipt };
    });

    ctx.logger.info('goods_received', {
      purchaseOrderId: id,
      receiptId: result.receipt.id,
      status: result.purchaseOrder.status,
    });
    return result;
  }

  /** Short-closes an order; whatever is still outstanding will not arrive. */
  async close(ctx: OperationContext, id: string): Promise<PurchaseOrder> {
    return this.store.transaction(async (tx) => {
      const order = await this.requireOrderIn(tx, id);
      return this.moveIn(tx, ctx, order, 'CLOSED', { closedAt: tx.now });
    });
  }

  async cancel(ctx: OperationContext, id: string): Promise<PurchaseOrder> {
    return this.store.transaction(async (tx) => {
      const order = await this.requireOrderIn(tx, id);
      const cancelled = await this.moveIn(tx, ctx, order, 'CANCELLED');
      if (order.status === 'APPROVED') {
        await this.updateRatingIn(tx, order.supplierId, (rating) =>
          withOrderedUnits(rating, -orderedUnits(order), tx.now),
        );
      }
      return cancelled;
    });
  }

  async get(id: string): Promise<PurchaseOrder> {
    return this.store.read((tx) => this.requireOrderIn(tx, id));
  }

  async listReceipts(id: string): Promise<GoodsReceipt[]> {
    const entries = await this.store.read(async (tx) => {
      await this.requireOrderIn(tx, id);
      return tx.readLog('receipt', id);
    });
    return entries.map((e) => e.entry);
  }

  async getVendorRating(supplierId: string): Promise<VendorRating> {
    return this.store.read(async (tx) => {
      await this.catalog.requireSupplierIn(tx, supplierId);
      return (await tx.get('vendorRating', supplierId)) ?? emptyRating(supplierId, tx.now);
    });
  }

  private async requireOrderIn(tx: StoreTransaction, id: string): Promise<PurchaseOrder> {
    const order = await tx.get('purchaseOrder', id);
    if (!order) throw new NotFoundError(`Purchase order ${id} not found`);
    return order;
  }

  private async moveIn(
    tx: StoreTransaction,
    ctx: OperationContext,
    order: PurchaseOrder,
    to: PurchaseOrderStatus,
    changes: Partial<Pick<PurchaseOrder, 'lines' | 'closedAt'>> = {},
  ): Promise<PurchaseOrder> {
    assertPurchaseOrderTransition(order.status, to);
    const updated: PurchaseOrder = { ...order, ...changes, status: to, updatedAt: tx.now };
    tx.put('purchaseOrder', order.id, updated);
    await this.recordIn(tx, ctx, updated, `status:${to}`, { from: order.status, to });
    return updated;
  }

  private async updateRatingIn(
    tx: StoreTransaction,
    supplierId: string,
    update: (rating: VendorRating) => VendorRating,
  ) {
    const current = (await tx.get('vendorRating', supplierId)) ?? emptyRating(supplierId, tx.now);
    tx.put('vendorRating', supplierId, update(current));
  }

  private async recordIn(
    tx: StoreTransaction,
    ctx: OperationContext,
    order: PurchaseOrder,
    action: string,
    detail: Record<string, string | number | null>,
  ) {
    await this.audit.recordIn(tx, ctx, {
      entityType: 'PURCHASE_ORDER',
      entityId: order.id,
      action,
      detail,
    });
  }
}

function orderedUnits(order: PurchaseOrder) {
  return order.lines.reduce((sum, line) => sum + line.orderedQuantity, 0);
}
