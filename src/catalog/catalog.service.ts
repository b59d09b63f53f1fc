import { ConflictException, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { AuditService } from '../audit/audit.service';
import { OperationContext } from '../commands/operation-context';
import { NotFoundError, ValidationError } from '../common/errors';
import { StoreService } from '../store/store.service';
import { StoreTransaction } from '../store/store-transaction';
import { Customer, Supplier, Variant } from './catalog.types';

export type RegisterVariantInput = {
  id?: string;
  productId?: string;
  sku: string;
  name: string;
  unitPrice: number;
  taxRateBps: number;
  isSet?: boolean;
};

export type ChangePriceInput = {
  unitPrice: number;
  taxRateBps?: number;
};

function requireMoney(field: string, value: number) {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`, [
      { field, message: 'must be a non-negative integer' },
    ]);
  }
}

/**
 * Minimal registry of what the workflows reference. Variants keep their
 * current price on the record; each price takes effect through an entry in
 * the variant's price log, which is never rewritten.
 */
@Injectable()
export class CatalogService {
  constructor(
    private readonly store: StoreService,
    private readonly audit: AuditService,
  ) {}

  async registerVariant(ctx: OperationContext, input: RegisterVariantInput): Promise<Variant> {
    requireMoney('unitPrice', input.unitPrice);
    requireMoney('taxRateBps', input.taxRateBps);
    const sku = input.sku.trim().toUpperCase();

    const variant = await this.store.transaction(async (tx) => {
      const id = input.id ?? uuidv4();
      if (await tx.get('variant', id)) {
        throw new ConflictException(`Variant ${id} already exists`);
      }
      const all = await tx.list('variant');
      if (all.some((v) => v.sku === sku)) {
        throw new ConflictException(`SKU ${sku} already exists`);
      }

      const created: Variant = {
        id,
        productId: input.productId ?? id,
        sku,
        name: input.name,
        unitPrice: input.unitPrice,
        taxRateBps: input.taxRateBps,
        isSet: input.isSet ?? false,
        priceEffectiveFrom: tx.now,
      };
      tx.put('variant', id, created);
      await tx.append('variantPrice', id, () => ({
        variantId: id,
        unitPrice: created.unitPrice,
        taxRateBps: created.taxRateBps,
        effectiveFrom: tx.now,
      }));
      await this.audit.recordIn(tx, ctx, {
        entityType: 'VARIANT',
        entityId: id,
        action: 'registered',
        detail: { sku, unitPrice: created.unitPrice, taxRateBps: created.taxRateBps },
      });
      return created;
    });

    ctx.logger.info('variant_registered', { variantId: variant.id, sku: variant.sku });
    return variant;
  }

  async changePrice(ctx: OperationContext, variantId: string, input: ChangePriceInput): Promise<Variant> {
    requireMoney('unitPrice', input.unitPrice);
    if (input.taxRateBps !== undefined) requireMoney('taxRateBps', input.taxRateBps);

    return this.store.transaction(async (tx) => {
      const variant = await this.requireVariantIn(tx, variantId);
      const updated: Variant = {
        ...variant,
        unitPrice: input.unitPrice,
        taxRateBps: input.taxRateBps ?? variant.taxRateBps,
        priceEffectiveFrom: tx.now,
      };
      tx.put('variant', variantId, updated);
      await tx.append('variantPrice', variantId, () => ({
        variantId,
        unitPrice: updated.unitPrice,
        taxRateBps: updated.taxRateBps,
        effectiveFrom: tx.now,
      }));
      await this.audit.recordIn(tx, ctx, {
        entityType: 'VARIANT',
        entityId: variantId,
        action: 'price_changed',
        detail: { from: variant.unitPrice, to: updated.unitPrice, taxRateBps: updated.taxRateBps },
      });
      return updated;
    });
  }

  async getVariant(variantId: string): Promise<Variant> {
    return this.store.read((tx) => this.requireVariantIn(tx, variantId));
  }

  async priceHistory(variantId: string) {
    const entries = await this.store.read((tx) => tx.readLog('variantPrice', variantId));
    return entries.map((e) => e.entry);
  }

  async registerCustomer(ctx: OperationContext, name: string, id?: string): Promise<Customer> {
    const customer = await this.store.transaction(async (tx) => {
      const customerId = id ?? uuidv4();
      if (await tx.get('customer', customerId)) {
        throw new ConflictException(`Customer ${customerId} already exists`);
      }
      const created: Customer = { id: customerId, name, createdAt: tx.now };
      tx.put('customer', customerId, created);
      return created;
    });
    ctx.logger.info('customer_registered', { customerId: customer.id });
    return customer;
  }

  async registerSupplier(ctx: OperationContext, name: string, id?: string): Promise<Supplier> {
    const supplier = await this.store.transaction(async (tx) => {
      const supplierId = id ?? uuidv4();
      if (await tx.get('supplier', supplierId)) {
        throw new ConflictException(`Supplier ${supplierId} already exists`);
      }
      const created: Supplier = { id: supplierId, name, createdAt: tx.now };
      tx.put('supplier', supplierId, created);
      return created;
    });
    ctx.logger.info('supplier_registered', { supplierId: supplier.id });
    return supplier;
  }

  async requireVariantIn(tx: StoreTransaction, variantId: string): Promise<Variant> {
    const variant = await tx.get('variant', variantId);
    if (!variant) throw new NotFoundError(`Variant ${variantId} not found`);
    return variant;
  }

  async requireCustomerIn(tx: StoreTransaction, customerId: string): Promise<Customer> {
    const customer = await tx.get('customer', customerId);
    if (!customer) throw new NotFoundError(`Customer ${customerId} not found`);
    return customer;
  }

  async requireSupplierIn(tx: StoreTransaction, supplierId: string): Promise<Supplier> {
    const supplier = await tx.get('supplier', supplierId);
    if (!supplier) throw new NotFoundError(`Supplier ${supplierId} not found`);
    return supplier;
  }
}
