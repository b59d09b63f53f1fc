import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import { Logger } from 'winston';
import { OperationContext } from '../commands/operation-context';
import { ValidationError } from '../common/errors';
import ledgerConfig from '../config/ledger.config';
import { StoreService } from '../store/store.service';
import { StoreTransaction } from '../store/store-transaction';
import { StockRecord, StockThreshold, stockKey } from '../stock/stock.types';
import { NOTIFICATION_PUBLISHER, NotificationPublisher, StockAlertEvent } from './alerts.types';
import { evaluateLowStock } from './low-stock';

export type AlertSettings = Pick<ConfigType<typeof ledgerConfig>, 'lowStockDefaultThreshold' | 'lowStockBasis'>;

@Injectable()
export class AlertsService {
  constructor(
    private readonly store: StoreService,
    @Inject(NOTIFICATION_PUBLISHER) private readonly publisher: NotificationPublisher,
    @Inject(ledgerConfig.KEY) private readonly settings: AlertSettings,
    @Inject(WINSTON_MODULE_PROVIDER) private readonly logger: Logger,
  ) {}

  /**
   * Edge-triggered: only a change between low and not-low is stored and
   * published, and publishing waits for the surrounding transaction to commit.
   */
  async evaluateIn(tx: StoreTransaction, record: StockRecord): Promise<StockAlertEvent | null> {
    const key = stockKey(record.variantId, record.branchId);
    const configured = await tx.get('threshold', key);
    const threshold = configured?.threshold ?? this.settings.lowStockDefaultThreshold;
    const low = evaluateLowStock(record, threshold, this.settings.lowStockBasis);

    const state = await tx.get('alertState', key);
    if ((state?.low ?? false) === low) {
      return null;
    }

    tx.put('alertState', key, {
      variantId: record.variantId,
      branchId: record.branchId,
      low,
      changedAt: tx.now,
    });

    const event: StockAlertEvent = {
      type: low ? 'stock.low' : 'stock.recovered',
      variantId: record.variantId,
      branchId: record.branchId,
      onHand: record.onHand,
      reserved: record.reserved,
      threshold,
      at: tx.now,
    };
    tx.onCommit(() => this.dispatch(event));
    return event;
  }

  async setThreshold(
    ctx: OperationContext,
    variantId: string,
    branchId: string,
    threshold: number,
  ): Promise<StockThreshold> {
    if (!Number.isSafeInteger(threshold) || threshold < 0) {
      throw new ValidationError('threshold must be a non-negative integer', [
        { field: 'threshold', message: 'must be a non-negative integer' },
      ]);
    }

    const saved = await this.store.transaction(async (tx) => {
      const key = stockKey(variantId, branchId);
      await tx.get('threshold', key);
      const value: StockThreshold = { variantId, branchId, threshold };
      tx.put('threshold', key, value);

      const record = await tx.get('stock', key);
      if (record) {
        await this.evaluateIn(tx, record);
      }
      return value;
    });

    ctx.logger.info('threshold_set', { variantId, branchId, threshold });
    return saved;
  }

  async getThreshold(variantId: string, branchId: string): Promise<number> {
    const configured = await this.store.read((tx) => tx.get('threshold', stockKey(variantId, branchId)));
    return configured?.threshold ?? this.settings.lowStockDefaultThreshold;
  }

  private dispatch(event: StockAlertEvent) {
    void this.publisher.publish(event).catch((err: unknown) => {
      this.logger.error('alert_publish_failed', {
        type: event.type,
        variantId: event.variantId,
        branchId: event.branchId,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }
}
