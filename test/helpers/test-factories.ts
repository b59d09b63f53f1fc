import { ConfigType } from '@nestjs/config';
import { createLogger, Logger, transports } from 'winston';
import { AlertsService } from '../../src/alerts/alerts.service';
import { NotificationPublisher, StockAlertEvent } from '../../src/alerts/alerts.types';
import { AuditService } from '../../src/audit/audit.service';
import { CatalogService, RegisterVariantInput } from '../../src/catalog/catalog.service';
import { Customer, Supplier, Variant } from '../../src/catalog/catalog.types';
import { CommandDispatcher } from '../../src/commands/command-dispatcher.service';
import { OperationContext } from '../../src/commands/operation-context';
import { Role } from '../../src/commands/roles';
import ledgerConfig from '../../src/config/ledger.config';
import { DocumentsService } from '../../src/documents/documents.service';
import { PaymentsService } from '../../src/payments/payments.service';
import { ProcurementService } from '../../src/procurement/procurement.service';
import { StockLedgerService } from '../../src/stock/stock-ledger.service';
import { MemoryStoreBackend } from '../../src/store/memory-store.backend';
import { StoreRetryPolicy, StoreService } from '../../src/store/store.service';
import { BranchSyncService } from '../../src/sync/branch-sync.service';
import { InMemorySyncChannel } from '../../src/sync/in-memory-sync.channel';

export type LedgerSettings = ConfigType<typeof ledgerConfig>;

export const DEFAULT_SETTINGS: LedgerSettings = {
  currencyMinorDigits: 2,
  loyaltyRateBps: 100,
  reservationTtlMinutes: 0,
  reservationSweepIntervalMs: 0,
  lowStockDefaultThreshold: 0,
  lowStockBasis: 'on_hand',
};

export class RecordingPublisher implements NotificationPublisher {
  readonly events: StockAlertEvent[] = [];

  async publish(event: StockAlertEvent): Promise<void> {
    this.events.push(event);
  }
}

export function silentLogger(): Logger {
  return createLogger({ silent: true, transports: [new transports.Console()] });
}

export function testContext(role: Role = 'ADMIN', id = 'tester-1'): OperationContext {
  return { principal: { id, role }, requestId: 'req-test', logger: silentLogger() };
}

export type EngineOptions = {
  settings?: Partial<LedgerSettings>;
  retry?: Partial<StoreRetryPolicy>;
  channel?: InMemorySyncChannel;
  backend?: MemoryStoreBackend;
};

/**
 * Wires the services by hand over a fresh in-memory store, the way the Nest
 * container would.
 */
export function buildEngine(options: EngineOptions = {}) {
  const logger = silentLogger();
  const settings: LedgerSettings = { ...DEFAULT_SETTINGS, ...options.settings };
  const backend = options.backend ?? new MemoryStoreBackend();
  const channel = options.channel ?? new InMemorySyncChannel();
  const publisher = new RecordingPublisher();

  const store = new StoreService(backend, { conflictRetries: 5, conflictBackoffMs: 1, ...options.retry }, logger);
  const audit = new AuditService(store);
  const catalog = new CatalogService(store, audit);
  const alerts = new AlertsService(store, publisher, settings, logger);
  const sync = new BranchSyncService(store, channel, logger);
  const ledger = new StockLedgerService(store, alerts, sync, settings);
  const documents = new DocumentsService(store, ledger, catalog, audit);
  const payments = new PaymentsService(store, documents, settings);
  const procurement = new ProcurementService(store, ledger, catalog, audit);
  const dispatcher = new CommandDispatcher(logger);

  return {
    backend,
    channel,
    publisher,
    settings,
    logger,
    store,
    audit,
    catalog,
    alerts,
    sync,
    ledger,
    documents,
    payments,
    procurement,
    dispatcher,
  };
}

export type Engine = ReturnType<typeof buildEngine>;

let skuCounter = 0;

export async function createTestVariant(
  engine: Engine,
  overrides: Partial<RegisterVariantInput> = {},
): Promise<Variant> {
  skuCounter += 1;
  return engine.catalog.registerVariant(testContext(), {
    sku: `SKU-${skuCounter}`,
    name: `Test variant ${skuCounter}`,
    unitPrice: 10000,
    taxRateBps: 1000,
    ...overrides,
  });
}

export function createTestCustomer(engine: Engine, name = 'Walk-in Customer'): Promise<Customer> {
  return engine.catalog.registerCustomer(testContext(), name);
}

export function createTestSupplier(engine: Engine, name = 'Test Supplier'): Promise<Supplier> {
  return engine.catalog.registerSupplier(testContext(), name);
}

/** Puts `quantity` on hand through a replenishment. */
export function stockUp(engine: Engine, variantId: string, branchId: string, quantity: number) {
  return engine.ledger.replenish(testContext(), variantId, branchId, quantity, `seed-${variantId}-${branchId}`);
}
