import type { AlertState } from '../alerts/alerts.types';
import type { AuditEvent } from '../audit/audit.types';
import type { Customer, Supplier, Variant, VariantPrice } from '../catalog/catalog.types';
import type { SalesDocument, StageTransition } from '../documents/documents.types';
import type { LoyaltyTransaction, Payment } from '../payments/payments.types';
import type { GoodsReceipt, PurchaseOrder, VendorRating } from '../procurement/procurement.types';
import type {
  Reservation,
  ReservationExpiry,
  StockMovement,
  StockRecord,
  StockThreshold,
} from '../stock/stock.types';
import type { ReplicaCursor, SyncCursor } from '../sync/sync.types';

export interface SequenceCounter {
  name: string;
  value: number;
}

/** Versioned records, one per key, updated by optimistic read-modify-write. */
export interface CollectionMap {
  stock: StockRecord;
  reservation: Reservation;
  reservationExpiry: ReservationExpiry;
  threshold: StockThreshold;
  alertState: AlertState;
  document: SalesDocument;
  purchaseOrder: PurchaseOrder;
  vendorRating: VendorRating;
  variant: Variant;
  customer: Customer;
  supplier: Supplier;
  syncCursor: SyncCursor;
  replica: StockRecord;
  replicaCursor: ReplicaCursor;
  counter: SequenceCounter;
}

/** Append-only logs, gap-free sequence per partition. */
export interface LogMap {
  movement: StockMovement;
  transition: StageTransition;
  payment: Payment;
  loyalty: LoyaltyTransaction;
  receipt: GoodsReceipt;
  variantPrice: VariantPrice;
  audit: AuditEvent;
}

export type CollectionName = keyof CollectionMap;
export type LogName = keyof LogMap;

export interface RecordRow {
  collection: CollectionName;
  key: string;
  version: number;
  body: string;
}

export interface LogRow {
  log: LogName;
  partition: string;
  sequence: number;
  body: string;
  recordedAt: string;
}

/** expectedVersion 0 means the record must not exist yet. A null body removes the record. */
export interface RecordWrite {
  collection: CollectionName;
  key: string;
  expectedVersion: number;
  body: string | null;
}

export interface ChangeSet {
  writes: RecordWrite[];
  appends: LogRow[];
}

export interface LogEntry<T> {
  sequence: number;
  recordedAt: string;
  entry: T;
}

export interface StoreBackend {
  load(collection: CollectionName, key: string): Promise<RecordRow | null>;
  list(collection: CollectionName): Promise<RecordRow[]>;
  readLog(log: LogName, partition: string, afterSequence: number, limit: number): Promise<LogRow[]>;
  /** Applies every write and append or none; throws ConcurrencyConflictError on a version mismatch. */
  commit(changes: ChangeSet): Promise<void>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export const STORE_BACKEND = Symbol('STORE_BACKEND');

export function recordId(collection: CollectionName, key: string) {
  return `${collection}/${key}`;
}

export function logId(log: LogName, partition: string) {
  return `${log}/${partition}`;
}
