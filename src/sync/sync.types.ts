import type { StockMovement } from '../stock/stock.types';

/** How far one origin branch's log has been delivered to one replica. */
export interface SyncCursor {
  branchId: string;
  replicaId: string;
  lastPublishedSequence: number;
  updatedAt: string;
}

/** Last movement of an origin branch folded into this node's replica copy. */
export interface ReplicaCursor {
  originBranchId: string;
  lastAppliedSequence: number;
  updatedAt: string;
}

export type RemoteMovementHandler = (originBranchId: string, movement: StockMovement) => Promise<void>;

/**
 * Point-to-point channel between branch nodes with at-least-once delivery.
 * `deliver` resolves once the replica accepted the batch and must hand
 * movements over in the order given.
 */
export interface SyncChannel {
  /** Replicas currently reachable. */
  replicas(): string[];
  deliver(replicaId: string, originBranchId: string, movements: StockMovement[]): Promise<void>;
  subscribe(replicaId: string, handler: RemoteMovementHandler): void;
}

export const SYNC_CHANNEL = Symbol('SYNC_CHANNEL');

export function syncCursorKey(branchId: string, replicaId: string) {
  return `${branchId}->${replicaId}`;
}
