import { Injectable } from '@nestjs/common';
import type { StockMovement } from '../stock/stock.types';
import { RemoteMovementHandler, SyncChannel } from './sync.types';

/**
 * Connects replicas living in one process. Delivery is sequential, so a
 * replica sees each origin branch's movements in publish order; a handler
 * error fails the delivery and the origin retries from that replica's cursor.
 */
@Injectable()
export class InMemorySyncChannel implements SyncChannel {
  private readonly subscribers = new Map<string, RemoteMovementHandler>();

  subscribe(replicaId: string, handler: RemoteMovementHandler) {
    this.subscribers.set(replicaId, handler);
  }

  unsubscribe(replicaId: string) {
    this.subscribers.delete(replicaId);
  }

  replicas(): string[] {
    return [...this.subscribers.keys()];
  }

  async deliver(replicaId: string, originBranchId: string, movements: StockMovement[]): Promise<void> {
    const handler = this.subscribers.get(replicaId);
    if (!handler) {
      throw new Error(`Replica ${replicaId} is not connected`);
    }
    for (const movement of movements) {
      await handler(originBranchId, movement);
    }
  }
}
