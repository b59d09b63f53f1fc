import { Injectable } from '@nestjs/common';
import { OperationContext } from '../commands/operation-context';
import { StoreService } from '../store/store.service';
import { StoreTransaction } from '../store/store-transaction';
import { AuditEntityType, AuditEvent } from './audit.types';

const PAGE_SIZE = 500;

export type AuditEntry = {
  entityType: AuditEntityType;
  entityId: string;
  action: string;
  detail?: AuditEvent['detail'];
};

/** "Who changed what" trail: one append-only partition per entity, written in the same transaction as the change. */
@Injectable()
export class AuditService {
  constructor(private readonly store: StoreService) {}

  async recordIn(tx: StoreTransaction, ctx: OperationContext, entry: AuditEntry): Promise<AuditEvent> {
    return tx.append('audit', entry.entityId, () => ({
      entityType: entry.entityType,
      entityId: entry.entityId,
      action: entry.action,
      actorId: ctx.principal.id,
      role: ctx.principal.role,
      requestId: ctx.requestId,
      detail: entry.detail ?? {},
      at: tx.now,
    }));
  }

  async history(entityId: string): Promise<AuditEvent[]> {
    const all: AuditEvent[] = [];
    let after = 0;
    for (;;) {
      const page = await this.store.read((tx) => tx.readLog('audit', entityId, after, PAGE_SIZE));
      all.push(...page.map((e) => e.entry));
      if (page.length < PAGE_SIZE) return all;
      after = page[page.length - 1].sequence;
    }
  }
}
