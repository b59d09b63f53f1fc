export type AuditEntityType = 'STOCK' | 'DOCUMENT' | 'PURCHASE_ORDER' | 'VARIANT';

export interface AuditEvent {
  entityType: AuditEntityType;
  entityId: string;
  action: string;
  actorId: string;
  role: string;
  requestId: string;
  detail: Record<string, string | number | boolean | null>;
  at: string;
}
