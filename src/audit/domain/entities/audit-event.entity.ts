import { JsonObject } from '../../../utils/types/json.type';
import { AuditEntityType } from '../enums/audit-entity-type.enum';
import { AuditEventKind } from '../enums/audit-event-kind.enum';

export type AuditEntityRef = {
  entityType: AuditEntityType;
  entityId: string;
};

/**
 * One immutable ledger entry. Ids come from a database sequence and are
 * strictly increasing in append order.
 */
export class AuditEvent {
  id: number;
  kind: AuditEventKind;
  actorSubject: string;
  entityType: AuditEntityType;
  entityId: string;
  occurredAt: Date;
  payload: JsonObject;
}

export type NewAuditEvent = Omit<AuditEvent, 'id' | 'occurredAt'>;
