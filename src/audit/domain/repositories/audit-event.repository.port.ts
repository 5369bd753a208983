import { AuditEntityType } from '../enums/audit-entity-type.enum';
import { AuditEvent, NewAuditEvent } from '../entities/audit-event.entity';

export type AuditEventFilter = {
  entityType?: AuditEntityType;
  entityId?: string;
};

export abstract class AuditEventRepository {
  abstract append(event: NewAuditEvent): Promise<AuditEvent>;

  /**
   * Events with `id > sinceId` matching the filter, ascending by id.
   */
  abstract findAfter(
    filter: AuditEventFilter,
    sinceId: number,
    limit: number,
  ): Promise<AuditEvent[]>;
}
