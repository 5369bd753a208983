import { AuditEvent } from '../../../../domain/entities/audit-event.entity';
import { AuditEventEntity } from '../entities/audit-event.entity';

export class AuditEventMapper {
  // pg returns bigint columns as strings
  static toDomain(entity: AuditEventEntity): AuditEvent {
    const domain = new AuditEvent();
    domain.id = Number(entity.id);
    domain.kind = entity.kind;
    domain.actorSubject = entity.actorSubject;
    domain.entityType = entity.entityType;
    domain.entityId = entity.entityId;
    domain.occurredAt = entity.occurredAt;
    domain.payload = entity.payload ?? {};
    return domain;
  }
}
