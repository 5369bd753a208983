import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { JsonObject } from '../../../../../utils/types/json.type';
import { AuditEntityType } from '../../../../domain/enums/audit-entity-type.enum';
import { AuditEventKind } from '../../../../domain/enums/audit-event-kind.enum';

@Entity({ name: 'audit_events' })
@Index(['entityType', 'entityId', 'id'])
export class AuditEventEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn('increment', { type: 'bigint' })
  id: string;

  @Column({ type: 'varchar', length: 40 })
  kind: AuditEventKind;

  @Column({ name: 'actor_subject', type: 'varchar', length: 255 })
  actorSubject: string;

  @Column({ name: 'entity_type', type: 'varchar', length: 40 })
  entityType: AuditEntityType;

  @Column({ name: 'entity_id', type: 'varchar', length: 64 })
  entityId: string;

  @CreateDateColumn({ name: 'occurred_at', type: 'timestamptz' })
  occurredAt: Date;

  @Column({ type: 'jsonb', default: () => "'{}'" })
  payload: JsonObject;
}
