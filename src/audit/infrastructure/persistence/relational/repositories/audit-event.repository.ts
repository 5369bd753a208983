import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, MoreThan, Repository } from 'typeorm';
import { AuditEventEntity } from '../entities/audit-event.entity';
import { AuditEventMapper } from '../mappers/audit-event.mapper';
import {
  AuditEventFilter,
  AuditEventRepository,
} from '../../../../domain/repositories/audit-event.repository.port';
import {
  AuditEvent,
  NewAuditEvent,
} from '../../../../domain/entities/audit-event.entity';

@Injectable()
export class AuditEventRelationalRepository implements AuditEventRepository {
  constructor(
    @InjectRepository(AuditEventEntity)
    private readonly repository: Repository<AuditEventEntity>,
  ) {}

  async append(event: NewAuditEvent): Promise<AuditEvent> {
    const entity = this.repository.create({
      kind: event.kind,
      actorSubject: event.actorSubject,
      entityType: event.entityType,
      entityId: event.entityId,
      payload: event.payload,
    });

    const saved = await this.repository.save(entity);
    return AuditEventMapper.toDomain(saved);
  }

  async findAfter(
    filter: AuditEventFilter,
    sinceId: number,
    limit: number,
  ): Promise<AuditEvent[]> {
    const where: FindOptionsWhere<AuditEventEntity> = {
      id: MoreThan(String(sinceId)),
    };
    if (filter.entityType) {
      where.entityType = filter.entityType;
    }
    if (filter.entityId) {
      where.entityId = filter.entityId;
    }

    const entities = await this.repository.find({
      where,
      order: { id: 'ASC' },
      take: limit,
    });
    return entities.map((entity) => AuditEventMapper.toDomain(entity));
  }
}
