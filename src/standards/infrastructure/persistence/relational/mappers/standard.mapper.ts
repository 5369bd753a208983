import { Standard } from '../../../../domain/entities/standard.entity';
import { StandardEntity } from '../entities/standard.entity';

export class StandardMapper {
  static toDomain(entity: StandardEntity): Standard {
    const domain = new Standard();
    domain.id = entity.id;
    domain.name = entity.name;
    domain.rules = entity.rules;
    domain.version = entity.version;
    domain.lineageId = entity.lineageId;
    domain.predecessorId = entity.predecessorId ?? null;
    domain.sourceDocumentId = entity.sourceDocumentId;
    domain.sourceContentRef = entity.sourceContentRef;
    domain.promotedBy = entity.promotedBy;
    domain.promotedAt = entity.promotedAt;
    return domain;
  }

  static toPersistence(domain: Standard): StandardEntity {
    const entity = new StandardEntity();
    entity.id = domain.id;
    entity.name = domain.name;
    entity.rules = domain.rules;
    entity.version = domain.version;
    entity.lineageId = domain.lineageId;
    entity.predecessorId = domain.predecessorId;
    entity.sourceDocumentId = domain.sourceDocumentId;
    entity.sourceContentRef = domain.sourceContentRef;
    entity.promotedBy = domain.promotedBy;
    entity.promotedAt = domain.promotedAt;
    return entity;
  }
}
