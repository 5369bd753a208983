import { Document } from '../../../../domain/entities/document.entity';
import { DocumentEntity } from '../entities/document.entity';

export class DocumentMapper {
  static toDomain(entity: DocumentEntity): Document {
    const domain = new Document();
    domain.id = entity.id;
    domain.folderId = entity.folderId;
    domain.fileName = entity.fileName;
    domain.mimeType = entity.mimeType;
    domain.fileSize = entity.fileSize;
    domain.contentRef = entity.contentRef;
    domain.contentHash = entity.contentHash;
    domain.overrideStandardId = entity.overrideStandardId ?? null;
    domain.lifecycle = entity.lifecycle;
    domain.uploadedBy = entity.uploadedBy;
    domain.createdAt = entity.createdAt;
    domain.updatedAt = entity.updatedAt;
    return domain;
  }
}
