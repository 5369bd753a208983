import { Folder } from '../../../../domain/entities/folder.entity';
import { FolderEntity } from '../entities/folder.entity';

export class FolderMapper {
  static toDomain(entity: FolderEntity): Folder {
    const domain = new Folder();
    domain.id = entity.id;
    domain.name = entity.name;
    domain.parentId = entity.parentId ?? null;
    domain.assignedStandardId = entity.assignedStandardId ?? null;
    domain.createdAt = entity.createdAt;
    domain.updatedAt = entity.updatedAt;
    return domain;
  }
}
