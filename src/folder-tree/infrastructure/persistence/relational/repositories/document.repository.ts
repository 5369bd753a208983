import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { DocumentEntity } from '../entities/document.entity';
import { DocumentMapper } from '../mappers/document.mapper';
import {
  DocumentPatch,
  DocumentRepository,
} from '../../../../domain/repositories/document.repository.port';
import {
  Document,
  NewDocument,
} from '../../../../domain/entities/document.entity';
import { DocumentLifecycle } from '../../../../domain/enums/document-lifecycle.enum';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { IPaginationOptions } from '../../../../../utils/types/pagination-options';

@Injectable()
export class DocumentRelationalRepository implements DocumentRepository {
  constructor(
    @InjectRepository(DocumentEntity)
    private readonly repository: Repository<DocumentEntity>,
  ) {}

  async create(data: NewDocument): Promise<Document> {
    const entity = this.repository.create({
      ...data,
      overrideStandardId: null,
      lifecycle: DocumentLifecycle.ACTIVE,
    });
    const saved = await this.repository.save(entity);
    return DocumentMapper.toDomain(saved);
  }

  async findById(id: string): Promise<NullableType<Document>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? DocumentMapper.toDomain(entity) : null;
  }

  async findByFolderId(
    folderId: string,
    pagination: IPaginationOptions,
  ): Promise<Document[]> {
    const entities = await this.repository.find({
      where: { folderId },
      order: { createdAt: 'ASC', id: 'ASC' },
      skip: (pagination.page - 1) * pagination.limit,
      take: pagination.limit + 1,
    });
    return entities.map((entity) => DocumentMapper.toDomain(entity));
  }

  async findByFolderIds(folderIds: string[]): Promise<Document[]> {
    if (folderIds.length === 0) {
      return [];
    }
    const entities = await this.repository.find({
      where: { folderId: In(folderIds) },
    });
    return entities.map((entity) => DocumentMapper.toDomain(entity));
  }

  async update(id: string, patch: DocumentPatch): Promise<Document> {
    await this.repository.update(id, patch);
    const entity = await this.repository.findOneOrFail({ where: { id } });
    return DocumentMapper.toDomain(entity);
  }
}
