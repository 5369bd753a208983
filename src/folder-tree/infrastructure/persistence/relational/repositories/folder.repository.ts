import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Repository } from 'typeorm';
import { FolderEntity } from '../entities/folder.entity';
import { FolderMapper } from '../mappers/folder.mapper';
import {
  FolderPatch,
  FolderRepository,
} from '../../../../domain/repositories/folder.repository.port';
import { Folder, NewFolder } from '../../../../domain/entities/folder.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class FolderRelationalRepository implements FolderRepository {
  constructor(
    @InjectRepository(FolderEntity)
    private readonly repository: Repository<FolderEntity>,
  ) {}

  async create(data: NewFolder): Promise<Folder> {
    const entity = this.repository.create({
      name: data.name,
      parentId: data.parentId,
      assignedStandardId: null,
    });
    const saved = await this.repository.save(entity);
    return FolderMapper.toDomain(saved);
  }

  async findById(id: string): Promise<NullableType<Folder>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? FolderMapper.toDomain(entity) : null;
  }

  async findRoot(): Promise<NullableType<Folder>> {
    const entity = await this.repository.findOne({
      where: { parentId: IsNull() },
    });
    return entity ? FolderMapper.toDomain(entity) : null;
  }

  async findChildren(parentId: string): Promise<Folder[]> {
    const entities = await this.repository.find({
      where: { parentId },
      order: { name: 'ASC' },
    });
    return entities.map((entity) => FolderMapper.toDomain(entity));
  }

  async findAll(): Promise<Folder[]> {
    const entities = await this.repository.find();
    return entities.map((entity) => FolderMapper.toDomain(entity));
  }

  async update(id: string, patch: FolderPatch): Promise<Folder> {
    await this.repository.update(id, patch);
    const entity = await this.repository.findOneOrFail({ where: { id } });
    return FolderMapper.toDomain(entity);
  }
}
