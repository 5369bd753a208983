import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { StandardEntity } from '../entities/standard.entity';
import { StandardMapper } from '../mappers/standard.mapper';
import { StandardRepository } from '../../../../domain/repositories/standard.repository.port';
import { Standard } from '../../../../domain/entities/standard.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { IPaginationOptions } from '../../../../../utils/types/pagination-options';
import { LineageConflictError } from '../../../../../utils/errors/domain-errors';

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
}

@Injectable()
export class StandardRelationalRepository implements StandardRepository {
  constructor(
    @InjectRepository(StandardEntity)
    private readonly repository: Repository<StandardEntity>,
  ) {}

  async create(standard: Standard): Promise<Standard> {
    try {
      const saved = await this.repository.save(
        StandardMapper.toPersistence(standard),
      );
      return StandardMapper.toDomain(saved);
    } catch (error) {
      // Another process promoted onto the same head first
      if (isUniqueViolation(error) && standard.predecessorId) {
        const head = await this.findHead(standard.lineageId);
        throw new LineageConflictError(
          standard.predecessorId,
          head?.id ?? standard.predecessorId,
        );
      }
      throw error;
    }
  }

  async findById(id: string): Promise<NullableType<Standard>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? StandardMapper.toDomain(entity) : null;
  }

  async findHead(lineageId: string): Promise<NullableType<Standard>> {
    const entity = await this.repository.findOne({
      where: { lineageId },
      order: { version: 'DESC' },
    });
    return entity ? StandardMapper.toDomain(entity) : null;
  }

  async findLineage(lineageId: string): Promise<Standard[]> {
    const entities = await this.repository.find({
      where: { lineageId },
      order: { version: 'ASC' },
    });
    return entities.map((entity) => StandardMapper.toDomain(entity));
  }

  async findPage(pagination: IPaginationOptions): Promise<Standard[]> {
    const entities = await this.repository.find({
      order: { promotedAt: 'DESC', id: 'ASC' },
      skip: (pagination.page - 1) * pagination.limit,
      take: pagination.limit + 1,
    });
    return entities.map((entity) => StandardMapper.toDomain(entity));
  }
}
