import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ComplianceReportEntity } from '../entities/compliance-report.entity';
import { ComplianceReportMapper } from '../mappers/compliance-report.mapper';
import { ComplianceReportRepository } from '../../../../domain/repositories/compliance-report.repository.port';
import {
  ComplianceReport,
  NewComplianceReport,
} from '../../../../domain/entities/compliance-report.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { IPaginationOptions } from '../../../../../utils/types/pagination-options';

@Injectable()
export class ComplianceReportRelationalRepository
  implements ComplianceReportRepository
{
  constructor(
    @InjectRepository(ComplianceReportEntity)
    private readonly repository: Repository<ComplianceReportEntity>,
  ) {}

  async create(data: NewComplianceReport): Promise<ComplianceReport> {
    const saved = await this.repository.save(this.repository.create(data));
    return ComplianceReportMapper.toDomain(saved);
  }

  async findLatestByDocumentId(
    documentId: string,
  ): Promise<NullableType<ComplianceReport>> {
    const entity = await this.repository.findOne({
      where: { documentId },
      order: { generatedAt: 'DESC' },
    });
    return entity ? ComplianceReportMapper.toDomain(entity) : null;
  }

  async findByDocumentId(
    documentId: string,
    pagination: IPaginationOptions,
  ): Promise<ComplianceReport[]> {
    const entities = await this.repository.find({
      where: { documentId },
      order: { generatedAt: 'DESC', id: 'ASC' },
      skip: (pagination.page - 1) * pagination.limit,
      take: pagination.limit + 1,
    });
    return entities.map((entity) => ComplianceReportMapper.toDomain(entity));
  }
}
