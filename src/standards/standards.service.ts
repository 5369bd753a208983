import { Injectable } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { Actor } from '../auth/types/actor.type';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { infinityPagination } from '../utils/infinity-pagination';
import { Standard } from './domain/entities/standard.entity';
import { StandardRegistryDomainService } from './domain/services/standard-registry.domain.service';
import { ListStandardsDto } from './dto/list-standards.dto';
import { PromoteStandardDto } from './dto/promote-standard.dto';
import { StandardResponseDto } from './dto/standard-response.dto';

@Injectable()
export class StandardsService {
  constructor(private readonly registry: StandardRegistryDomainService) {}

  async promote(
    dto: PromoteStandardDto,
    actor: Actor,
  ): Promise<StandardResponseDto> {
    const standard = await this.registry.promote(dto.documentId, actor, {
      name: dto.name,
      predecessorStandardId: dto.predecessorStandardId,
    });
    return this.toResponseDto(standard);
  }

  async getStandard(standardId: string): Promise<StandardResponseDto> {
    return this.toResponseDto(await this.registry.getStandard(standardId));
  }

  async listStandards(
    query: ListStandardsDto,
  ): Promise<InfinityPaginationResponseDto<StandardResponseDto>> {
    const pagination = { page: query.page ?? 1, limit: query.limit ?? 20 };
    const page = infinityPagination(
      await this.registry.listStandards(pagination),
      pagination,
    );
    return {
      data: page.data.map((standard) => this.toResponseDto(standard)),
      hasNextPage: page.hasNextPage,
    };
  }

  async getLineage(standardId: string): Promise<StandardResponseDto[]> {
    const lineage = await this.registry.getLineage(standardId);
    return lineage.map((standard) => this.toResponseDto(standard));
  }

  toResponseDto(standard: Standard): StandardResponseDto {
    return plainToClass(StandardResponseDto, standard, {
      excludeExtraneousValues: true,
    });
  }
}
