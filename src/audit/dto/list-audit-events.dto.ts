import { ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateIf,
} from 'class-validator';
import { Type } from 'class-transformer';
import { AuditEntityType } from '../domain/enums/audit-entity-type.enum';

export class ListAuditEventsDto {
  @ApiPropertyOptional({ enum: AuditEntityType, example: 'document' })
  @ValidateIf(
    (query: ListAuditEventsDto) =>
      query.entityType !== undefined || query.entityId !== undefined,
  )
  @IsEnum(AuditEntityType)
  entityType?: AuditEntityType;

  @ApiPropertyOptional({
    type: String,
    example: '5b0c8a3e-2f1d-4c55-9e7e-0d5f3c1a9b42',
  })
  @IsOptional()
  @IsString()
  entityId?: string;

  @ApiPropertyOptional({
    description: 'Return events with an id greater than this cursor',
    type: Number,
    minimum: 0,
    default: 0,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  sinceId?: number = 0;

  @ApiPropertyOptional({
    type: Number,
    minimum: 1,
    maximum: 500,
    default: 100,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit?: number = 100;
}
