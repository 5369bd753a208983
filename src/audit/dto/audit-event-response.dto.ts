import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { AuditEntityType } from '../domain/enums/audit-entity-type.enum';
import { AuditEventKind } from '../domain/enums/audit-event-kind.enum';
import { JsonObject } from '../../utils/types/json.type';

export class AuditEventResponseDto {
  @ApiProperty({ type: Number, example: 1001 })
  @Expose()
  id: number;

  @ApiProperty({ enum: AuditEventKind, example: AuditEventKind.PROMOTE })
  @Expose()
  kind: AuditEventKind;

  @ApiProperty({ example: 'curator-7' })
  @Expose()
  actorSubject: string;

  @ApiProperty({ enum: AuditEntityType })
  @Expose()
  entityType: AuditEntityType;

  @ApiProperty()
  @Expose()
  entityId: string;

  @ApiProperty({ type: String, example: '2026-01-20T10:30:00Z' })
  @Expose()
  occurredAt: Date;

  @ApiProperty({
    type: Object,
    example: { standardId: 'b1c2', version: 2 },
  })
  @Expose()
  payload: JsonObject;
}

export class AuditEventPageResponseDto {
  @ApiProperty({ type: [AuditEventResponseDto] })
  data: AuditEventResponseDto[];

  @ApiProperty()
  hasNextPage: boolean;

  @ApiProperty({
    type: Number,
    nullable: true,
    description: 'Pass as sinceId to fetch the next page',
  })
  nextSinceId: number | null;
}
